import { Inject, Injectable } from '@nestjs/common';
import type {
  PaymentRetryResponse,
  VerifyPaymentResponse,
} from '@shared/order';
import { toMinorUnits } from '@shared/utils';
import type { AuthenticatedUser } from '../auth/bearer-auth.guard';
import {
  amountTooSmall,
  forbidden,
  orderAlreadyPaid,
  orderNotFound,
  paymentError,
  paymentMismatch,
  paymentNotSucceeded,
} from '../common/api-errors';
import { AppLogger } from '../common/app-logger';
import { errToString } from '../common/utils/err-to-string';
import { ORDERING_CONFIG, type OrderingConfig } from '../config/ordering.config';
import {
  AmountBelowMinimumError,
  PAYMENT_GATEWAY,
  type PaymentAuthorization,
  type PaymentGateway,
  type PaymentIntentSummary,
} from '../payments/payment-gateway';
import {
  TenantContextService,
  type TenantContext,
} from '../tenants/tenant-context.service';
import { OrdersRepository } from './orders.repository';
import type { Order } from './types';

/**
 * Card payments for persisted orders: opening an authorization, reopening
 * one for an unpaid order, and confirming a completed one.
 */
@Injectable()
export class OrderPaymentsService {
  private readonly logger = new AppLogger(OrderPaymentsService.name);

  constructor(
    @Inject(ORDERING_CONFIG) private readonly config: OrderingConfig,
    @Inject(PAYMENT_GATEWAY) private readonly gateway: PaymentGateway,
    private readonly tenants: TenantContextService,
    private readonly orders: OrdersRepository,
  ) {}

  /** The order stays pending and unpaid when this throws. */
  async authorize(
    order: Pick<Order, 'id' | 'tenantId' | 'total' | 'customerEmail'>,
    userId: string,
  ): Promise<PaymentAuthorization> {
    const amountMinor = toMinorUnits(order.total);
    const minimum = this.gateway.minimumAmountMinor;
    if (amountMinor < minimum) {
      this.logger.warn(
        `card amount below minimum orderId=${order.id} amountMinor=${amountMinor} minimum=${minimum}`,
      );
      throw amountTooSmall(order.id, amountMinor, minimum);
    }

    try {
      const authorization = await this.gateway.authorize({
        amountMinor,
        currency: this.config.payments.currency,
        receiptEmail: order.customerEmail,
        metadata: { userId, orderId: order.id, tenantId: order.tenantId },
      });
      this.logger.log(
        `payment authorization opened orderId=${order.id} paymentIntentId=${authorization.paymentIntentId}`,
      );
      return authorization;
    } catch (error) {
      if (error instanceof AmountBelowMinimumError) {
        throw amountTooSmall(order.id, error.amountMinor, error.minimumMinor);
      }
      this.logger.error(
        `payment authorization failed orderId=${order.id}: ${errToString(error)}`,
      );
      throw paymentError(order.id, errToString(error));
    }
  }

  async retry(
    user: AuthenticatedUser,
    orderId: string,
    requestedTenantId?: string,
  ): Promise<PaymentRetryResponse> {
    const ctx = await this.tenants.resolve(user, requestedTenantId);
    const order = await this.findOwnCardOrder(ctx, orderId);
    if (order.paid) throw orderAlreadyPaid(order.id);

    const authorization = await this.authorize(order, ctx.userId);
    return {
      success: true,
      orderId: order.id,
      orderNumber: order.orderNumber,
      total: order.total,
      clientSecret: authorization.clientSecret,
      paymentIntentId: authorization.paymentIntentId,
    };
  }

  async verify(
    user: AuthenticatedUser,
    orderId: string,
    paymentIntentId: string,
    requestedTenantId?: string,
  ): Promise<VerifyPaymentResponse> {
    const ctx = await this.tenants.resolve(user, requestedTenantId);
    const order = await this.findOwnCardOrder(ctx, orderId);

    if (order.paid) {
      if (order.paymentReference === paymentIntentId) {
        return this.verified(order, paymentIntentId);
      }
      throw orderAlreadyPaid(order.id);
    }

    let intent: PaymentIntentSummary;
    try {
      intent = await this.gateway.retrieve(paymentIntentId);
    } catch (error) {
      this.logger.error(
        `payment lookup failed orderId=${order.id} paymentIntentId=${paymentIntentId}: ${errToString(error)}`,
      );
      throw paymentError(order.id, errToString(error));
    }

    this.assertIntentMatches(order, ctx, intent);

    const updated = await this.orders.markPaid(
      order.tenantId,
      order.id,
      intent.id,
    );
    if (!updated) throw orderAlreadyPaid(order.id);

    this.logger.log(
      `payment verified orderId=${order.id} tenantId=${order.tenantId} paymentIntentId=${intent.id}`,
    );
    return this.verified(updated, intent.id);
  }

  private async findOwnCardOrder(
    ctx: TenantContext,
    orderId: string,
  ): Promise<Order> {
    const order = await this.orders.findById(ctx.tenantId, orderId);
    if (!order) throw orderNotFound(orderId);

    if (ctx.isStaff || order.customerId !== ctx.userId) {
      throw forbidden('Only the customer who placed the order can pay for it');
    }
    if (order.paymentMethod !== 'card') {
      throw paymentMismatch('Order is not paid by card');
    }
    return order;
  }

  private assertIntentMatches(
    order: Order,
    ctx: TenantContext,
    intent: PaymentIntentSummary,
  ): void {
    if (intent.status !== 'succeeded') {
      throw paymentNotSucceeded(intent.status);
    }

    const { orderId, tenantId, userId } = intent.metadata;
    let mismatch: string | null = null;
    if (orderId !== order.id) {
      mismatch = 'Payment does not belong to this order';
    } else if (tenantId && tenantId !== order.tenantId) {
      mismatch = 'Payment belongs to another tenant';
    } else if (userId && userId !== ctx.userId) {
      mismatch = 'Payment was made by another user';
    } else if (intent.amountMinor !== toMinorUnits(order.total)) {
      mismatch = 'Payment amount does not match the order total';
    }

    if (mismatch) {
      this.logger.warn(
        `payment mismatch orderId=${order.id} paymentIntentId=${intent.id}: ${mismatch}`,
      );
      throw paymentMismatch(mismatch);
    }
  }

  private verified(order: Order, paymentIntentId: string): VerifyPaymentResponse {
    return {
      success: true,
      orderId: order.id,
      orderNumber: order.orderNumber,
      status: order.status,
      paid: true,
      paymentIntentId,
    };
  }
}
