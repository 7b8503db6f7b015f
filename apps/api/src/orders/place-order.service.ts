import { Inject, Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { PlaceOrderResponse } from '@shared/order';
import {
  reconcileLineItems,
  type ReconciliationResult,
} from '@shared/pricing';
import type { AuthenticatedUser } from '../auth/bearer-auth.guard';
import { invalidItems, rateLimited } from '../common/api-errors';
import { AppLogger } from '../common/app-logger';
import { CatalogSnapshotLoader } from '../catalog/catalog-snapshot.loader';
import { ORDERING_CONFIG, type OrderingConfig } from '../config/ordering.config';
import type { PaymentAuthorization } from '../payments/payment-gateway';
import {
  RateLimiterService,
  retryAfterSeconds,
} from '../rate-limit/rate-limiter.service';
import {
  TenantContextService,
  type TenantContext,
} from '../tenants/tenant-context.service';
import { OrderPaymentsService } from './order-payments.service';
import { OrderPersistenceService } from './order-persistence.service';
import {
  ORDER_PLACED_EVENT,
  type OrderPlacedEvent,
  type OrderWithItems,
  type PlaceOrderCommand,
  type SaveMode,
} from './types';

export const PLACE_ORDER_ENDPOINT = 'place-order';

/**
 * Places or edits an order: tenant and membership, throttling, server-side
 * pricing, persistence, then the optional card authorization.
 */
@Injectable()
export class PlaceOrderService {
  private readonly logger = new AppLogger(PlaceOrderService.name);

  constructor(
    @Inject(ORDERING_CONFIG) private readonly config: OrderingConfig,
    private readonly tenants: TenantContextService,
    private readonly rateLimiter: RateLimiterService,
    private readonly catalog: CatalogSnapshotLoader,
    private readonly persistence: OrderPersistenceService,
    private readonly payments: OrderPaymentsService,
    private readonly events: EventEmitter2,
  ) {}

  async placeOrder(
    user: AuthenticatedUser,
    command: PlaceOrderCommand,
  ): Promise<PlaceOrderResponse> {
    const ctx = await this.tenants.resolve(user, command.tenantId);
    await this.admit(ctx);

    const snapshot = await this.catalog.load(ctx.tenantId, command.items);
    const reconciliation = reconcileLineItems(snapshot, command.items);
    this.logReconciliation(ctx, reconciliation);

    if (reconciliation.catalogMiss) {
      const { missing } = reconciliation;
      this.logger.warn(
        `rejecting order with unknown references tenantId=${ctx.tenantId} menuItemIds=${missing.menuItemIds.join(',')} sizeIds=${missing.sizeIds.join(',')} ingredientIds=${missing.ingredientIds.join(',')}`,
      );
      throw invalidItems(missing);
    }

    const mode: SaveMode = command.orderId ? 'update' : 'create';
    const order = await this.persistence.save(
      command,
      ctx,
      reconciliation.items,
      mode,
    );

    let authorization: PaymentAuthorization | undefined;
    if (order.paymentMethod === 'card' && !ctx.isStaff) {
      authorization = await this.payments.authorize(order, ctx.userId);
    }

    this.emitPlaced(order, mode);

    return {
      success: true,
      orderId: order.id,
      orderNumber: order.orderNumber,
      total: order.total,
      corrected: reconciliation.corrected,
      ...(authorization
        ? {
            clientSecret: authorization.clientSecret,
            paymentIntentId: authorization.paymentIntentId,
          }
        : {}),
    };
  }

  private async admit(ctx: TenantContext): Promise<void> {
    const { maxRequests, windowMinutes } = this.config.rateLimit.placeOrder;
    const decision = await this.rateLimiter.check(
      ctx.tenantId,
      PLACE_ORDER_ENDPOINT,
      maxRequests,
      windowMinutes,
    );
    if (!decision.allowed) {
      throw rateLimited(retryAfterSeconds(decision.resetAt), decision.resetAt);
    }
  }

  private logReconciliation(
    ctx: TenantContext,
    reconciliation: ReconciliationResult,
  ): void {
    if (!reconciliation.corrected) {
      this.logger.log(
        `prices verified tenantId=${ctx.tenantId} lines=${reconciliation.items.length}`,
      );
      return;
    }

    for (const correction of reconciliation.corrections) {
      this.logger.warn(
        `price corrected tenantId=${ctx.tenantId} line=${correction.index} menuItemId=${correction.menuItemId} client=${correction.client.unitPrice}/${correction.client.subtotal} server=${correction.server.unitPrice}/${correction.server.subtotal}`,
      );
    }
  }

  private emitPlaced(order: OrderWithItems, mode: SaveMode): void {
    const event: OrderPlacedEvent = {
      orderId: order.id,
      tenantId: order.tenantId,
      orderNumber: order.orderNumber,
      total: order.total,
      status: order.status,
      orderType: order.orderType,
      mode,
      customerName: order.customerName,
    };
    this.events.emit(ORDER_PLACED_EVENT, event);
  }
}
