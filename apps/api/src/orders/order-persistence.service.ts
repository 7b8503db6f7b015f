// apps/api/src/orders/order-persistence.service.ts
import { HttpException, Injectable } from '@nestjs/common';
import type { OrderStatus } from '@shared/order';
import { sumSubtotals, type ReconciledLineItem } from '@shared/pricing';
import { roundMoney } from '@shared/utils';
import { forbidden, orderError, orderNotFound } from '../common/api-errors';
import { AppLogger } from '../common/app-logger';
import { DatabaseService } from '../database/database.service';
import { errToString } from '../common/utils/err-to-string';
import type { TenantContext } from '../tenants/tenant-context.service';
import { OrderSequenceService } from './order-sequence.service';
import { OrdersRepository } from './orders.repository';
import type {
  Order,
  OrderHeader,
  OrderItem,
  OrderWithItems,
  PlaceOrderCommand,
  SaveMode,
} from './types';

type CreateStage = 'number' | 'header' | 'items';

const ORDER_NUMBER_DAY_RE = /^(\d{4})(\d{2})(\d{2})-\d+$/;

/** ISO day encoded in an order number, null when it is not one of ours. */
export function orderNumberDay(orderNumber: string): string | null {
  const match = ORDER_NUMBER_DAY_RE.exec(orderNumber);
  return match ? `${match[1]}-${match[2]}-${match[3]}` : null;
}

export function computeTotals(
  command: Pick<PlaceOrderCommand, 'deliveryFee' | 'discount'>,
  items: readonly ReconciledLineItem[],
): { subtotal: number; deliveryFee: number; discount: number; total: number } {
  const subtotal = sumSubtotals(items);
  const deliveryFee = roundMoney(command.deliveryFee);
  const discount = roundMoney(command.discount ?? 0);
  return {
    subtotal,
    deliveryFee,
    discount,
    total: roundMoney(subtotal + deliveryFee - discount),
  };
}

export function initialStatus(
  command: Pick<PlaceOrderCommand, 'paymentMethod' | 'status'>,
  isStaff: boolean,
): OrderStatus {
  if (isStaff && command.status) return command.status;
  return command.paymentMethod === 'cash' ? 'confirmed' : 'pending';
}

const toOrderItems = (items: readonly ReconciledLineItem[]): OrderItem[] =>
  items.map((item, position) => ({
    position,
    menuItemId: item.menuItemId,
    name: item.name,
    quantity: item.quantity,
    unitPrice: item.unitPrice,
    subtotal: item.subtotal,
    note: item.note ?? null,
    variants: item.variants ?? {},
  }));

function formatOrderLogContext(order: Pick<Order, 'id' | 'tenantId' | 'orderNumber'>) {
  return `orderId=${order.id} tenantId=${order.tenantId} orderNumber=${order.orderNumber}`;
}

/**
 * Writes the order aggregate. Each path is one transaction covering the
 * order number, the header and the item set, so a failed write leaves no
 * partial order and no consumed number behind.
 */
@Injectable()
export class OrderPersistenceService {
  private readonly logger = new AppLogger(OrderPersistenceService.name);

  constructor(
    private readonly db: DatabaseService,
    private readonly orders: OrdersRepository,
    private readonly sequence: OrderSequenceService,
  ) {}

  async save(
    command: PlaceOrderCommand,
    ctx: TenantContext,
    items: readonly ReconciledLineItem[],
    mode: SaveMode,
  ): Promise<OrderWithItems> {
    if (mode === 'update') {
      return this.update(command, ctx, items);
    }
    return this.create(command, ctx, items);
  }

  private async create(
    command: PlaceOrderCommand,
    ctx: TenantContext,
    items: readonly ReconciledLineItem[],
  ): Promise<OrderWithItems> {
    const day = this.sequence.dayForSlot(command.scheduledSlot);
    const orderItems = toOrderItems(items);
    const progress: { stage: CreateStage } = { stage: 'number' };

    let order: Order;
    try {
      // number, header and items commit together; a rollback frees the number
      order = await this.db.transaction(async (tx) => {
        const orderNumber = await this.sequence.next(day, tx);
        progress.stage = 'header';
        const header: OrderHeader = {
          ...this.commonHeader(command, items),
          customerId: ctx.isStaff ? null : ctx.userId,
          customerEmail:
            command.customerEmail ?? (ctx.isStaff ? null : ctx.email ?? null),
          orderNumber,
          status: initialStatus(command, ctx.isStaff),
          paid: false,
          paymentReference: null,
        };
        const inserted = await this.orders.insertHeader(ctx.tenantId, header, tx);
        progress.stage = 'items';
        await this.orders.insertItems(ctx.tenantId, inserted.id, orderItems, tx);
        return inserted;
      });
    } catch (error) {
      if (error instanceof HttpException) throw error;
      this.logger.error(
        `order ${progress.stage} write failed, rolled back tenantId=${ctx.tenantId}: ${errToString(error)}`,
      );
      throw orderError(
        progress.stage === 'items'
          ? 'Failed to save order items'
          : 'Failed to save order',
      );
    }

    this.logger.log(
      `order created ${formatOrderLogContext(order)} total=${order.total} status=${order.status}`,
    );
    return { ...order, items: orderItems };
  }

  private async update(
    command: PlaceOrderCommand,
    ctx: TenantContext,
    items: readonly ReconciledLineItem[],
  ): Promise<OrderWithItems> {
    const orderId = command.orderId;
    if (!orderId) {
      throw orderError('Order id is required to edit an order');
    }
    if (!ctx.isStaff) {
      throw forbidden('Only staff can edit orders');
    }

    const owningTenant = await this.orders.findOwningTenant(orderId);
    if (!owningTenant) throw orderNotFound(orderId);
    if (owningTenant !== ctx.tenantId) {
      this.logger.warn(
        `cross-tenant edit rejected orderId=${orderId} tenantId=${ctx.tenantId}`,
      );
      throw forbidden('Order belongs to another tenant');
    }

    const existing = await this.orders.findById(ctx.tenantId, orderId);
    if (!existing) throw orderNotFound(orderId);

    const renumberDay = this.renumberDay(existing, command);
    const orderItems = toOrderItems(items);

    let updated: Order | null;
    try {
      updated = await this.db.transaction(async (tx) => {
        const orderNumber = renumberDay
          ? await this.sequence.next(renumberDay, tx)
          : existing.orderNumber;
        const header: OrderHeader = {
          ...this.commonHeader(command, items),
          customerId: existing.customerId,
          customerEmail: command.customerEmail ?? existing.customerEmail,
          orderNumber,
          status: command.status ?? 'confirmed',
          paid: existing.paid,
          paymentReference: existing.paymentReference,
        };
        const row = await this.orders.updateHeader(
          ctx.tenantId,
          orderId,
          header,
          tx,
        );
        if (!row) return null;
        await this.orders.deleteItems(ctx.tenantId, orderId, tx);
        await this.orders.insertItems(ctx.tenantId, orderId, orderItems, tx);
        return row;
      });
    } catch (error) {
      if (error instanceof HttpException) throw error;
      this.logger.error(
        `order update failed orderId=${orderId} tenantId=${ctx.tenantId}: ${errToString(error)}`,
      );
      throw orderError('Failed to update order');
    }

    if (!updated) throw orderNotFound(orderId);

    if (updated.orderNumber !== existing.orderNumber) {
      this.logger.log(
        `scheduled day changed orderId=${orderId} ${existing.orderNumber} -> ${updated.orderNumber}`,
      );
    }
    this.logger.log(
      `order updated ${formatOrderLogContext(updated)} total=${updated.total} status=${updated.status}`,
    );
    return { ...updated, items: orderItems };
  }

  /**
   * Day to draw a fresh number for, or null to keep the current one. An edit
   * with no slot before or after keeps its number; otherwise the number
   * follows the new slot's day, or today once the slot is cleared.
   */
  private renumberDay(existing: Order, command: PlaceOrderCommand): string | null {
    if (!command.scheduledSlot && !existing.scheduledSlot) return null;

    const targetDay = this.sequence.dayForSlot(command.scheduledSlot);
    const currentDay =
      orderNumberDay(existing.orderNumber) ??
      (existing.scheduledSlot
        ? this.sequence.calendarDay(existing.scheduledSlot)
        : null);
    return currentDay === targetDay ? null : targetDay;
  }

  private commonHeader(
    command: PlaceOrderCommand,
    items: readonly ReconciledLineItem[],
  ) {
    return {
      cashierCustomerId: command.cashierCustomerId ?? null,
      orderType: command.orderType,
      customerName: command.customerName,
      customerPhone: command.customerPhone,
      deliveryAddress: command.deliveryAddress ?? null,
      deliveryCity: command.deliveryCity ?? null,
      deliveryPostalCode: command.deliveryPostalCode ?? null,
      deliveryLatitude: command.deliveryLatitude ?? null,
      deliveryLongitude: command.deliveryLongitude ?? null,
      zone: command.zone ?? null,
      note: command.note ?? null,
      paymentMethod: command.paymentMethod,
      scheduledSlot: command.scheduledSlot
        ? new Date(command.scheduledSlot)
        : null,
      ...computeTotals(command, items),
    };
  }
}
