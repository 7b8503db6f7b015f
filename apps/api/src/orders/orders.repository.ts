// apps/api/src/orders/orders.repository.ts
import { Injectable } from '@nestjs/common';
import type { OrderStatus, OrderType, PaymentMethod } from '@shared/order';
import { DatabaseService, type SqlExecutor } from '../database/database.service';
import type { Order, OrderHeader, OrderItem } from './types';

type Numeric = string | number;

type OrderRow = {
  id: string;
  tenant_id: string;
  customer_id: string | null;
  cashier_customer_id: string | null;
  order_number: string;
  status: OrderStatus;
  order_type: OrderType;
  customer_name: string;
  customer_phone: string;
  customer_email: string | null;
  delivery_address: string | null;
  delivery_city: string | null;
  delivery_postal_code: string | null;
  delivery_latitude: number | null;
  delivery_longitude: number | null;
  zone: string | null;
  note: string | null;
  subtotal: Numeric;
  delivery_fee: Numeric;
  discount: Numeric;
  total: Numeric;
  payment_method: PaymentMethod;
  paid: boolean;
  payment_reference: string | null;
  scheduled_slot: Date | null;
  created_at: Date;
  updated_at: Date;
};

// header columns in insert order; kept in step with headerValues()
const HEADER_COLUMNS = [
  'customer_id',
  'cashier_customer_id',
  'order_number',
  'status',
  'order_type',
  'customer_name',
  'customer_phone',
  'customer_email',
  'delivery_address',
  'delivery_city',
  'delivery_postal_code',
  'delivery_latitude',
  'delivery_longitude',
  'zone',
  'note',
  'subtotal',
  'delivery_fee',
  'discount',
  'total',
  'payment_method',
  'paid',
  'payment_reference',
  'scheduled_slot',
] as const;

const ORDER_COLUMNS = [
  'id',
  'tenant_id',
  ...HEADER_COLUMNS,
  'created_at',
  'updated_at',
].join(', ');

function headerValues(header: OrderHeader): unknown[] {
  return [
    header.customerId,
    header.cashierCustomerId,
    header.orderNumber,
    header.status,
    header.orderType,
    header.customerName,
    header.customerPhone,
    header.customerEmail,
    header.deliveryAddress,
    header.deliveryCity,
    header.deliveryPostalCode,
    header.deliveryLatitude,
    header.deliveryLongitude,
    header.zone,
    header.note,
    header.subtotal,
    header.deliveryFee,
    header.discount,
    header.total,
    header.paymentMethod,
    header.paid,
    header.paymentReference,
    header.scheduledSlot,
  ];
}

export function toOrder(row: OrderRow): Order {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    customerId: row.customer_id,
    cashierCustomerId: row.cashier_customer_id,
    orderNumber: row.order_number,
    status: row.status,
    orderType: row.order_type,
    customerName: row.customer_name,
    customerPhone: row.customer_phone,
    customerEmail: row.customer_email,
    deliveryAddress: row.delivery_address,
    deliveryCity: row.delivery_city,
    deliveryPostalCode: row.delivery_postal_code,
    deliveryLatitude: row.delivery_latitude,
    deliveryLongitude: row.delivery_longitude,
    zone: row.zone,
    note: row.note,
    subtotal: Number(row.subtotal),
    deliveryFee: Number(row.delivery_fee),
    discount: Number(row.discount),
    total: Number(row.total),
    paymentMethod: row.payment_method,
    paid: row.paid,
    paymentReference: row.payment_reference,
    scheduledSlot: row.scheduled_slot,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Order and item storage. Every statement except `findOwningTenant`
 * carries the tenant predicate.
 */
@Injectable()
export class OrdersRepository {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Classifies an order id for the edit path: which tenant owns it, if any.
   * Returns no order data.
   */
  async findOwningTenant(orderId: string): Promise<string | null> {
    const { rows } = await this.db.query<{ tenant_id: string }>(
      'SELECT tenant_id FROM orders WHERE id = $1',
      [orderId],
    );
    return rows[0]?.tenant_id ?? null;
  }

  async findById(
    tenantId: string,
    orderId: string,
    executor: SqlExecutor = this.db,
  ): Promise<Order | null> {
    const { rows } = await executor.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE tenant_id = $1 AND id = $2`,
      [tenantId, orderId],
    );
    return rows[0] ? toOrder(rows[0]) : null;
  }

  async insertHeader(
    tenantId: string,
    header: OrderHeader,
    executor: SqlExecutor = this.db,
  ): Promise<Order> {
    const placeholders = HEADER_COLUMNS.map((_, i) => `$${i + 2}`).join(', ');
    const { rows } = await executor.query<OrderRow>(
      `INSERT INTO orders (tenant_id, ${HEADER_COLUMNS.join(', ')})
       VALUES ($1, ${placeholders})
       RETURNING ${ORDER_COLUMNS}`,
      [tenantId, ...headerValues(header)],
    );
    const row = rows[0];
    if (!row) throw new Error('order insert returned no row');
    return toOrder(row);
  }

  async updateHeader(
    tenantId: string,
    orderId: string,
    header: OrderHeader,
    executor: SqlExecutor = this.db,
  ): Promise<Order | null> {
    const assignments = HEADER_COLUMNS.map(
      (column, i) => `${column} = $${i + 3}`,
    ).join(', ');
    const { rows } = await executor.query<OrderRow>(
      `UPDATE orders
          SET ${assignments}, updated_at = now()
        WHERE tenant_id = $1 AND id = $2
        RETURNING ${ORDER_COLUMNS}`,
      [tenantId, orderId, ...headerValues(header)],
    );
    return rows[0] ? toOrder(rows[0]) : null;
  }

  async insertItems(
    tenantId: string,
    orderId: string,
    items: readonly OrderItem[],
    executor: SqlExecutor = this.db,
  ): Promise<void> {
    if (items.length === 0) return;

    const width = 10;
    const values: unknown[] = [];
    const tuples = items.map((item, index) => {
      const base = index * width;
      values.push(
        orderId,
        tenantId,
        item.position,
        item.menuItemId,
        item.name,
        item.quantity,
        item.unitPrice,
        item.subtotal,
        item.note,
        JSON.stringify(item.variants),
      );
      const slots = Array.from({ length: width }, (_, i) => `$${base + i + 1}`);
      slots[width - 1] = `${slots[width - 1]}::jsonb`;
      return `(${slots.join(', ')})`;
    });

    await executor.query(
      `INSERT INTO order_items
         (order_id, tenant_id, position, menu_item_id, name, quantity, unit_price, subtotal, note, variants)
       VALUES ${tuples.join(', ')}`,
      values,
    );
  }

  async deleteItems(
    tenantId: string,
    orderId: string,
    executor: SqlExecutor = this.db,
  ): Promise<void> {
    await executor.query(
      'DELETE FROM order_items WHERE tenant_id = $1 AND order_id = $2',
      [tenantId, orderId],
    );
  }

  /** Records a settled card payment; null when the order was already paid. */
  async markPaid(
    tenantId: string,
    orderId: string,
    paymentReference: string,
  ): Promise<Order | null> {
    const { rows } = await this.db.query<OrderRow>(
      `UPDATE orders
          SET paid = true, status = 'confirmed', payment_reference = $3, updated_at = now()
        WHERE tenant_id = $1 AND id = $2 AND paid = false
        RETURNING ${ORDER_COLUMNS}`,
      [tenantId, orderId, paymentReference],
    );
    return rows[0] ? toOrder(rows[0]) : null;
  }
}
