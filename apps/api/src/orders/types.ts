import type {
  OrderStatus,
  OrderType,
  PaymentMethod,
  PlaceOrderInput,
} from '@shared/order';

export interface OrderItem {
  position: number;
  menuItemId: string;
  name: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
  note: string | null;
  variants: Record<string, unknown>;
}

/** Columns written on create and replaced on edit. */
export interface OrderHeader {
  customerId: string | null;
  cashierCustomerId: string | null;
  orderNumber: string;
  status: OrderStatus;
  orderType: OrderType;
  customerName: string;
  customerPhone: string;
  customerEmail: string | null;
  deliveryAddress: string | null;
  deliveryCity: string | null;
  deliveryPostalCode: string | null;
  deliveryLatitude: number | null;
  deliveryLongitude: number | null;
  zone: string | null;
  note: string | null;
  subtotal: number;
  deliveryFee: number;
  discount: number;
  total: number;
  paymentMethod: PaymentMethod;
  paid: boolean;
  paymentReference: string | null;
  scheduledSlot: Date | null;
}

export interface Order extends OrderHeader {
  id: string;
  tenantId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface OrderWithItems extends Order {
  items: OrderItem[];
}

export type SaveMode = 'create' | 'update';

export type PlaceOrderCommand = PlaceOrderInput;

/** Payload of the in-process `order.placed` event. */
export type OrderPlacedEvent = {
  orderId: string;
  tenantId: string;
  orderNumber: string;
  total: number;
  status: OrderStatus;
  orderType: OrderType;
  mode: SaveMode;
  customerName: string;
};

export const ORDER_PLACED_EVENT = 'order.placed';
