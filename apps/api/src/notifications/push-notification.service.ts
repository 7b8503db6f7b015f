import { Inject, Injectable } from '@nestjs/common';
import { AppLogger } from '../common/app-logger';
import type { OrderPlacedEvent } from '../orders/types';
import {
  PUSH_PROVIDER,
  type PushMessage,
  type PushProvider,
} from './push.provider';
import { StaffDevicesRepository } from './staff-devices.repository';

export type PushDeliverySummary = { sent: number; failed: number };

const ORDER_TYPE_LABELS: Record<OrderPlacedEvent['orderType'], string> = {
  delivery: 'Delivery',
  takeaway: 'Takeaway',
  dine_in: 'Dine-in',
};

export function orderPlacedContent(
  event: OrderPlacedEvent,
): Omit<PushMessage, 'token'> {
  const title =
    event.mode === 'update'
      ? `Order ${event.orderNumber} updated`
      : `New order ${event.orderNumber}`;
  return {
    title,
    body: `${event.customerName} · ${ORDER_TYPE_LABELS[event.orderType]} · ${event.total.toFixed(2)}`,
    data: {
      type: event.mode === 'update' ? 'order_updated' : 'new_order',
      orderId: event.orderId,
      tenantId: event.tenantId,
      orderNumber: event.orderNumber,
      status: event.status,
    },
  };
}

@Injectable()
export class PushNotificationService {
  private readonly logger = new AppLogger(PushNotificationService.name);

  constructor(
    @Inject(PUSH_PROVIDER) private readonly provider: PushProvider,
    private readonly devices: StaffDevicesRepository,
  ) {}

  async notifyOrderPlaced(event: OrderPlacedEvent): Promise<PushDeliverySummary> {
    const tokens = await this.devices.findStaffPushTokens(event.tenantId);
    if (tokens.length === 0) {
      this.logger.debug(
        `no staff devices for tenantId=${event.tenantId} orderId=${event.orderId}`,
      );
      return { sent: 0, failed: 0 };
    }

    const content = orderPlacedContent(event);
    const results = await Promise.all(
      tokens.map((token) => this.provider.send({ token, ...content })),
    );

    const sent = results.filter((result) => result.ok).length;
    const summary = { sent, failed: results.length - sent };
    this.logger.log(
      `order push orderId=${event.orderId} tenantId=${event.tenantId} sent=${summary.sent} failed=${summary.failed}`,
    );
    return summary;
  }
}
