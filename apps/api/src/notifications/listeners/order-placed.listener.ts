import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { AppLogger } from '../../common/app-logger';
import { errToString } from '../../common/utils/err-to-string';
import { ORDER_PLACED_EVENT, type OrderPlacedEvent } from '../../orders/types';
import { PushNotificationService } from '../push-notification.service';

@Injectable()
export class OrderPlacedListener {
  private readonly logger = new AppLogger(OrderPlacedListener.name);

  constructor(private readonly push: PushNotificationService) {}

  // never rethrows: a failed notification must not reach the order request
  @OnEvent(ORDER_PLACED_EVENT, { async: true })
  async handleOrderPlaced(event: OrderPlacedEvent): Promise<void> {
    try {
      await this.push.notifyOrderPlaced(event);
    } catch (error) {
      this.logger.error(
        `order push failed orderId=${event.orderId} tenantId=${event.tenantId}: ${errToString(error)}`,
      );
    }
  }
}
