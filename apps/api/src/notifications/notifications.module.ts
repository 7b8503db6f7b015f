import { Module } from '@nestjs/common';
import { ExpiringValueCache } from '../common/cache/expiring-value.cache';
import { ORDERING_CONFIG, type OrderingConfig } from '../config/ordering.config';
import { OrderPlacedListener } from './listeners/order-placed.listener';
import { HttpPushProvider } from './providers/http-push.provider';
import { LogPushProvider } from './providers/log-push.provider';
import { PushNotificationService } from './push-notification.service';
import { PUSH_PROVIDER, PUSH_TOKEN_CACHE, type PushProvider } from './push.provider';
import { StaffDevicesRepository } from './staff-devices.repository';

@Module({
  providers: [
    StaffDevicesRepository,
    PushNotificationService,
    OrderPlacedListener,
    HttpPushProvider,
    LogPushProvider,
    {
      provide: PUSH_TOKEN_CACHE,
      useFactory: () => new ExpiringValueCache<string>(),
    },
    {
      provide: PUSH_PROVIDER,
      useFactory: (
        config: OrderingConfig,
        http: HttpPushProvider,
        log: LogPushProvider,
      ): PushProvider => (config.push.provider === 'http' ? http : log),
      inject: [ORDERING_CONFIG, HttpPushProvider, LogPushProvider],
    },
  ],
  exports: [PushNotificationService],
})
export class NotificationsModule {}
