// apps/api/src/app.module.ts
import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';

import { AppController } from './app.controller';
import { AppService } from './app.service';

import { RequestIdInterceptor } from './common/request-id.interceptor';
import { OrderingConfigModule } from './config/config.module';
import { validateEnv } from './config/ordering.config';
import { DatabaseModule } from './database/database.module';
import { NotificationsModule } from './notifications/notifications.module';
import { OrdersModule } from './orders/orders.module';

const envConfigModule = ConfigModule.forRoot({
  isGlobal: true,
  envFilePath: ['apps/api/.env', '.env'],
  expandVariables: true,
  validate: validateEnv,
});

@Module({
  imports: [
    envConfigModule,
    OrderingConfigModule,
    DatabaseModule,
    EventEmitterModule.forRoot(),
    OrdersModule,
    NotificationsModule,
  ],
  controllers: [AppController],
  providers: [
    AppService,
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestIdInterceptor,
    },
  ],
})
export class AppModule {}
