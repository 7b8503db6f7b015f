import { Module } from '@nestjs/common';
import { BearerAuthGuard } from '../auth/bearer-auth.guard';
import { CatalogModule } from '../catalog/catalog.module';
import { PaymentsModule } from '../payments/payments.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { TenantsModule } from '../tenants/tenants.module';
import { DailyCounterRepository } from './daily-counter.repository';
import { OrderPaymentsService } from './order-payments.service';
import { OrderPersistenceService } from './order-persistence.service';
import { OrderSequenceService } from './order-sequence.service';
import { OrdersController } from './orders.controller';
import { OrdersRepository } from './orders.repository';
import { PlaceOrderService } from './place-order.service';

@Module({
  imports: [TenantsModule, CatalogModule, RateLimitModule, PaymentsModule],
  controllers: [OrdersController],
  providers: [
    BearerAuthGuard,
    DailyCounterRepository,
    OrdersRepository,
    OrderSequenceService,
    OrderPersistenceService,
    OrderPaymentsService,
    PlaceOrderService,
  ],
})
export class OrdersModule {}
