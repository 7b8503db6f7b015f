import { Module } from '@nestjs/common';
import { PAYMENT_GATEWAY } from './payment-gateway';
import { StripePaymentsService } from './stripe-payments.service';

@Module({
  providers: [
    StripePaymentsService,
    { provide: PAYMENT_GATEWAY, useExisting: StripePaymentsService },
  ],
  exports: [PAYMENT_GATEWAY],
})
export class PaymentsModule {}
