import { IsOptional, IsString, IsUUID, Matches } from 'class-validator';

export class PaymentRetryDto {
  @IsOptional()
  @IsUUID()
  tenantId?: string;
}

export class VerifyPaymentDto {
  @IsString()
  @Matches(/^pi_[A-Za-z0-9_]+$/, {
    message: 'paymentIntentId must be a payment intent id',
  })
  paymentIntentId!: string;

  @IsOptional()
  @IsUUID()
  tenantId?: string;
}
