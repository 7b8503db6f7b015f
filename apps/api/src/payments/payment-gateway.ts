export const PAYMENT_GATEWAY = Symbol('PAYMENT_GATEWAY');

export type PaymentMetadata = Record<string, string>;

export type AuthorizePaymentParams = {
  amountMinor: number;
  currency: string;
  receiptEmail?: string | null;
  metadata: PaymentMetadata;
};

export type PaymentAuthorization = {
  clientSecret: string;
  paymentIntentId: string;
};

export type PaymentIntentSummary = {
  id: string;
  status: string;
  amountMinor: number;
  currency: string;
  metadata: PaymentMetadata;
};

/** Card authorization against an external gateway. */
export interface PaymentGateway {
  readonly minimumAmountMinor: number;
  authorize(params: AuthorizePaymentParams): Promise<PaymentAuthorization>;
  retrieve(paymentIntentId: string): Promise<PaymentIntentSummary>;
}

export class PaymentGatewayError extends Error {
  constructor(
    message: string,
    readonly httpStatus?: number,
    readonly gatewayCode?: string,
  ) {
    super(message);
    this.name = 'PaymentGatewayError';
  }
}

export class AmountBelowMinimumError extends Error {
  constructor(
    readonly amountMinor: number,
    readonly minimumMinor: number,
  ) {
    super(`amount ${amountMinor} is below the minimum of ${minimumMinor}`);
    this.name = 'AmountBelowMinimumError';
  }
}
