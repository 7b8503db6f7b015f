import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import { AppLogger } from '../common/app-logger';
import { ORDERING_CONFIG, type OrderingConfig } from '../config/ordering.config';
import { errToString } from '../common/utils/err-to-string';
import {
  AmountBelowMinimumError,
  PaymentGatewayError,
  type AuthorizePaymentParams,
  type PaymentAuthorization,
  type PaymentGateway,
  type PaymentIntentSummary,
} from './payment-gateway';

const PaymentIntentSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
  amount: z.number().int(),
  currency: z.string(),
  client_secret: z.string().nullish(),
  metadata: z.record(z.string()).default({}),
});

type StripePaymentIntent = z.infer<typeof PaymentIntentSchema>;

const StripeErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.string().optional(),
    type: z.string().optional(),
  }),
});

const PAYMENT_INTENT_ID_RE = /^pi_[A-Za-z0-9_]+$/;

export function encodeIntentParams(params: AuthorizePaymentParams): string {
  const body = new URLSearchParams();
  body.append('amount', String(params.amountMinor));
  body.append('currency', params.currency);
  body.append('automatic_payment_methods[enabled]', 'true');
  if (params.receiptEmail) {
    body.append('receipt_email', params.receiptEmail);
  }
  for (const [key, value] of Object.entries(params.metadata)) {
    body.append(`metadata[${key}]`, value);
  }
  return body.toString();
}

/**
 * Stripe PaymentIntents over plain HTTPS. Amounts are minor units; the
 * configured minimum is enforced before any call goes out.
 */
@Injectable()
export class StripePaymentsService implements PaymentGateway {
  private readonly logger = new AppLogger(StripePaymentsService.name);

  constructor(
    @Inject(ORDERING_CONFIG) private readonly config: OrderingConfig,
  ) {}

  get minimumAmountMinor(): number {
    return this.config.payments.minAmountMinor;
  }

  async authorize(
    params: AuthorizePaymentParams,
  ): Promise<PaymentAuthorization> {
    const minimum = this.minimumAmountMinor;
    if (!Number.isInteger(params.amountMinor) || params.amountMinor < minimum) {
      throw new AmountBelowMinimumError(params.amountMinor, minimum);
    }

    const intent = await this.request(
      'POST',
      '/payment_intents',
      encodeIntentParams(params),
    );
    if (!intent.client_secret) {
      throw new PaymentGatewayError('payment intent has no client secret');
    }

    this.logger.log(
      `payment intent created id=${intent.id} amount=${intent.amount} currency=${intent.currency} orderId=${params.metadata.orderId ?? '-'}`,
    );
    return { clientSecret: intent.client_secret, paymentIntentId: intent.id };
  }

  async retrieve(paymentIntentId: string): Promise<PaymentIntentSummary> {
    if (!PAYMENT_INTENT_ID_RE.test(paymentIntentId)) {
      throw new PaymentGatewayError('malformed payment intent id', 400);
    }
    const intent = await this.request(
      'GET',
      `/payment_intents/${encodeURIComponent(paymentIntentId)}`,
    );
    return {
      id: intent.id,
      status: intent.status,
      amountMinor: intent.amount,
      currency: intent.currency,
      metadata: intent.metadata,
    };
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body?: string,
  ): Promise<StripePaymentIntent> {
    const { secretKey, apiBase, apiVersion } = this.config.payments;
    if (!secretKey) {
      throw new PaymentGatewayError('STRIPE_SECRET_KEY is not configured');
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${secretKey}`,
      'Stripe-Version': apiVersion,
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    let response: Response;
    try {
      response = await fetch(`${apiBase}${path}`, { method, headers, body });
    } catch (error) {
      this.logger.error(
        `stripe request failed ${method} ${path}: ${errToString(error)}`,
      );
      throw new PaymentGatewayError('payment gateway unreachable');
    }

    const text = await response.text();
    let payload: unknown = null;
    try {
      payload = text ? JSON.parse(text) : null;
    } catch {
      payload = text;
    }

    if (!response.ok) {
      const parsedError = StripeErrorSchema.safeParse(payload);
      const message = parsedError.success
        ? parsedError.data.error.message ?? 'payment gateway error'
        : `payment gateway error (HTTP ${response.status})`;
      this.logger.warn(
        `stripe ${method} ${path} -> ${response.status}: ${message}`,
      );
      throw new PaymentGatewayError(
        message,
        response.status,
        parsedError.success ? parsedError.data.error.code : undefined,
      );
    }

    const parsed = PaymentIntentSchema.safeParse(payload);
    if (!parsed.success) {
      throw new PaymentGatewayError('unexpected payment gateway response');
    }
    return parsed.data;
  }
}
