import { loadOrderingConfig } from '../config/ordering.config';
import { AmountBelowMinimumError, PaymentGatewayError } from './payment-gateway';
import {
  StripePaymentsService,
  encodeIntentParams,
} from './stripe-payments.service';

const ORIGINAL_FETCH = global.fetch;

function jsonResponse(status: number, body: unknown): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(JSON.stringify(body)),
  } as unknown as Response;
}

function getCall(fetchMock: jest.MockedFunction<typeof fetch>, index = 0) {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error('fetch was not called');
  const [url, init] = call;
  if (typeof url !== 'string') throw new Error('fetch url is not a string');
  return { url, init: init ?? {} };
}

describe('StripePaymentsService', () => {
  let fetchMock: jest.MockedFunction<typeof fetch>;
  let service: StripePaymentsService;

  beforeEach(() => {
    fetchMock = jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>();
    global.fetch = fetchMock as unknown as typeof fetch;
    service = new StripePaymentsService(
      loadOrderingConfig({
        STRIPE_SECRET_KEY: 'sk_test_placeholder',
        STRIPE_API_BASE: 'https://stripe.test/v1',
      }),
    );
    jest.spyOn(service['logger'], 'log').mockImplementation(() => undefined);
    jest.spyOn(service['logger'], 'warn').mockImplementation(() => undefined);
    jest.spyOn(service['logger'], 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    global.fetch = ORIGINAL_FETCH;
    jest.restoreAllMocks();
  });

  it('creates a payment intent with form-encoded metadata', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse(200, {
        id: 'pi_123',
        status: 'requires_payment_method',
        amount: 1250,
        currency: 'eur',
        client_secret: 'pi_123_secret_abc',
        metadata: { orderId: 'order-1' },
      }),
    );

    const result = await service.authorize({
      amountMinor: 1250,
      currency: 'eur',
      receiptEmail: 'ada@example.com',
      metadata: { userId: 'user-1', orderId: 'order-1', tenantId: 'tenant-1' },
    });

    expect(result).toEqual({
      clientSecret: 'pi_123_secret_abc',
      paymentIntentId: 'pi_123',
    });
    const { url, init } = getCall(fetchMock);
    expect(url).toBe('https://stripe.test/v1/payment_intents');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      Authorization: 'Bearer sk_test_placeholder',
      'Stripe-Version': '2023-10-16',
      'Content-Type': 'application/x-www-form-urlencoded',
    });
    const body = new URLSearchParams(String(init.body));
    expect(body.get('amount')).toBe('1250');
    expect(body.get('currency')).toBe('eur');
    expect(body.get('automatic_payment_methods[enabled]')).toBe('true');
    expect(body.get('receipt_email')).toBe('ada@example.com');
    expect(body.get('metadata[orderId]')).toBe('order-1');
    expect(body.get('metadata[tenantId]')).toBe('tenant-1');
  });

  it('rejects amounts below the minimum without calling the gateway', async () => {
    await expect(
      service.authorize({ amountMinor: 49, currency: 'eur', metadata: {} }),
    ).rejects.toBeInstanceOf(AmountBelowMinimumError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('surfaces the gateway error message', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse(402, {
        error: { message: 'Your card was declined.', code: 'card_declined' },
      }),
    );

    const error: unknown = await service
      .authorize({ amountMinor: 1000, currency: 'eur', metadata: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PaymentGatewayError);
    expect(error).toMatchObject({
      message: 'Your card was declined.',
      httpStatus: 402,
      gatewayCode: 'card_declined',
    });
  });

  it('wraps network failures', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNRESET'));

    await expect(
      service.authorize({ amountMinor: 1000, currency: 'eur', metadata: {} }),
    ).rejects.toThrow('payment gateway unreachable');
  });

  it('retrieves an intent with its metadata', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse(200, {
        id: 'pi_456',
        status: 'succeeded',
        amount: 900,
        currency: 'eur',
        client_secret: null,
        metadata: { orderId: 'order-2', tenantId: 'tenant-1' },
      }),
    );

    const intent = await service.retrieve('pi_456');

    expect(intent).toEqual({
      id: 'pi_456',
      status: 'succeeded',
      amountMinor: 900,
      currency: 'eur',
      metadata: { orderId: 'order-2', tenantId: 'tenant-1' },
    });
    const { url, init } = getCall(fetchMock);
    expect(url).toBe('https://stripe.test/v1/payment_intents/pi_456');
    expect(init.method).toBe('GET');
    expect(init.body).toBeUndefined();
  });

  it('refuses malformed intent ids', async () => {
    await expect(service.retrieve('../charges')).rejects.toThrow(
      'malformed payment intent id',
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails when no secret key is configured', async () => {
    const unconfigured = new StripePaymentsService(loadOrderingConfig({}));

    await expect(
      unconfigured.authorize({ amountMinor: 1000, currency: 'eur', metadata: {} }),
    ).rejects.toThrow('STRIPE_SECRET_KEY is not configured');
  });
});

describe('encodeIntentParams', () => {
  it('omits the receipt e-mail when absent', () => {
    expect(
      encodeIntentParams({
        amountMinor: 500,
        currency: 'eur',
        receiptEmail: null,
        metadata: { orderId: 'o-1' },
      }),
    ).toBe(
      'amount=500&currency=eur&automatic_payment_methods%5Benabled%5D=true&metadata%5BorderId%5D=o-1',
    );
  });
});
