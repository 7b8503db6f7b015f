import { loadOrderingConfig, validateEnv } from './ordering.config';

describe('ordering config', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadOrderingConfig({});

    expect(config.payments).toEqual({
      secretKey: undefined,
      apiBase: 'https://api.stripe.com/v1',
      apiVersion: '2023-10-16',
      currency: 'eur',
      minAmountMinor: 50,
    });
    expect(config.rateLimit.placeOrder).toEqual({
      maxRequests: 20,
      windowMinutes: 60,
    });
    expect(config.orderNumbers).toEqual({
      timeZone: 'Europe/Rome',
      counterScope: 'global',
      maxAttempts: 5,
      backoffMs: 20,
    });
    expect(config.push).toEqual({ provider: 'log' });
    expect(config.production).toBe(false);
    expect(config.port).toBe(4000);
  });

  it('coerces numeric values and treats blanks as unset', () => {
    const config = loadOrderingConfig({
      PLACE_ORDER_RATE_LIMIT_MAX: '5',
      PLACE_ORDER_RATE_LIMIT_WINDOW_MINUTES: '',
      PAYMENT_CURRENCY: 'USD',
      STRIPE_API_BASE: 'http://stripe.test/v1/',
      AUTH_JWT_SECRET: '  ',
    });

    expect(config.rateLimit.placeOrder).toEqual({
      maxRequests: 5,
      windowMinutes: 60,
    });
    expect(config.payments.currency).toBe('usd');
    expect(config.payments.apiBase).toBe('http://stripe.test/v1');
    expect(config.auth.jwtSecret).toBeUndefined();
  });

  it('rejects an unknown time zone', () => {
    expect(() => validateEnv({ ORDER_NUMBER_TIMEZONE: 'Mars/Olympus' })).toThrow(
      'ORDER_NUMBER_TIMEZONE: must be an IANA time zone',
    );
  });

  it('requires gateway settings for the http push provider', () => {
    expect(() => validateEnv({ PUSH_PROVIDER: 'http' })).toThrow(
      'PUSH_GATEWAY_URL: required when PUSH_PROVIDER=http',
    );

    const config = loadOrderingConfig({
      PUSH_PROVIDER: 'HTTP',
      PUSH_GATEWAY_URL: 'http://push.test/send',
      PUSH_TOKEN_URL: 'http://push.test/token',
      PUSH_CLIENT_ID: 'client',
      PUSH_CLIENT_SECRET: 'test-secret',
    });
    expect(config.push).toEqual({
      provider: 'http',
      gatewayUrl: 'http://push.test/send',
      tokenUrl: 'http://push.test/token',
      clientId: 'client',
      clientSecret: 'test-secret',
    });
  });
});
