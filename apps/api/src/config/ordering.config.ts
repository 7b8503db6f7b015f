// apps/api/src/config/ordering.config.ts
import { IANAZone } from 'luxon';
import { z } from 'zod';

export const ORDERING_CONFIG = Symbol('ORDERING_CONFIG');

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(
  blankToUndefined,
  z.string().trim().min(1).optional(),
);

const optionalUrl = z.preprocess(
  blankToUndefined,
  z.string().trim().url().optional(),
);

const positiveInt = (fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(fallback),
  );

const nonNegativeInt = (fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().nonnegative().default(fallback),
  );

export const EnvSchema = z
  .object({
    NODE_ENV: optionalString,
    PORT: positiveInt(4000),
    DATABASE_URL: optionalString,
    AUTH_JWT_SECRET: optionalString,

    STRIPE_SECRET_KEY: optionalString,
    STRIPE_API_BASE: z.preprocess(
      blankToUndefined,
      z.string().trim().url().default('https://api.stripe.com/v1'),
    ),
    STRIPE_API_VERSION: z.preprocess(
      blankToUndefined,
      z.string().trim().default('2023-10-16'),
    ),
    PAYMENT_CURRENCY: z.preprocess(
      blankToUndefined,
      z
        .string()
        .trim()
        .regex(/^[a-zA-Z]{3}$/, 'must be a three-letter currency code')
        .default('eur')
        .transform((code) => code.toLowerCase()),
    ),
    PAYMENT_MIN_AMOUNT_MINOR: positiveInt(50),

    PLACE_ORDER_RATE_LIMIT_MAX: positiveInt(20),
    PLACE_ORDER_RATE_LIMIT_WINDOW_MINUTES: positiveInt(60),

    ORDER_NUMBER_TIMEZONE: z.preprocess(
      blankToUndefined,
      z
        .string()
        .trim()
        .default('Europe/Rome')
        .refine((zone) => IANAZone.isValidZone(zone), {
          message: 'must be an IANA time zone',
        }),
    ),
    ORDER_COUNTER_SCOPE: z.preprocess(
      blankToUndefined,
      z.string().trim().max(64).default('global'),
    ),
    ORDER_COUNTER_MAX_ATTEMPTS: positiveInt(5),
    ORDER_COUNTER_BACKOFF_MS: nonNegativeInt(20),

    PUSH_PROVIDER: z.preprocess(
      (value) =>
        typeof value === 'string' ? value.trim().toLowerCase() || undefined : value,
      z.enum(['log', 'http']).default('log'),
    ),
    PUSH_GATEWAY_URL: optionalUrl,
    PUSH_TOKEN_URL: optionalUrl,
    PUSH_CLIENT_ID: optionalString,
    PUSH_CLIENT_SECRET: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.PUSH_PROVIDER !== 'http') return;
    for (const key of [
      'PUSH_GATEWAY_URL',
      'PUSH_TOKEN_URL',
      'PUSH_CLIENT_ID',
      'PUSH_CLIENT_SECRET',
    ] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'required when PUSH_PROVIDER=http',
        });
      }
    }
  });

export type Env = z.infer<typeof EnvSchema>;

/** Used as `ConfigModule.forRoot({ validate })`; throws on bad settings. */
export function validateEnv(raw: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

export type PushConfig =
  | { provider: 'log' }
  | {
      provider: 'http';
      gatewayUrl: string;
      tokenUrl: string;
      clientId: string;
      clientSecret: string;
    };

export type OrderingConfig = {
  production: boolean;
  port: number;
  auth: { jwtSecret?: string };
  database: { url?: string };
  payments: {
    secretKey?: string;
    apiBase: string;
    apiVersion: string;
    currency: string;
    minAmountMinor: number;
  };
  rateLimit: {
    placeOrder: { maxRequests: number; windowMinutes: number };
  };
  orderNumbers: {
    timeZone: string;
    counterScope: string;
    maxAttempts: number;
    backoffMs: number;
  };
  push: PushConfig;
};

export function toOrderingConfig(env: Env): OrderingConfig {
  let push: PushConfig = { provider: 'log' };
  if (
    env.PUSH_PROVIDER === 'http' &&
    env.PUSH_GATEWAY_URL &&
    env.PUSH_TOKEN_URL &&
    env.PUSH_CLIENT_ID &&
    env.PUSH_CLIENT_SECRET
  ) {
    push = {
      provider: 'http',
      gatewayUrl: env.PUSH_GATEWAY_URL,
      tokenUrl: env.PUSH_TOKEN_URL,
      clientId: env.PUSH_CLIENT_ID,
      clientSecret: env.PUSH_CLIENT_SECRET,
    };
  }

  return {
    production: env.NODE_ENV === 'production',
    port: env.PORT,
    auth: { jwtSecret: env.AUTH_JWT_SECRET },
    database: { url: env.DATABASE_URL },
    payments: {
      secretKey: env.STRIPE_SECRET_KEY,
      apiBase: env.STRIPE_API_BASE.replace(/\/+$/, ''),
      apiVersion: env.STRIPE_API_VERSION,
      currency: env.PAYMENT_CURRENCY,
      minAmountMinor: env.PAYMENT_MIN_AMOUNT_MINOR,
    },
    rateLimit: {
      placeOrder: {
        maxRequests: env.PLACE_ORDER_RATE_LIMIT_MAX,
        windowMinutes: env.PLACE_ORDER_RATE_LIMIT_WINDOW_MINUTES,
      },
    },
    orderNumbers: {
      timeZone: env.ORDER_NUMBER_TIMEZONE,
      counterScope: env.ORDER_COUNTER_SCOPE,
      maxAttempts: env.ORDER_COUNTER_MAX_ATTEMPTS,
      backoffMs: env.ORDER_COUNTER_BACKOFF_MS,
    },
    push,
  };
}

export function loadOrderingConfig(
  raw: Record<string, unknown> = process.env,
): OrderingConfig {
  return toOrderingConfig(validateEnv(raw));
}
