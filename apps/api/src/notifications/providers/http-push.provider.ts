import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import { AppLogger } from '../../common/app-logger';
import { ExpiringValueCache } from '../../common/cache/expiring-value.cache';
import { errToString } from '../../common/utils/err-to-string';
import {
  ORDERING_CONFIG,
  type OrderingConfig,
  type PushConfig,
} from '../../config/ordering.config';
import {
  PUSH_TOKEN_CACHE,
  type PushMessage,
  type PushProvider,
  type PushSendResult,
} from '../push.provider';

type HttpPushConfig = Extract<PushConfig, { provider: 'http' }>;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
});

const SendResponseSchema = z.object({ name: z.string().optional() });

const DEFAULT_TOKEN_LIFETIME_S = 3600;

/** Refresh a minute early, but never keep a token for less than five. */
export function accessTokenTtlMs(expiresIn?: number): number {
  const seconds = expiresIn ?? DEFAULT_TOKEN_LIFETIME_S;
  return Math.max(seconds - 60, 300) * 1000;
}

function parseMessageName(text: string): string | undefined {
  if (!text) return undefined;
  try {
    const parsed = SendResponseSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.name : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Push gateway client: an OAuth client-credentials token, cached until
 * shortly before expiry, authorizes JSON message posts.
 */
@Injectable()
export class HttpPushProvider implements PushProvider {
  private readonly logger = new AppLogger(HttpPushProvider.name);

  constructor(
    @Inject(ORDERING_CONFIG) private readonly config: OrderingConfig,
    @Inject(PUSH_TOKEN_CACHE)
    private readonly tokens: ExpiringValueCache<string>,
  ) {}

  async send(message: PushMessage): Promise<PushSendResult> {
    const push = this.config.push;
    if (push.provider !== 'http') {
      return { ok: false, error: 'push gateway not configured' };
    }

    try {
      const accessToken = await this.tokens.getOrLoad(push.tokenUrl, () =>
        this.fetchAccessToken(push),
      );

      const response = await fetch(push.gatewayUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${accessToken}`,
        },
        body: JSON.stringify({
          message: {
            token: message.token,
            notification: { title: message.title, body: message.body },
            data: message.data,
          },
        }),
      });
      const text = await response.text();

      if (!response.ok) {
        if (response.status === 401) {
          this.tokens.delete(push.tokenUrl);
        }
        this.logger.warn(
          `push gateway rejected message status=${response.status} body=${text.slice(0, 200)}`,
        );
        return { ok: false, error: `push gateway responded ${response.status}` };
      }

      return { ok: true, providerMessageId: parseMessageName(text) };
    } catch (error) {
      this.logger.error(`push send failed: ${errToString(error)}`);
      return { ok: false, error: 'push send failed' };
    }
  }

  private async fetchAccessToken(push: HttpPushConfig) {
    const response = await fetch(push.tokenUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: push.clientId,
        client_secret: push.clientSecret,
      }).toString(),
    });
    const text = await response.text();
    if (!response.ok) {
      throw new Error(`token endpoint responded ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new Error('token endpoint returned invalid JSON');
    }
    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error('token endpoint returned no access token');
    }

    return {
      value: parsed.data.access_token,
      ttlMs: accessTokenTtlMs(parsed.data.expires_in),
    };
  }
}
