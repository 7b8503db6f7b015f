// apps/api/src/rate-limit/rate-limiter.service.ts
import { Injectable } from '@nestjs/common';
import { AppLogger } from '../common/app-logger';
import { errToString } from '../common/utils/err-to-string';
import { RateLimitRepository } from './rate-limit.repository';

export type RateLimitDecision = {
  allowed: boolean;
  remaining: number;
  resetAt: Date;
  limit: number;
};

const MINUTE_MS = 60_000;
const RETENTION_MS = 24 * 60 * MINUTE_MS;

/** Fixed window containing `now`, aligned to multiples of the window length. */
export function currentWindow(
  now: Date,
  windowMinutes: number,
): { start: Date; end: Date } {
  const windowMs = windowMinutes * MINUTE_MS;
  const start = Math.floor(now.getTime() / windowMs) * windowMs;
  return { start: new Date(start), end: new Date(start + windowMs) };
}

/** Seconds a rejected caller should wait, never less than one. */
export function retryAfterSeconds(resetAt: Date, now: Date = new Date()): number {
  return Math.max(1, Math.ceil((resetAt.getTime() - now.getTime()) / 1000));
}

@Injectable()
export class RateLimiterService {
  private readonly logger = new AppLogger(RateLimiterService.name);

  constructor(private readonly limits: RateLimitRepository) {}

  /**
   * Admits or rejects one request for `identifier` on `endpoint`. Store
   * failures admit the request.
   */
  async check(
    identifier: string,
    endpoint: string,
    maxRequests: number,
    windowMinutes: number,
    now: Date = new Date(),
  ): Promise<RateLimitDecision> {
    const window = currentWindow(now, windowMinutes);

    let count: number | null;
    try {
      count = await this.limits.consume(
        identifier,
        endpoint,
        window.start,
        window.end,
        maxRequests,
      );
    } catch (error) {
      this.logger.warn(
        `rate limiter unavailable, admitting request identifier=${identifier} endpoint=${endpoint}: ${errToString(error)}`,
      );
      return {
        allowed: true,
        remaining: maxRequests,
        resetAt: window.end,
        limit: maxRequests,
      };
    }

    if (count === null) {
      this.logger.warn(
        `rate limit exceeded identifier=${identifier} endpoint=${endpoint} limit=${maxRequests}/${windowMinutes}m`,
      );
      void this.prune(now);
      return {
        allowed: false,
        remaining: 0,
        resetAt: window.end,
        limit: maxRequests,
      };
    }

    return {
      allowed: true,
      remaining: Math.max(0, maxRequests - count),
      resetAt: window.end,
      limit: maxRequests,
    };
  }

  private async prune(now: Date): Promise<void> {
    try {
      await this.limits.pruneEndedBefore(new Date(now.getTime() - RETENTION_MS));
    } catch (error) {
      this.logger.warn(`rate limit pruning failed: ${errToString(error)}`);
    }
  }
}
