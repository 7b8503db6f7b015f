// apps/api/src/orders/order-sequence.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { DateTime } from 'luxon';
import { orderError } from '../common/api-errors';
import { AppLogger } from '../common/app-logger';
import { ORDERING_CONFIG, type OrderingConfig } from '../config/ordering.config';
import type { SqlExecutor } from '../database/database.service';
import { isUniqueViolation } from '../database/pg-errors';
import { DailyCounterRepository } from './daily-counter.repository';

const ISO_DAY_RE = /^\d{4}-\d{2}-\d{2}$/;

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export function formatOrderNumber(day: string, value: number): string {
  return `${day.replace(/-/g, '')}-${String(value).padStart(4, '0')}`;
}

/**
 * Day-scoped order numbers (`YYYYMMDD-NNNN`). The counter row is the only
 * coordination point between concurrent callers; no locks are taken.
 */
@Injectable()
export class OrderSequenceService {
  private readonly logger = new AppLogger(OrderSequenceService.name);

  constructor(
    private readonly counters: DailyCounterRepository,
    @Inject(ORDERING_CONFIG) private readonly config: OrderingConfig,
  ) {}

  /** Calendar day of `at` (default now) in the order-number time zone. */
  calendarDay(at: Date | string = new Date()): string {
    const zone = this.config.orderNumbers.timeZone;
    if (typeof at === 'string') {
      if (ISO_DAY_RE.test(at)) return at;
      const parsed = DateTime.fromISO(at, { setZone: true });
      if (!parsed.isValid) {
        throw new Error(`Invalid date for order number: ${at}`);
      }
      return toIsoDay(parsed.setZone(zone));
    }
    return toIsoDay(DateTime.fromJSDate(at).setZone(zone));
  }

  /** Day a scheduled slot belongs to, else today. */
  dayForSlot(scheduledSlot?: string | null, now: Date = new Date()): string {
    return scheduledSlot ? this.calendarDay(scheduledSlot) : this.calendarDay(now);
  }

  /**
   * Allocates the next number for `day`. With `executor` the counter writes
   * join the caller's transaction, so a rolled-back order frees its number.
   */
  async next(day?: Date | string, executor?: SqlExecutor): Promise<string> {
    const isoDay = this.calendarDay(day);
    const value = await this.nextValue(isoDay, executor);
    return formatOrderNumber(isoDay, value);
  }

  async forSlot(scheduledSlot?: string | null, now?: Date): Promise<string> {
    return this.next(this.dayForSlot(scheduledSlot, now));
  }

  private async nextValue(day: string, executor?: SqlExecutor): Promise<number> {
    const { counterScope, maxAttempts, backoffMs } = this.config.orderNumbers;

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const bumped = await this.counters.increment(counterScope, day, executor);
      if (bumped !== null) return bumped;

      try {
        return await this.counters.insertFirst(counterScope, day, executor);
      } catch (error) {
        if (!isUniqueViolation(error)) throw error;
        // another caller created the row first; its update path is now open
        const delay = backoffMs * 2 ** attempt;
        this.logger.warn(
          `counter race scope=${counterScope} day=${day} attempt=${attempt + 1}/${maxAttempts} retryIn=${delay}ms`,
        );
        if (delay > 0) await sleep(delay);
      }
    }

    this.logger.error(
      `order number allocation exhausted scope=${counterScope} day=${day}`,
    );
    throw orderError('Could not allocate an order number');
  }
}

function toIsoDay(value: DateTime): string {
  return value.toFormat('yyyy-MM-dd');
}
