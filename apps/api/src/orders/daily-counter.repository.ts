import { Injectable } from '@nestjs/common';
import { DatabaseService, type SqlExecutor } from '../database/database.service';

const INSERT_SAVEPOINT = 'daily_counter_insert';

/**
 * Raw access to `daily_order_counters`. `day` is an ISO calendar date
 * (`YYYY-MM-DD`). Passing a transaction client ties the allocated value to
 * that transaction: a rollback returns it.
 */
@Injectable()
export class DailyCounterRepository {
  constructor(private readonly db: DatabaseService) {}

  /** Bumps an existing row; null when the day has no row yet. */
  async increment(
    scope: string,
    day: string,
    executor: SqlExecutor = this.db,
  ): Promise<number | null> {
    const { rows } = await executor.query<{ last_value: number }>(
      `UPDATE daily_order_counters
          SET last_value = last_value + 1
        WHERE scope = $1 AND day = $2::date
        RETURNING last_value`,
      [scope, day],
    );
    return rows[0] ? Number(rows[0].last_value) : null;
  }

  /**
   * Creates the day's row at 1. Raises a unique violation on a race; inside
   * a transaction the failed insert is rolled back to a savepoint so the
   * transaction stays usable for the retry.
   */
  async insertFirst(
    scope: string,
    day: string,
    executor: SqlExecutor = this.db,
  ): Promise<number> {
    if (executor === this.db) return this.insertRow(scope, day, executor);

    await executor.query(`SAVEPOINT ${INSERT_SAVEPOINT}`);
    try {
      const value = await this.insertRow(scope, day, executor);
      await executor.query(`RELEASE SAVEPOINT ${INSERT_SAVEPOINT}`);
      return value;
    } catch (error) {
      await executor.query(`ROLLBACK TO SAVEPOINT ${INSERT_SAVEPOINT}`);
      throw error;
    }
  }

  private async insertRow(
    scope: string,
    day: string,
    executor: SqlExecutor,
  ): Promise<number> {
    const { rows } = await executor.query<{ last_value: number }>(
      `INSERT INTO daily_order_counters (scope, day, last_value)
       VALUES ($1, $2::date, 1)
       RETURNING last_value`,
      [scope, day],
    );
    return rows[0] ? Number(rows[0].last_value) : 1;
  }
}
