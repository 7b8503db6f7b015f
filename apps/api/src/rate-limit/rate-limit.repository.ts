import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';

@Injectable()
export class RateLimitRepository {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Counts one request against the window unless it is already full.
   * Returns the new count, or null when the window was full.
   */
  async consume(
    identifier: string,
    endpoint: string,
    windowStart: Date,
    windowEnd: Date,
    maxRequests: number,
  ): Promise<number | null> {
    const { rows } = await this.db.query<{ request_count: number }>(
      `INSERT INTO rate_limits (identifier, endpoint, window_start, window_end, request_count)
       VALUES ($1, $2, $3, $4, 1)
       ON CONFLICT (identifier, endpoint, window_start)
       DO UPDATE SET request_count = rate_limits.request_count + 1
         WHERE rate_limits.request_count < $5
       RETURNING request_count`,
      [identifier, endpoint, windowStart, windowEnd, maxRequests],
    );
    return rows[0] ? Number(rows[0].request_count) : null;
  }

  async pruneEndedBefore(cutoff: Date): Promise<number> {
    const result = await this.db.query(
      'DELETE FROM rate_limits WHERE window_end < $1',
      [cutoff],
    );
    return result.rowCount ?? 0;
  }
}
