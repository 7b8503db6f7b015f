import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { Pool, type ClientBase } from 'pg';
import { AppLogger } from '../common/app-logger';
import { errToString } from '../common/utils/err-to-string';
import { ORDERING_CONFIG, type OrderingConfig } from '../config/ordering.config';

/** Anything that can run a statement: the pool itself or a checked-out client. */
export type SqlExecutor = Pick<ClientBase, 'query'>;

@Injectable()
export class DatabaseService extends Pool implements OnModuleDestroy {
  private readonly logger = new AppLogger(DatabaseService.name);

  constructor(@Inject(ORDERING_CONFIG) config: OrderingConfig) {
    super({ connectionString: config.database.url, max: 10 });
    this.on('error', (err) => {
      this.logger.error(`idle client error: ${err.message}`, err.stack);
    });
  }

  /**
   * Runs `work` on one client between BEGIN and COMMIT. Any error rolls the
   * whole unit back and is rethrown.
   */
  async transaction<T>(work: (client: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.connect();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.error(
          `rollback failed: ${errToString(rollbackError)}`,
        );
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.end();
  }
}
