import { Injectable } from '@nestjs/common';
import { getApiPrefix } from './app.bootstrap';
import { serviceUnavailable } from './common/api-errors';
import { AppLogger } from './common/app-logger';
import { errToString } from './common/utils/err-to-string';
import { DatabaseService } from './database/database.service';

export const SERVICE_NAME = 'pizzeria-order-api';

export type ServiceInfo = { service: string; version: string };

export type HealthReport = {
  status: 'ok';
  database: 'up';
  timestamp: string;
};

@Injectable()
export class AppService {
  private readonly logger = new AppLogger(AppService.name);

  constructor(private readonly db: DatabaseService) {}

  root(): ServiceInfo {
    return { service: SERVICE_NAME, version: getApiPrefix() };
  }

  /** Pings the database; a failed ping answers 503. */
  async health(now: () => Date = () => new Date()): Promise<HealthReport> {
    try {
      await this.db.query('SELECT 1');
    } catch (error) {
      this.logger.warn(`health check: database unreachable: ${errToString(error)}`);
      throw serviceUnavailable('Database is unreachable', { database: 'down' });
    }
    return { status: 'ok', database: 'up', timestamp: now().toISOString() };
  }
}
