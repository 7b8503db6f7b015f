// apps/api/src/common/app-logger.ts
import { Logger } from '@nestjs/common';
import { formatLogPrefix, getLogContext } from './log-context';

/**
 * Nest logger that stamps the request id, and the tenant once known, onto
 * string messages. Lines already carrying a `[reqId=` prefix pass through.
 */
export class AppLogger extends Logger {
  private withContext(message: unknown): unknown {
    if (typeof message !== 'string' || message.startsWith('[reqId=')) {
      return message;
    }
    const prefix = formatLogPrefix(getLogContext());
    return prefix ? `${prefix}${message}` : message;
  }

  log(message: unknown, ...optionalParams: unknown[]) {
    super.log(this.withContext(message), ...optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    super.error(this.withContext(message), ...optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    super.warn(this.withContext(message), ...optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    super.debug(this.withContext(message), ...optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]) {
    super.verbose(this.withContext(message), ...optionalParams);
  }
}
