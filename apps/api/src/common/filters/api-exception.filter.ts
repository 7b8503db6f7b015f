import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Response } from 'express';
import { AppLogger } from '../app-logger';

export type ErrorEnvelope = {
  code: string;
  message: string;
  details: unknown;
};

type NormalizedException = {
  status: number;
  body: ErrorEnvelope;
  retryAfterSeconds?: number;
};

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new AppLogger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();

    const { status, body, retryAfterSeconds } =
      this.normalizeException(exception);

    if (status >= 500) {
      this.logger.error(
        `${body.code}: ${body.message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    if (retryAfterSeconds !== undefined) {
      res.setHeader('Retry-After', String(retryAfterSeconds));
    }
    res.status(status).json(body);
  }

  normalizeException(exception: unknown): NormalizedException {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const response = exception.getResponse();
      const message = this.extractMessage(exception.message, response);
      const details = this.extractDetails(response);
      const code = this.extractCode(response, status);

      return {
        status,
        body: { code, message, details },
        retryAfterSeconds: this.extractRetryAfter(details),
      };
    }

    const message =
      exception instanceof Error ? exception.message : 'Internal server error';
    const details =
      process.env.NODE_ENV === 'production'
        ? null
        : exception instanceof Error
          ? { stack: exception.stack }
          : { received: exception };

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        code: 'INTERNAL_SERVER_ERROR',
        message,
        details,
      },
    };
  }

  private extractMessage(defaultMessage: string, response: unknown): string {
    if (typeof response === 'string') return response;
    if (isRecord(response) && typeof response.message !== 'undefined') {
      const raw = response.message;
      if (Array.isArray(raw)) {
        return raw.map((item) => String(item)).join('; ');
      }
      if (typeof raw === 'string') return raw;
      return JSON.stringify(raw);
    }
    return defaultMessage;
  }

  private extractDetails(response: unknown): unknown {
    if (!isRecord(response)) return null;
    const { message, code: _code, statusCode: _statusCode, error: _error, ...rest } =
      response;
    if (Array.isArray(message) && message.length > 0) {
      return { message, ...rest };
    }
    return Object.keys(rest).length > 0 ? rest : null;
  }

  private extractCode(response: unknown, status: number): string {
    if (isRecord(response) && typeof response.code === 'string') {
      return response.code;
    }
    // class-validator failures carry a message array and no code
    if (
      status === HttpStatus.BAD_REQUEST &&
      isRecord(response) &&
      Array.isArray(response.message)
    ) {
      return 'validation_failed';
    }
    return `HTTP_${status}`;
  }

  private extractRetryAfter(details: unknown): number | undefined {
    if (!isRecord(details)) return undefined;
    const value = details.retryAfter;
    return typeof value === 'number' && Number.isFinite(value)
      ? value
      : undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
