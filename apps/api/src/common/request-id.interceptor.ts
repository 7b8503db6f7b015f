// apps/api/src/common/request-id.interceptor.ts
import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
  Logger,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { runWithLogContext } from './log-context';

export const REQUEST_ID_HEADER = 'x-request-id';

export function resolveRequestId(
  header: string | string[] | undefined,
): string {
  const raw = Array.isArray(header) ? header[0] : header;
  const trimmed = typeof raw === 'string' ? raw.trim() : '';
  return trimmed.length > 0 && trimmed.length <= 128 ? trimmed : randomUUID();
}

@Injectable()
export class RequestIdInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RequestIdInterceptor.name);

  intercept(
    context: ExecutionContext,
    next: CallHandler,
  ): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const httpCtx = context.switchToHttp();
    const request = httpCtx.getRequest<Request & { requestId?: string }>();
    const response = httpCtx.getResponse<Response>();

    const start = Date.now();
    const requestId = resolveRequestId(request.headers[REQUEST_ID_HEADER]);
    request.requestId = requestId;
    response.setHeader(REQUEST_ID_HEADER, requestId);

    const { method, url } = request;

    // subscribe inside the store so async handler code sees the request id
    return new Observable<unknown>((subscriber) =>
      runWithLogContext({ requestId }, () =>
        next
          .handle()
          .pipe(
            tap({
              next: () => {
                const ms = Date.now() - start;
                this.logger.log(
                  `[reqId=${requestId}] ${method} ${url} - ${response.statusCode} (${ms}ms)`,
                );
              },
              error: (err: unknown) => {
                const ms = Date.now() - start;
                this.logger.error(
                  `[reqId=${requestId}] ${method} ${url} - failed (${ms}ms)`,
                  err instanceof Error ? err.stack : undefined,
                );
              },
            }),
          )
          .subscribe(subscriber),
      ),
    );
  }
}
