// apps/api/src/common/log-context.ts
import { AsyncLocalStorage } from 'async_hooks';

/**
 * Per-request fields stamped onto every AppLogger line. The request id is
 * set when the request enters; the tenant is bound once it has been resolved.
 */
export interface LogContext {
  requestId?: string;
  tenantId?: string;
}

const storage = new AsyncLocalStorage<LogContext>();

export function runWithLogContext<T>(context: LogContext, fn: () => T): T {
  return storage.run({ ...context }, fn);
}

export function getLogContext(): LogContext | undefined {
  return storage.getStore();
}

/** No-op outside a request, e.g. in event listeners started after it. */
export function bindTenantToLogContext(tenantId: string): void {
  const store = storage.getStore();
  if (store) store.tenantId = tenantId;
}

export function formatLogPrefix(context: LogContext | undefined): string {
  if (!context?.requestId) return '';
  return context.tenantId
    ? `[reqId=${context.requestId} tenant=${context.tenantId}] `
    : `[reqId=${context.requestId}] `;
}
