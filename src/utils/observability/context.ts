import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const logContextStorage = new AsyncLocalStorage<LogContext>();

/**
 * Run `fn` with `context` merged over the enclosing context. Every record
 * logged inside, including from awaited calls, carries the merged fields.
 */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContextStorage.getStore() ?? {};
  return logContextStorage.run({ ...parent, ...context }, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}

export function createRunId(prefix = 'run'): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/**
 * Tag everything logged by `fn` with a run id. A run started inside another
 * run keeps the outer id.
 */
export function withRunContext<T>(fn: (runId: string) => T, prefix = 'replicate'): T {
  const runId = getLogContext().runId ?? createRunId(prefix);
  return withLogContext({ runId }, () => fn(runId));
}

/** Tag everything logged by `fn` with the batch being processed. */
export function withBatchContext<T>(batch: string, fn: () => T): T {
  return withLogContext({ batch }, fn);
}
