/**
 * AsyncLocalStorage Context Management
 *
 * A run opens a root context; every document task and queue job runs in a
 * child context that inherits the run id and adds its own correlation id,
 * document and strategy.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';
import type { StrategyKind } from './types';

export interface RequestContext {
  correlationId: string;
  runId?: string;
  documentId?: string;
  strategy?: StrategyKind;
  jobId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Correlation ID of the current context, or a fresh one outside any context
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId ?? ulid();
}

export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run fn in a child of the current context. Fields not given are inherited;
 * the child gets a new correlation ID unless one is given.
 */
export async function runInChildContext<T>(
  fields: Partial<RequestContext>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  return asyncLocalStorage.run(
    { ...parent, ...fields, correlationId: fields.correlationId ?? ulid() },
    fn
  );
}

export { asyncLocalStorage };
