/**
 * AsyncLocalStorage Context Management
 *
 * Carries a correlation ID and the document being parsed through every
 * log line emitted while a document is extracted.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
  sourceFilename?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Build a context for one document with a fresh correlation ID
 */
export function createDocumentContext(documentId?: string, sourceFilename?: string): RequestContext {
  return { correlationId: ulid(), documentId, sourceFilename };
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}
