/**
 * Extraction Context
 *
 * Carries a correlation ID (and the document being extracted, when known)
 * through a synchronous extraction call so every log line can be tied back
 * to it. Hosts open a context with runWithContext; the extractor adds the
 * document type with runWithDocumentType.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
  documentType?: string;
}

const contextStorage = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return contextStorage.getStore();
}

/**
 * Correlation ID of the current context, or a fresh ULID outside one
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return contextStorage.run(context, fn);
}

/**
 * Run `fn` with the document type attached to the current context.
 * Keeps the caller's correlation ID; starts a new one when there is none.
 */
export function runWithDocumentType<T>(documentType: string, fn: () => T): T {
  const parent = getContext();
  return contextStorage.run(
    {
      ...parent,
      correlationId: parent?.correlationId || ulid(),
      documentType,
    },
    fn
  );
}
