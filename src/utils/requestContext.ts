/**
 * Request Context
 *
 * Uses Node.js `AsyncLocalStorage` to propagate request-scoped context
 * (the requestId) across the call chain without
 * passing it through every function signature.
 *
 * The webhook middleware sets the context at the start of each request and
 * the logger reads it so every log line carries the `requestId`.
 */

import { AsyncLocalStorage } from 'async_hooks';

export interface RequestContext {
  /** Unique identifier for the HTTP request. */
  requestId: string;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context, or `undefined` outside an HTTP request
 * (startup, queue workers).
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContext.getStore();
}
