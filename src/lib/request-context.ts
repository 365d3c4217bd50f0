/**
 * Request context management using AsyncLocalStorage
 * Provides request-scoped context (request ID, viewer ID, route) for logging
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContext {
  requestId: string;
  userId?: string;
  startTime: number;
  path?: string;
  method?: string;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

// Incoming ids are echoed back in responses, so only accept short token-like values
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Use the caller's request id when it looks sane, otherwise mint a UUID
 */
export function generateRequestId(existingId?: string | null): string {
  if (existingId && REQUEST_ID_PATTERN.test(existingId)) {
    return existingId;
  }
  return randomUUID();
}

/**
 * Run a function within a request context
 *
 * @example
 * ```ts
 * return runWithRequestContext(createRequestContext(request, '/api/trials'), async () => {
 *   await logger.info('Searching trials');
 * });
 * ```
 */
export function runWithRequestContext<T>(
  context: Partial<RequestContext>,
  fn: () => T
): T {
  const fullContext: RequestContext = {
    requestId: context.requestId || generateRequestId(),
    userId: context.userId,
    startTime: context.startTime || Date.now(),
    path: context.path,
    method: context.method,
  };

  return requestContextStorage.run(fullContext, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * Update the current request context, e.g. once the viewer is known
 */
export function updateRequestContext(updates: Partial<RequestContext>): void {
  const current = requestContextStorage.getStore();
  if (current) {
    Object.assign(current, updates);
  }
}

/**
 * Returns 'unknown' outside of a request context
 */
export function getRequestId(): string {
  return getRequestContext()?.requestId || 'unknown';
}

export function getRequestDuration(): number {
  const context = getRequestContext();
  return context ? Date.now() - context.startTime : 0;
}

/**
 * Build the context for a route handler invocation
 */
export function createRequestContext(
  request: { headers: Pick<Headers, 'get'>; method?: string },
  route: string
): Partial<RequestContext> {
  return {
    requestId: generateRequestId(request.headers.get('x-request-id')),
    startTime: Date.now(),
    path: route,
    method: request.method,
  };
}
