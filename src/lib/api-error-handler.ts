import * as Sentry from '@sentry/nextjs';
import { logger, sanitizeErrorMessage } from '@/lib/logger';
import { NextResponse } from 'next/server';
import { getRequestId } from '@/lib/request-context';
import { isDataError, isRequestError } from '@/lib/errors';

/**
 * Shared API error handler that captures to Sentry and logs structured error.
 * Use in catch blocks of all API route handlers.
 */
export function captureApiError(
  error: unknown,
  context: { route: string; method: string; userId?: string }
): NextResponse {
  if (isDataError(error)) {
    // Carries its own code, retryability and cause
    error.log({
      route: context.route,
      method: context.method,
      userId: context.userId,
      requestId: getRequestId(),
    });
  } else {
    logger.sync.error(`API error in ${context.route}`, {
      error: sanitizeErrorMessage(error),
      method: context.method,
      userId: context.userId,
      requestId: getRequestId(),
    });
  }

  Sentry.captureException(error, {
    tags: {
      route: context.route,
      method: context.method,
    },
    extra: {
      requestId: getRequestId(),
    },
  });

  return NextResponse.json(
    { error: 'Internal server error' },
    { status: 500 }
  );
}

/**
 * Client errors (validation, auth, not-found, conflict) answer with their
 * own status and message; anything else is captured and becomes a 500.
 */
export function handleApiError(
  error: unknown,
  context: { route: string; method: string; userId?: string }
): NextResponse {
  if (isRequestError(error)) {
    return NextResponse.json({ error: error.message }, { status: error.status });
  }
  return captureApiError(error, context);
}
