/**
 * Shared plumbing for API route handlers: request context, identity,
 * body parsing and the error boundary.
 */

import type { NextRequest, NextResponse } from "next/server";
import { resolveViewer } from "@/auth";
import type { Viewer } from "@/auth";
import { handleApiError } from "@/lib/api-error-handler";
import { UnauthorizedError, ValidationError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import {
  createRequestContext,
  getRequestDuration,
  getRequestId,
  runWithRequestContext,
  updateRequestContext,
} from "@/lib/request-context";

/** Second argument Next.js passes to handlers of dynamic routes */
export interface RouteParams<P> {
  params: Promise<P>;
}

/**
 * Run a handler inside a request context. Every response, including error
 * responses, carries the request id.
 */
export function runRoute(
  request: NextRequest,
  route: string,
  handler: () => Promise<NextResponse>,
): Promise<NextResponse> {
  const method = request.method;

  return runWithRequestContext(createRequestContext(request, route), async () => {
    let response: NextResponse;
    try {
      response = await handler();
    } catch (error) {
      response = handleApiError(error, { route, method });
    }

    response.headers.set("x-request-id", getRequestId());
    await logger.info("Request completed", {
      status: response.status,
      durationMs: getRequestDuration(),
    });
    return response;
  });
}

/**
 * Viewer for routes that work anonymously too
 */
export async function optionalViewer(request: NextRequest): Promise<Viewer | null> {
  const viewer = await resolveViewer(request);
  if (viewer) {
    updateRequestContext({ userId: viewer.id });
  }
  return viewer;
}

/**
 * @throws UnauthorizedError when the request carries no valid session
 */
export async function requireViewer(request: NextRequest): Promise<Viewer> {
  const viewer = await optionalViewer(request);
  if (!viewer) {
    throw new UnauthorizedError();
  }
  return viewer;
}

/**
 * Parse a JSON request body. An empty body reads as `{}`.
 *
 * @throws ValidationError when the body is not valid JSON
 */
export async function readJsonBody(request: NextRequest): Promise<unknown> {
  const text = await request.text();
  if (!text.trim()) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
}
