import type { NextRequest } from "next/server";
import { getToken } from "next-auth/jwt";
import { serverEnv } from "@/lib/env";
import { logger, sanitizeErrorMessage } from "@/lib/logger";

/**
 * The caller behind a request. Sessions are issued by the identity service;
 * this service only verifies the token it hands out.
 */
export interface Viewer {
  id: string;
  email: string | null;
}

/**
 * Decode the session JWT from the session cookie or an
 * `Authorization: Bearer` header. Missing, expired or forged tokens all
 * resolve to an anonymous caller (null).
 */
export async function resolveViewer(request: NextRequest): Promise<Viewer | null> {
  try {
    const token = await getToken({ req: request, secret: serverEnv().NEXTAUTH_SECRET });
    if (!token?.sub) {
      return null;
    }
    return { id: token.sub, email: token.email ?? null };
  } catch (error) {
    logger.sync.warn("Session token could not be verified", {
      error: sanitizeErrorMessage(error),
    });
    return null;
  }
}
