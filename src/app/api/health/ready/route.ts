import { NextResponse } from 'next/server';
import { getAppServices } from '@/lib/services';
import { isInShutdownMode } from '@/lib/shutdown';
import { sanitizeErrorMessage } from '@/lib/logger';

/**
 * Readiness probe - confirms the application can serve traffic
 *
 * Returns 503 while draining (graceful shutdown) or when the database
 * does not answer.
 */
export async function GET() {
  if (isInShutdownMode()) {
    return NextResponse.json(
      {
        status: 'draining',
        timestamp: new Date().toISOString(),
      },
      { status: 503 }
    );
  }

  const checks: Record<string, { status: 'ok' | 'error'; latency?: number; error?: string }> = {};
  let healthy = true;

  const dbStart = Date.now();
  try {
    await getAppServices().database.ping();
    checks.database = { status: 'ok', latency: Date.now() - dbStart };
  } catch (error) {
    checks.database = {
      status: 'error',
      error: sanitizeErrorMessage(error),
    };
    healthy = false;
  }

  return NextResponse.json(
    {
      status: healthy ? 'ready' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: process.env.APP_RELEASE?.slice(0, 7) || 'dev',
      checks,
    },
    { status: healthy ? 200 : 503 }
  );
}

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';
