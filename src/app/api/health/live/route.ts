import { NextResponse } from 'next/server';

/**
 * Liveness probe - confirms the process is running
 *
 * This should ALWAYS return 200 while the process is up; draining is
 * reported by /api/health/ready instead.
 */
export async function GET() {
  return NextResponse.json(
    {
      status: 'alive',
      timestamp: new Date().toISOString(),
      version: process.env.APP_RELEASE?.slice(0, 7) || 'dev',
    },
    { status: 200 }
  );
}

export const dynamic = 'force-dynamic';
