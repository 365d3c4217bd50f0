/**
 * Next.js Instrumentation Hook
 * Initializes error tracking and shutdown handlers at server startup
 *
 * See: https://nextjs.org/docs/app/building-your-application/optimizing/instrumentation
 */

export async function register() {
  // The API runs on the Node.js runtime only (pg needs it)
  if (process.env.NEXT_RUNTIME === 'nodejs') {
    await import('./sentry.server.config');

    // Flush Sentry and end the database pool on SIGTERM/SIGINT
    const { registerShutdownHandlers } = await import('./src/lib/shutdown');
    registerShutdownHandlers();
  }
}
