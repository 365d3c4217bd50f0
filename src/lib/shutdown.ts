/**
 * Graceful Shutdown Handler
 *
 * Handles cleanup on process termination signals (SIGTERM, SIGINT):
 * - Signals draining state to the readiness probe
 * - Flushes Sentry events
 * - Ends the database pool
 * - Ignores repeated signals while a shutdown is running
 */

import { logger, sanitizeErrorMessage } from './logger';

const shutdownLogger = logger.child({ component: 'shutdown' });

let isShuttingDown = false;
let shutdownPromise: Promise<void> | null = null;

const SHUTDOWN_TIMEOUT_MS = 8000;

/**
 * Used by the readiness probe to return 503 and stop receiving traffic.
 */
export function isInShutdownMode(): boolean {
  return isShuttingDown;
}

function withTimeout(task: Promise<unknown>, ms: number): Promise<unknown> {
  return Promise.race([task, new Promise((resolve) => setTimeout(resolve, ms).unref())]);
}

/**
 * 1. Mark as shutting down (readiness returns 503)
 * 2. Flush Sentry events
 * 3. End the database pool
 */
export async function performShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    shutdownLogger.sync.info('Already shutting down, ignoring signal', { signal });
    return shutdownPromise ?? undefined;
  }

  isShuttingDown = true;
  shutdownLogger.sync.info('Starting graceful shutdown', { signal });
  const startTime = Date.now();

  shutdownPromise = (async () => {
    try {
      const Sentry = await import('@sentry/nextjs');
      await withTimeout(Sentry.close(2000), 2500);
    } catch (error) {
      shutdownLogger.sync.warn('Sentry flush failed during shutdown', {
        error: sanitizeErrorMessage(error),
      });
    }

    try {
      const { closeAppServices } = await import('./services');
      await withTimeout(closeAppServices(), 3000);
    } catch (error) {
      shutdownLogger.sync.error('Database pool did not close cleanly', {
        error: sanitizeErrorMessage(error),
      });
    }

    shutdownLogger.sync.info('Graceful shutdown complete', { durationMs: Date.now() - startTime });
  })();

  // Force exit if cleanup hangs
  setTimeout(() => {
    shutdownLogger.sync.error('Shutdown timed out, forcing exit', { timeoutMs: SHUTDOWN_TIMEOUT_MS });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS).unref();

  await shutdownPromise;
}

const BENIGN_ERROR_CODES = new Set(['ECONNRESET', 'ECONNABORTED', 'EPIPE']);

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) {
    return undefined;
  }
  return typeof value.code === 'string' ? value.code : undefined;
}

/**
 * Register shutdown handlers once, from instrumentation.ts (Node.js runtime).
 */
export function registerShutdownHandlers(): void {
  // Prevent duplicate registration across hot reloads
  const SHUTDOWN_REGISTERED = Symbol.for('trial-catalog.shutdown.registered');
  const globalWithShutdown = globalThis as typeof globalThis & {
    [key: symbol]: boolean;
  };

  if (globalWithShutdown[SHUTDOWN_REGISTERED]) {
    return;
  }
  globalWithShutdown[SHUTDOWN_REGISTERED] = true;

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  for (const signal of signals) {
    process.on(signal, () => {
      void performShutdown(signal).then(() => process.exit(0));
    });
  }

  // Client disconnects mid-request are not fatal
  process.on('uncaughtException', (error) => {
    if (BENIGN_ERROR_CODES.has(errorCode(error) ?? '')) {
      return;
    }
    shutdownLogger.sync.error('Uncaught exception', { error: sanitizeErrorMessage(error) });
    void performShutdown('uncaughtException').then(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason) => {
    if (BENIGN_ERROR_CODES.has(errorCode(reason) ?? '')) {
      return;
    }
    shutdownLogger.sync.error('Unhandled rejection', { error: sanitizeErrorMessage(reason) });
    void performShutdown('unhandledRejection').then(() => process.exit(1));
  });

  shutdownLogger.sync.info('Shutdown handlers registered', { signals });
}
