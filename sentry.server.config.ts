/**
 * Sentry Server-Side Configuration
 * Tracks errors and performance on the server (Node.js runtime)
 */

import * as Sentry from '@sentry/nextjs';

const SENTRY_DSN = process.env.SENTRY_DSN;

if (SENTRY_DSN) {
  Sentry.init({
    dsn: SENTRY_DSN,

    environment: process.env.NODE_ENV,
    release: process.env.APP_RELEASE,

    // Performance monitoring - lower sample rate in production
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,

    // Client errors are answered at the route boundary and never reach here;
    // drop anything that still looks like one
    beforeSend(event, hint) {
      const error = hint.originalException;

      if (error instanceof Error && error.name === 'ValidationError') {
        return null;
      }

      return event;
    },

    // Don't track health check endpoints
    beforeSendTransaction(event) {
      if (event.transaction?.includes('/api/health')) {
        return null;
      }
      return event;
    },

    initialScope: {
      tags: {
        runtime: 'nodejs',
        service: 'trial-catalog',
      },
    },
  });
}
