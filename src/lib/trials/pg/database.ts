/**
 * PostgreSQL CatalogDatabase backed by a node-postgres Pool.
 *
 * Every request borrows one client for its whole unit of work and returns
 * it in `finally`. The pool is created by the composition root and ended
 * on shutdown.
 */

import { Pool } from 'pg';
import type { PoolClient } from 'pg';
import { logger, sanitizeErrorMessage } from '@/lib/logger';
import { wrapDatabaseError } from '@/lib/errors';
import type { ServerEnv } from '@/lib/env';
import type { CatalogDatabase, CatalogSession } from '../repository';
import { clientExecutor } from './executor';
import type { SqlExecutor } from './executor';
import { PgTrialRepository } from './trial-repository';
import { PgSavedTrialRepository } from './saved-trial-repository';
import { PgAlertRepository } from './alert-repository';
import { PgInterestRepository } from './interest-repository';

const dbLogger = logger.child({ component: 'pg' });

type PoolSettings = Pick<
  ServerEnv,
  'DATABASE_URL' | 'DATABASE_POOL_MAX' | 'DATABASE_STATEMENT_TIMEOUT_MS'
>;

export function createPool(settings: PoolSettings): Pool {
  const pool = new Pool({
    connectionString: settings.DATABASE_URL,
    max: settings.DATABASE_POOL_MAX,
    // Runaway search queries are cut off server-side
    statement_timeout: settings.DATABASE_STATEMENT_TIMEOUT_MS,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: 'trial-catalog',
  });

  // Idle clients can error when the server drops them; the pool discards them
  pool.on('error', (error) => {
    dbLogger.sync.error('Idle database client error', {
      error: sanitizeErrorMessage(error),
    });
  });

  return pool;
}

export function createSession(executor: SqlExecutor): CatalogSession {
  return {
    trials: new PgTrialRepository(executor),
    savedTrials: new PgSavedTrialRepository(executor),
    alerts: new PgAlertRepository(executor),
    interests: new PgInterestRepository(executor),
  };
}

export class PgCatalogDatabase implements CatalogDatabase {
  constructor(private readonly pool: Pool) {}

  async withSession<T>(fn: (session: CatalogSession) => Promise<T>): Promise<T> {
    const client = await this.acquire();
    try {
      return await fn(createSession(clientExecutor(client)));
    } finally {
      client.release();
    }
  }

  async withTransaction<T>(fn: (session: CatalogSession) => Promise<T>): Promise<T> {
    const client = await this.acquire();
    let discardClient = false;

    try {
      await client.query('BEGIN');
      const result = await fn(createSession(clientExecutor(client)));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        // Connection state is unknown; do not hand it back to the pool
        discardClient = true;
        dbLogger.sync.error('Transaction rollback failed', {
          error: sanitizeErrorMessage(rollbackError),
        });
      }
      throw error;
    } finally {
      client.release(discardClient);
    }
  }

  async ping(): Promise<void> {
    try {
      await this.pool.query('SELECT 1');
    } catch (error) {
      throw wrapDatabaseError(error, 'ping');
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async acquire(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      throw wrapDatabaseError(error, 'connect');
    }
  }
}
