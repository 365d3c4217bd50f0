/**
 * Composition root: builds the connection pool and every service from
 * validated environment, once per process.
 *
 * Route handlers call getAppServices(); the shutdown handler calls
 * closeAppServices(). Nothing else holds the pool.
 */

import { serverEnv } from './env';
import type { ServerEnv } from './env';
import { logger } from './logger';
import { createPool, PgCatalogDatabase } from './trials/pg/database';
import type { CatalogDatabase } from './trials/repository';
import { buildTrialServices } from './trials/services';
import type { TrialServices } from './trials/services';

export interface AppServices extends TrialServices {
  database: CatalogDatabase;
}

export function createAppServices(env: ServerEnv): AppServices {
  const database = new PgCatalogDatabase(createPool(env));
  return { database, ...buildTrialServices(database) };
}

// Survives Next.js dev hot reloads, which re-evaluate this module
const globalForServices = globalThis as unknown as {
  appServices: AppServices | undefined;
};

export function getAppServices(): AppServices {
  if (!globalForServices.appServices) {
    globalForServices.appServices = createAppServices(serverEnv());
    logger.sync.info('Application services initialized');
  }
  return globalForServices.appServices;
}

export async function closeAppServices(): Promise<void> {
  const services = globalForServices.appServices;
  if (!services) {
    return;
  }
  globalForServices.appServices = undefined;
  await services.database.close();
}
