import type { PoolClient, QueryResultRow } from 'pg';
import { wrapDatabaseError } from '@/lib/errors';

export interface SqlQuery {
  text: string;
  values: unknown[];
}

/**
 * Minimal query surface the repositories need; one instance per acquired
 * connection.
 *
 * SECURITY INVARIANT: `text` must contain ONLY hard-coded SQL fragments.
 * Caller-supplied values travel in `values` as $N placeholders.
 */
export interface SqlExecutor {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<R[]>;
}

export function clientExecutor(client: PoolClient): SqlExecutor {
  return {
    async query<R extends QueryResultRow>(text: string, values: unknown[] = []): Promise<R[]> {
      const result = await client.query<R>(text, values);
      return result.rows;
    },
  };
}

/**
 * Run a query and translate driver failures into typed DataErrors
 */
export async function runQuery<R extends QueryResultRow>(
  executor: SqlExecutor,
  operation: string,
  query: SqlQuery
): Promise<R[]> {
  try {
    return await executor.query<R>(query.text, query.values);
  } catch (error) {
    throw wrapDatabaseError(error, operation);
  }
}
