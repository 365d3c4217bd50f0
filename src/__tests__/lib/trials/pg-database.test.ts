/**
 * Tests for connection and transaction handling of PgCatalogDatabase
 */

import type { Pool } from 'pg'
import { ConnectionError, NotFoundError, QueryError } from '@/lib/errors'
import { PgCatalogDatabase } from '@/lib/trials/pg/database'

function createClient() {
  return {
    query: jest.fn().mockResolvedValue({ rows: [] }),
    release: jest.fn(),
  }
}

function createPool(client: ReturnType<typeof createClient>) {
  return {
    connect: jest.fn().mockResolvedValue(client),
    query: jest.fn().mockResolvedValue({ rows: [{ '?column?': 1 }] }),
    end: jest.fn().mockResolvedValue(undefined),
  }
}

function setup() {
  const client = createClient()
  const pool = createPool(client)
  const database = new PgCatalogDatabase(pool as unknown as Pool)
  return { client, pool, database }
}

function statements(client: ReturnType<typeof createClient>): unknown[] {
  return client.query.mock.calls.map((call: unknown[]) => call[0])
}

describe('PgCatalogDatabase', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  describe('withSession', () => {
    it('runs repositories on the acquired client and releases it', async () => {
      const { client, database } = setup()
      client.query.mockResolvedValueOnce({ rows: [{ count: '7' }] })

      const total = await database.withSession((session) => session.trials.count({ predicates: [] }))

      expect(total).toBe(7)
      expect(client.release).toHaveBeenCalledTimes(1)
      expect(client.release).toHaveBeenCalledWith()
    })

    it('releases the client when the work fails', async () => {
      const { client, database } = setup()

      await expect(
        database.withSession(async () => {
          throw new Error('boom')
        })
      ).rejects.toThrow('boom')
      expect(client.release).toHaveBeenCalledTimes(1)
    })

    it('reports a failed connect as a connection error', async () => {
      const { pool, database } = setup()
      pool.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5432'))

      await expect(database.withSession(async () => 'unreachable')).rejects.toBeInstanceOf(
        ConnectionError
      )
    })
  })

  describe('withTransaction', () => {
    it('commits when the work succeeds', async () => {
      const { client, database } = setup()

      await expect(database.withTransaction(async () => 'done')).resolves.toBe('done')

      expect(statements(client)).toEqual(['BEGIN', 'COMMIT'])
      expect(client.release).toHaveBeenCalledWith(false)
    })

    it('rolls back and rethrows the original error', async () => {
      const { client, database } = setup()
      const failure = new NotFoundError('Trial not found')

      const error = await database
        .withTransaction(async () => {
          throw failure
        })
        .catch((e: unknown) => e)

      expect(error).toBe(failure)
      expect(statements(client)).toEqual(['BEGIN', 'ROLLBACK'])
      expect(client.release).toHaveBeenCalledWith(false)
    })

    it('discards the client when the rollback fails', async () => {
      const { client, database } = setup()
      client.query
        .mockResolvedValueOnce({ rows: [] })
        .mockRejectedValueOnce(new Error('connection lost'))

      await expect(
        database.withTransaction(async () => {
          throw new Error('write failed')
        })
      ).rejects.toThrow('write failed')
      expect(client.release).toHaveBeenCalledWith(true)
    })

    it('logs a failed rollback under the pg component', async () => {
      const { client, database } = setup()
      client.query
        .mockResolvedValueOnce({ rows: [] })
        .mockRejectedValueOnce(new Error('connection lost'))

      await database
        .withTransaction(async () => {
          throw new Error('write failed')
        })
        .catch(() => undefined)

      expect(console.error).toHaveBeenCalledWith(
        expect.any(String),
        'Transaction rollback failed',
        { component: 'pg', error: 'connection lost' }
      )
    })
  })

  it('pings through the pool', async () => {
    const { pool, database } = setup()

    await expect(database.ping()).resolves.toBeUndefined()
    expect(pool.query).toHaveBeenCalledWith('SELECT 1')
  })

  it('wraps ping failures', async () => {
    const { pool, database } = setup()
    pool.query.mockRejectedValueOnce(new Error('permission denied for table x'))

    await expect(database.ping()).rejects.toBeInstanceOf(QueryError)
  })

  it('ends the pool on close', async () => {
    const { pool, database } = setup()

    await database.close()

    expect(pool.end).toHaveBeenCalledTimes(1)
  })
})
