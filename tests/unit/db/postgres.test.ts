import { describe, it, expect, vi } from 'vitest'
import { PostgresDatabase, type ConnectionPool, type PooledConnection } from '../../../src/db/postgres.js'
import type { QueryResultLike } from '../../../src/db/pg-repository.js'
import { clientEntity } from '../../../src/modules/clients/client.entity.js'

const empty: QueryResultLike = { rows: [], rowCount: 0 }

function fakePool(options: { failOn?: string } = {}) {
  const statements: string[] = []
  const release = vi.fn()

  const query = vi.fn(async (text: string, _values?: unknown[]) => {
    statements.push(text)
    if (options.failOn && text.startsWith(options.failOn)) {
      throw new Error(`${options.failOn} failed`)
    }
    return empty
  })

  const connection: PooledConnection = { query, release }
  const pool: ConnectionPool = {
    query,
    connect: vi.fn(async () => connection),
    end: vi.fn(async () => undefined),
  }
  return { pool, statements, release }
}

describe('PostgresDatabase', () => {
  it('should commit a successful transaction and release the connection', async () => {
    const { pool, statements, release } = fakePool()
    const db = new PostgresDatabase(pool)

    const result = await db.transaction(async (session) => {
      await session.repository(clientEntity).count()
      return 'done'
    })

    expect(result).toBe('done')
    expect(statements).toEqual(['BEGIN', 'SELECT COUNT(*)::int AS count FROM "clients"', 'COMMIT'])
    expect(release).toHaveBeenCalledTimes(1)
    expect(release).toHaveBeenCalledWith(false)
  })

  it('should roll back and rethrow when the work fails', async () => {
    const { pool, statements, release } = fakePool()
    const db = new PostgresDatabase(pool)

    await expect(
      db.transaction(async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    expect(statements).toEqual(['BEGIN', 'ROLLBACK'])
    expect(release).toHaveBeenCalledTimes(1)
    expect(release).toHaveBeenCalledWith(false)
  })

  it('should rethrow the original error and discard the connection when the rollback also fails', async () => {
    const { pool, release } = fakePool({ failOn: 'ROLLBACK' })
    const db = new PostgresDatabase(pool)

    await expect(
      db.transaction(async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')
    expect(release).toHaveBeenCalledTimes(1)
    expect(release).toHaveBeenCalledWith(new Error('ROLLBACK failed'))
  })

  it('should report health from a trivial query', async () => {
    expect(await new PostgresDatabase(fakePool().pool).healthCheck()).toBe(true)
    expect(await new PostgresDatabase(fakePool({ failOn: 'SELECT 1' }).pool).healthCheck()).toBe(false)
  })

  it('should end the pool on close', async () => {
    const { pool } = fakePool()
    await new PostgresDatabase(pool).close()
    expect(pool.end).toHaveBeenCalledTimes(1)
  })
})
