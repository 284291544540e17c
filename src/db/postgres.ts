import pg from 'pg'
import type { Database, Repository, Session } from './database.js'
import type { Entity, EntityDefinition } from './entity.js'
import { PgRepository, type Queryable } from './pg-repository.js'
import { getEnv } from '../config/env.js'
import * as log from '../lib/logger.js'

export interface PooledConnection extends Queryable {
  /** A truthy argument destroys the connection instead of returning it to the pool */
  release(destroy?: Error | boolean): void
}

export interface ConnectionPool extends Queryable {
  connect(): Promise<PooledConnection>
  end(): Promise<void>
}

class PgSession implements Session {
  constructor(private readonly client: Queryable) {}

  repository<T extends Entity>(definition: EntityDefinition<T>): Repository<T> {
    return new PgRepository(definition, this.client)
  }
}

export class PostgresDatabase implements Database {
  private readonly autocommit: PgSession

  constructor(private readonly pool: ConnectionPool) {
    this.autocommit = new PgSession(pool)
  }

  repository<T extends Entity>(definition: EntityDefinition<T>): Repository<T> {
    return this.autocommit.repository(definition)
  }

  async transaction<R>(work: (session: Session) => Promise<R>): Promise<R> {
    const connection = await this.pool.connect()
    let broken: Error | boolean = false
    try {
      await connection.query('BEGIN')
      const result = await work(new PgSession(connection))
      await connection.query('COMMIT')
      return result
    } catch (error) {
      try {
        await connection.query('ROLLBACK')
      } catch (rollbackError) {
        broken = rollbackError instanceof Error ? rollbackError : true
        log.error('Transaction rollback failed', {
          event: 'TransactionRollbackError',
          metadata: { error: rollbackError },
        })
      }
      throw error
    } finally {
      connection.release(broken)
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1')
      return true
    } catch (error) {
      log.warn('Database health check failed', { event: 'DatabaseHealthCheck', metadata: { error } })
      return false
    }
  }

  async close(): Promise<void> {
    await this.pool.end()
  }
}

/**
 * Create a database backed by a pg connection pool configured from the environment.
 */
export function createPostgresDatabase(): PostgresDatabase {
  const env = getEnv()
  const pool = new pg.Pool({
    connectionString: env.DATABASE_URL,
    max: env.DATABASE_POOL_MAX,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  })

  pool.on('error', (error) => {
    log.error('PostgreSQL pool error', { event: 'DatabasePoolError', metadata: { error } })
  })

  const logQueries = env.NODE_ENV === 'development'
  const traced = (client: Queryable): Queryable => ({
    query: async (text, values) => {
      const start = Date.now()
      const result = await client.query(text, values)
      if (logQueries) {
        log.debug('PostgreSQL query', {
          event: 'DatabaseQuery',
          metadata: { query: text, duration: Date.now() - start },
        })
      }
      return result
    },
  })

  return new PostgresDatabase({
    ...traced({ query: (text, values) => pool.query(text, values) }),
    connect: async () => {
      const client = await pool.connect()
      return {
        ...traced({ query: (text, values) => client.query(text, values) }),
        release: (destroy) => client.release(destroy),
      }
    },
    end: () => pool.end(),
  })
}

// Singleton database for the process
let database: Database | null = null

export function getDatabase(): Database {
  if (!database) {
    database = createPostgresDatabase()
  }
  return database
}

/**
 * Replace the process-wide database (tests install an in-memory implementation).
 */
export function setDatabase(instance: Database | null): void {
  database = instance
}

export async function closeDatabase(): Promise<void> {
  if (database) {
    await database.close()
    database = null
    log.info('Database connections closed', { event: 'DatabaseClosed' })
  }
}
