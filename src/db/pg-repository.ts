import type { Condition, FindOptions } from './database.js'
import type { Entity, EntityDefinition, FieldName, Insert } from './entity.js'
import { decodeRow, writableColumns } from './entity.js'
import { BaseRepository } from './repository.js'
import { buildOrderByClause, buildWhereClause, quoteIdentifier } from './query-builder.js'
import { entityNotFound } from '../lib/errors.js'

export interface QueryResultLike {
  rows: Record<string, unknown>[]
  rowCount: number | null
}

/**
 * The slice of a pg Pool / PoolClient the repositories need.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>
}

// JSONB columns receive plain objects; pg serializes Date itself
function toParam(value: unknown): unknown {
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    return JSON.stringify(value)
  }
  return value
}

export class PgRepository<T extends Entity> extends BaseRepository<T> {
  private readonly table: string

  constructor(
    definition: EntityDefinition<T>,
    private readonly client: Queryable
  ) {
    super(definition)
    this.table = quoteIdentifier(definition.table)
  }

  async find(options: FindOptions<T> = {}): Promise<T[]> {
    const params: unknown[] = []
    let sql = `SELECT * FROM ${this.table}`
    sql += buildWhereClause(this.definition, options.where ?? [], params)
    sql += buildOrderByClause(this.definition, options.orderBy ?? [])

    if (options.limit !== undefined) {
      params.push(options.limit)
      sql += ` LIMIT $${params.length}`
    }
    if (options.skip) {
      params.push(options.skip)
      sql += ` OFFSET $${params.length}`
    }

    const result = await this.client.query(sql, params)
    return result.rows.map((row) => decodeRow(this.definition, row))
  }

  async count(where: Condition<T>[] = []): Promise<number> {
    const params: unknown[] = []
    const sql = `SELECT COUNT(*)::int AS count FROM ${this.table}${buildWhereClause(this.definition, where, params)}`
    const result = await this.client.query(sql, params)
    return Number(result.rows[0]?.count ?? 0)
  }

  async countBy(field: FieldName<T>): Promise<Record<string, number>> {
    const column = quoteIdentifier(this.definition.columns[field])
    const result = await this.client.query(
      `SELECT ${column} AS value, COUNT(*)::int AS count FROM ${this.table} GROUP BY ${column}`
    )

    const counts: Record<string, number> = {}
    for (const row of result.rows) {
      counts[String(row.value)] = Number(row.count)
    }
    return counts
  }

  async create(values: Insert<T>): Promise<T> {
    const pairs = writableColumns(this.definition, values)
    const columns = pairs.map(([column]) => quoteIdentifier(column)).join(', ')
    const placeholders = pairs.map((_, index) => `$${index + 1}`).join(', ')

    const sql =
      pairs.length === 0
        ? `INSERT INTO ${this.table} DEFAULT VALUES RETURNING *`
        : `INSERT INTO ${this.table} (${columns}) VALUES (${placeholders}) RETURNING *`

    const result = await this.client.query(
      sql,
      pairs.map(([, value]) => toParam(value))
    )
    return decodeRow(this.definition, result.rows[0] ?? {})
  }

  async update(entity: T, changes: Partial<T>): Promise<T> {
    const pairs = writableColumns(this.definition, changes)
    if (pairs.length === 0) {
      return entity
    }

    const params: unknown[] = pairs.map(([, value]) => toParam(value))
    const assignments = pairs.map(([column], index) => `${quoteIdentifier(column)} = $${index + 1}`)
    if (this.definition.updatedAtColumn) {
      assignments.push(`${quoteIdentifier(this.definition.updatedAtColumn)} = NOW()`)
    }

    params.push(entity.id)
    const sql = `UPDATE ${this.table} SET ${assignments.join(', ')} WHERE "id" = $${params.length} RETURNING *`

    const result = await this.client.query(sql, params)
    const row = result.rows[0]
    if (!row) {
      throw entityNotFound(this.definition.name, entity.id)
    }
    return decodeRow(this.definition, row)
  }

  async delete(entity: T): Promise<void> {
    await this.client.query(`DELETE FROM ${this.table} WHERE "id" = $1`, [entity.id])
  }
}
