/**
 * Query building utilities
 *
 * Compiles the typed conditions used by services into parameterised PostgreSQL fragments,
 * plus small helpers for assembling condition lists.
 */

import type { Condition, OrderBy } from './database.js'
import type { Entity, EntityDefinition, FieldName } from './entity.js'

export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`
}

export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`)
}

function column<T extends Entity>(definition: EntityDefinition<T>, field: FieldName<T>): string {
  return quoteIdentifier(definition.columns[field])
}

function compileCondition<T extends Entity>(
  definition: EntityDefinition<T>,
  condition: Condition<T>,
  params: unknown[]
): string {
  const placeholder = (value: unknown) => {
    params.push(value)
    return `$${params.length}`
  }

  switch (condition.op) {
    case 'eq':
      return condition.value === null
        ? `${column(definition, condition.field)} IS NULL`
        : `${column(definition, condition.field)} = ${placeholder(condition.value)}`
    case 'contains':
      return `${column(definition, condition.field)} ILIKE ${placeholder(`%${escapeLikePattern(condition.value)}%`)}`
    case 'iequals':
      return `LOWER(${column(definition, condition.field)}) = LOWER(${placeholder(condition.value)})`
    case 'gte':
      return `${column(definition, condition.field)} >= ${placeholder(condition.value)}`
    case 'lte':
      return `${column(definition, condition.field)} <= ${placeholder(condition.value)}`
    case 'or': {
      if (condition.conditions.length === 0) return 'FALSE'
      const parts = condition.conditions.map((c) => compileCondition(definition, c, params))
      return `(${parts.join(' OR ')})`
    }
  }
}

/**
 * Builds a WHERE clause (AND of all conditions), appending bound values to `params`.
 *
 * @example
 * ```typescript
 * const params: unknown[] = []
 * buildWhereClause(clientEntity, [{ op: 'contains', field: 'contactName', value: 'ana' }], params)
 * // ' WHERE "contact_name" ILIKE $1', params = ['%ana%']
 * ```
 */
export function buildWhereClause<T extends Entity>(
  definition: EntityDefinition<T>,
  conditions: Condition<T>[],
  params: unknown[]
): string {
  if (conditions.length === 0) return ''
  const parts = conditions.map((condition) => compileCondition(definition, condition, params))
  return ` WHERE ${parts.join(' AND ')}`
}

export function buildOrderByClause<T extends Entity>(
  definition: EntityDefinition<T>,
  orderBy: OrderBy<T>[]
): string {
  if (orderBy.length === 0) return ''
  const parts = orderBy.map(
    ({ field, direction }) => `${column(definition, field)} ${direction === 'desc' ? 'DESC' : 'ASC'}`
  )
  return ` ORDER BY ${parts.join(', ')}`
}

/**
 * Common date range filter builder. Returns no conditions when both bounds are absent.
 */
export function buildDateRangeFilter<T>(
  field: FieldName<T>,
  from?: Date,
  to?: Date
): Condition<T>[] {
  const conditions: Condition<T>[] = []
  if (from) conditions.push({ op: 'gte', field, value: from })
  if (to) conditions.push({ op: 'lte', field, value: to })
  return conditions
}

/**
 * Combine optional conditions and condition lists into one list, skipping empty entries.
 *
 * @example
 * ```typescript
 * const where = combineFilters<Lead>(
 *   status && { op: 'eq', field: 'status', value: status },
 *   buildDateRangeFilter('createdAt', dateFrom, dateTo)
 * )
 * ```
 */
export function combineFilters<T>(
  ...filters: Array<Condition<T> | Condition<T>[] | null | undefined | false | '' | 0>
): Condition<T>[] {
  const combined: Condition<T>[] = []
  for (const filter of filters) {
    if (!filter) continue
    if (Array.isArray(filter)) combined.push(...filter)
    else combined.push(filter)
  }
  return combined
}
