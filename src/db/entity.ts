/**
 * Entity definitions
 *
 * Each persisted entity is described once: its table, an explicit field → column map and a
 * Zod schema that turns a decoded row into the typed entity. Repositories, the change-tracking
 * mutator and audit snapshots all work from this map instead of reflecting over objects.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import { internalError } from '../lib/errors.js'

export interface Entity {
  id: number
}

export type Scalar = string | number | boolean | Date | null

export type FieldName<T> = keyof T & string

export type ColumnMap<T> = { readonly [K in FieldName<T>]-?: string }

/** Fields the store fills in; never part of an insert or an update payload */
export const GENERATED_FIELDS: ReadonlySet<string> = new Set(['id', 'createdAt', 'updatedAt'])

export type GeneratedField = 'id' | 'createdAt' | 'updatedAt'

export type Insert<T extends Entity> = Omit<T, GeneratedField>

export interface EntityDefinition<T extends Entity> {
  /** Resource name used in error messages, e.g. "Client" */
  readonly name: string
  readonly table: string
  readonly columns: ColumnMap<T>
  /** Column set to the current time on every update */
  readonly updatedAtColumn?: string
  readonly schema: ZodType<T, ZodTypeDef, unknown>
}

export function defineEntity<T extends Entity>(definition: EntityDefinition<T>): EntityDefinition<T> {
  return Object.freeze(definition)
}

export function fieldNames<T extends Entity>(definition: EntityDefinition<T>): FieldName<T>[] {
  const columns = definition.columns
  return Object.keys(columns).filter((key): key is FieldName<T> => key in columns)
}

export function columnFor<T extends Entity>(
  definition: EntityDefinition<T>,
  key: string
): string | undefined {
  for (const field of fieldNames(definition)) {
    if (field === key) return definition.columns[field]
  }
  return undefined
}

/**
 * Decode a row keyed by column name into the typed entity.
 */
export function decodeRow<T extends Entity>(
  definition: EntityDefinition<T>,
  row: Record<string, unknown>
): T {
  const record: Record<string, unknown> = {}
  for (const field of fieldNames(definition)) {
    record[field] = row[definition.columns[field]]
  }
  const parsed = definition.schema.safeParse(record)
  if (!parsed.success) {
    throw internalError(`Stored ${definition.name} row does not match its schema`, parsed.error)
  }
  return parsed.data
}

/**
 * Column → value pairs for the writable fields present in `values`.
 */
export function writableColumns<T extends Entity>(
  definition: EntityDefinition<T>,
  values: object
): Array<[column: string, value: unknown]> {
  const pairs: Array<[string, unknown]> = []
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined || GENERATED_FIELDS.has(key)) continue
    const column = columnFor(definition, key)
    if (column) pairs.push([column, value])
  }
  return pairs
}
