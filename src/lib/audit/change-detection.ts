/**
 * Change Detection Utility
 *
 * Field-level comparison between a stored entity and a proposed update, plus the
 * column-keyed snapshots stored in audit entries.
 */

import type { Entity, EntityDefinition } from '../../db/entity.js'
import { GENERATED_FIELDS, fieldNames } from '../../db/entity.js'
import type { Snapshot } from './types.js'

/**
 * Equality for stored values; Dates compare by instant
 */
function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }
  return a === b
}

function copyIfChanged<T, K extends keyof T>(
  diff: Partial<T>,
  current: T,
  proposed: Partial<T>,
  key: K
): void {
  const next = proposed[key]
  if (next === undefined || next === null) return
  if (sameValue(current[key], next)) return
  diff[key] = next
}

/**
 * Compute the change diff for an update.
 *
 * Only writable fields whose proposed value is present, non-null and different from the
 * stored value are kept. An explicit null means "leave unchanged".
 *
 * @example
 * ```typescript
 * computeChanges(clientEntity, client, { contactName: 'Ana', email: null })
 * // { contactName: 'Ana' } when the stored name differs, {} otherwise
 * ```
 */
export function computeChanges<T extends Entity>(
  definition: EntityDefinition<T>,
  current: T,
  proposed: Partial<T>
): Partial<T> {
  const diff: Partial<T> = {}

  for (const field of fieldNames(definition)) {
    if (GENERATED_FIELDS.has(field)) continue
    copyIfChanged(diff, current, proposed, field)
  }

  return diff
}

export function hasChanges<T>(diff: Partial<T>): boolean {
  return Object.keys(diff).length > 0
}

function serializeValue(value: unknown): unknown {
  return value instanceof Date ? value.toISOString() : value
}

/**
 * Snapshot every mapped column of an entity for audit storage.
 */
export function toSnapshot<T extends Entity>(definition: EntityDefinition<T>, entity: T): Snapshot {
  const snapshot: Snapshot = {}
  for (const field of fieldNames(definition)) {
    snapshot[definition.columns[field]] = serializeValue(entity[field])
  }
  return snapshot
}

/**
 * Column names whose values differ between two snapshots.
 */
export function changedColumns(before: Snapshot, after: Snapshot): string[] {
  const keys = new Set([...Object.keys(before), ...Object.keys(after)])
  return [...keys].filter((key) => !sameValue(before[key], after[key])).sort()
}
