/**
 * Audit Logging Types
 *
 * One immutable row per create/update/delete of a business entity, written in the same
 * transaction as the change it describes.
 */

import { z } from 'zod'
import { defineEntity } from '../../db/entity.js'

/**
 * Audit operation types
 */
export enum AuditAction {
  CREATE = 'create',
  UPDATE = 'update',
  DELETE = 'delete',
}

/**
 * Column name → value. Dates are ISO-8601 strings.
 */
export type Snapshot = Record<string, unknown>

export interface AuditLog {
  id: number
  /** Table of the audited row, e.g. "clients" */
  tableName: string
  recordId: number
  action: AuditAction
  /** Row before the change (null for create) */
  oldValues: Snapshot | null
  /** Row after the change (null for delete) */
  newValues: Snapshot | null
  changedById: number
  createdAt: Date
}

export const auditLogEntity = defineEntity<AuditLog>({
  name: 'AuditLog',
  table: 'audit_logs',
  columns: {
    id: 'id',
    tableName: 'table_name',
    recordId: 'record_id',
    action: 'action',
    oldValues: 'old_values',
    newValues: 'new_values',
    changedById: 'changed_by_id',
    createdAt: 'created_at',
  },
  schema: z.object({
    id: z.number().int(),
    tableName: z.string(),
    recordId: z.number().int(),
    action: z.nativeEnum(AuditAction),
    oldValues: z.record(z.unknown()).nullable(),
    newValues: z.record(z.unknown()).nullable(),
    changedById: z.number().int(),
    createdAt: z.coerce.date(),
  }),
})

/**
 * Parameters for recording one audit entry
 */
export interface AuditEntryInput {
  tableName: string
  recordId: number
  action: AuditAction
  oldValues: Snapshot | null
  newValues: Snapshot | null
}

export interface AuditLogFilters {
  tableName?: string
  recordId?: number
  changedById?: number
  action?: AuditAction
}
