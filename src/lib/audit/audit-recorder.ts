/**
 * Audit Recorder
 *
 * Writes and reads audit entries. A recorder is bound to the acting user; entries are only
 * written when one is known.
 */

import type { Condition, Database, Session } from '../../db/database.js'
import { DEFAULT_LIST_LIMIT } from '../../db/repository.js'
import { combineFilters } from '../../db/query-builder.js'
import type { AuditEntryInput, AuditLog, AuditLogFilters } from './types.js'
import { auditLogEntity } from './types.js'
import { debug } from '../logger.js'

function filterConditions(filters: AuditLogFilters): Condition<AuditLog>[] {
  return combineFilters<AuditLog>(
    filters.tableName !== undefined && { op: 'eq', field: 'tableName', value: filters.tableName },
    filters.recordId !== undefined && { op: 'eq', field: 'recordId', value: filters.recordId },
    filters.changedById !== undefined && { op: 'eq', field: 'changedById', value: filters.changedById },
    filters.action !== undefined && { op: 'eq', field: 'action', value: filters.action }
  )
}

export class AuditRecorder {
  constructor(
    private readonly db: Database,
    readonly actingUserId?: number
  ) {}

  /**
   * Insert one entry through `session` (the caller's transaction).
   * Returns null without writing when no acting user is bound.
   */
  async record(entry: AuditEntryInput, session: Session = this.db): Promise<AuditLog | null> {
    if (this.actingUserId === undefined) {
      debug('Audit skipped: no acting user', {
        event: 'AuditSkipped',
        metadata: { tableName: entry.tableName, recordId: entry.recordId, action: entry.action },
      })
      return null
    }

    return session.repository(auditLogEntity).create({
      tableName: entry.tableName,
      recordId: entry.recordId,
      action: entry.action,
      oldValues: entry.oldValues,
      newValues: entry.newValues,
      changedById: this.actingUserId,
    })
  }

  /**
   * Entries matching all given filters, newest first.
   */
  list(filters: AuditLogFilters = {}, skip = 0, limit = DEFAULT_LIST_LIMIT): Promise<AuditLog[]> {
    return this.db.repository(auditLogEntity).find({
      where: filterConditions(filters),
      orderBy: [
        { field: 'createdAt', direction: 'desc' },
        { field: 'id', direction: 'desc' },
      ],
      skip,
      limit,
    })
  }

  count(filters: AuditLogFilters = {}): Promise<number> {
    return this.db.repository(auditLogEntity).count(filterConditions(filters))
  }

  /**
   * Full history of one row, newest first.
   */
  listForRecord(tableName: string, recordId: number): Promise<AuditLog[]> {
    return this.db.repository(auditLogEntity).find({
      where: filterConditions({ tableName, recordId }),
      orderBy: [
        { field: 'createdAt', direction: 'desc' },
        { field: 'id', direction: 'desc' },
      ],
    })
  }
}
