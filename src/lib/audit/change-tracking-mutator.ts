/**
 * Change-Tracking Mutator
 *
 * Runs create/update/delete for one entity type. Each mutation and its audit entry share a
 * single transaction: if the audit insert fails the mutation is rolled back and the error
 * propagates.
 */

import type { Database } from '../../db/database.js'
import type { Entity, EntityDefinition, Insert } from '../../db/entity.js'
import { computeChanges, hasChanges, toSnapshot } from './change-detection.js'
import type { AuditRecorder } from './audit-recorder.js'
import { AuditAction } from './types.js'

export interface MutationResult<T> {
  before: T
  after: T
  changed: boolean
}

export class ChangeTrackingMutator<T extends Entity> {
  constructor(
    private readonly db: Database,
    private readonly definition: EntityDefinition<T>,
    private readonly recorder: AuditRecorder
  ) {}

  create(data: Insert<T>): Promise<T> {
    return this.db.transaction(async (session) => {
      const entity = await session.repository(this.definition).create(data)

      await this.recorder.record(
        {
          tableName: this.definition.table,
          recordId: entity.id,
          action: AuditAction.CREATE,
          oldValues: null,
          newValues: toSnapshot(this.definition, entity),
        },
        session
      )

      return entity
    })
  }

  /**
   * Apply the fields of `data` that differ from the stored row.
   * With nothing to change the stored entity is returned and nothing is written or audited.
   *
   * @throws {ApiError} 404 when the row does not exist
   */
  async update(id: number, data: Partial<T>): Promise<T> {
    return (await this.apply(id, data)).after
  }

  /**
   * Like update(), also returning the row as read inside the transaction and whether anything
   * was written.
   */
  apply(id: number, data: Partial<T>): Promise<MutationResult<T>> {
    return this.db.transaction(async (session) => {
      const repository = session.repository(this.definition)
      const current = await repository.getByIdOrFail(id)

      const diff = computeChanges(this.definition, current, data)
      if (!hasChanges(diff)) {
        return { before: current, after: current, changed: false }
      }

      const oldValues = toSnapshot(this.definition, current)
      const updated = await repository.update(current, diff)

      await this.recorder.record(
        {
          tableName: this.definition.table,
          recordId: updated.id,
          action: AuditAction.UPDATE,
          oldValues,
          newValues: toSnapshot(this.definition, updated),
        },
        session
      )

      return { before: current, after: updated, changed: true }
    })
  }

  /**
   * @throws {ApiError} 404 when the row does not exist
   */
  delete(id: number): Promise<void> {
    return this.db.transaction(async (session) => {
      const repository = session.repository(this.definition)
      const current = await repository.getByIdOrFail(id)
      const oldValues = toSnapshot(this.definition, current)

      await repository.delete(current)

      await this.recorder.record(
        {
          tableName: this.definition.table,
          recordId: id,
          action: AuditAction.DELETE,
          oldValues,
          newValues: null,
        },
        session
      )
    })
  }
}
