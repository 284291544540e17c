/**
 * Audit Logging System
 *
 * Entity services compose a ChangeTrackingMutator bound to the acting user; every mutation
 * is written together with its audit entry.
 *
 * @example
 * ```typescript
 * import { AuditRecorder, ChangeTrackingMutator } from './lib/audit/index.js'
 *
 * const recorder = new AuditRecorder(db, getUserId())
 * const clients = new ChangeTrackingMutator(db, clientEntity, recorder)
 * await clients.update(7, { contactName: 'Ana' })
 * ```
 */

export type { AuditLog, AuditEntryInput, AuditLogFilters, Snapshot } from './types.js'
export { AuditAction, auditLogEntity } from './types.js'

export { computeChanges, hasChanges, toSnapshot, changedColumns } from './change-detection.js'

export { AuditRecorder } from './audit-recorder.js'
export { ChangeTrackingMutator, type MutationResult } from './change-tracking-mutator.js'
