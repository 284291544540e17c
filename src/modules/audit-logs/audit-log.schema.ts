import { z, commonSchemas } from '../../lib/validation.js'
import { AuditAction } from '../../lib/audit/index.js'

export const listAuditLogsQuerySchema = commonSchemas.auditPagination.extend({
  tableName: z.string().min(1).max(50).optional(),
  recordId: commonSchemas.id.optional(),
  changedById: commonSchemas.id.optional(),
  action: z.nativeEnum(AuditAction).optional(),
})

export const recordHistoryParamSchema = z.object({
  tableName: z.string().min(1).max(50),
  recordId: commonSchemas.id,
})
