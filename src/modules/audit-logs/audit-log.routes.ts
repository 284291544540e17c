import { Router } from 'express'
import { validate } from '../../lib/validation.js'
import { requireRole } from '../../middleware/rbac.js'
import { UserRole } from '../users/user.entity.js'
import * as auditLogController from './audit-log.controller.js'
import { listAuditLogsQuerySchema, recordHistoryParamSchema } from './audit-log.schema.js'

const router = Router()

router.use(requireRole(UserRole.ADMIN))

// List audit logs (tableName, recordId, changedById, action filters)
router.get('/', validate({ query: listAuditLogsQuerySchema }), auditLogController.listAuditLogs)

// Full history of one record
router.get(
  '/table/:tableName/:recordId',
  validate({ params: recordHistoryParamSchema }),
  auditLogController.getRecordHistory
)

export default router
