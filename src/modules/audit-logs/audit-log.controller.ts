import type { Request, Response } from 'express'
import httpStatus from 'http-status'
import { getDatabase } from '../../db/postgres.js'
import { AuditRecorder } from '../../lib/audit/index.js'
import { asyncHandler } from '../../lib/async-handler.js'
import { createPaginatedResponse, getPaginationSkipLimit } from '../../lib/pagination.js'
import { listAuditLogsQuerySchema, recordHistoryParamSchema } from './audit-log.schema.js'

export const listAuditLogs = asyncHandler(async (req: Request, res: Response) => {
  const { page, pageSize, ...filters } = listAuditLogsQuerySchema.parse(req.query)
  const { skip, limit } = getPaginationSkipLimit(page, pageSize)
  const recorder = new AuditRecorder(getDatabase())

  const [logs, total] = await Promise.all([recorder.list(filters, skip, limit), recorder.count(filters)])

  res.status(httpStatus.OK).json({
    message: 'Audit logs retrieved successfully',
    ...createPaginatedResponse(logs, total, page, pageSize),
  })
})

export const getRecordHistory = asyncHandler(async (req: Request, res: Response) => {
  const { tableName, recordId } = recordHistoryParamSchema.parse(req.params)
  const logs = await new AuditRecorder(getDatabase()).listForRecord(tableName, recordId)

  res.status(httpStatus.OK).json({
    message: 'Audit logs retrieved successfully',
    data: logs,
  })
})
