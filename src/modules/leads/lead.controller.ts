import type { Request, Response } from 'express'
import httpStatus from 'http-status'
import { asyncHandler } from '../../lib/async-handler.js'
import { notFound } from '../../lib/errors.js'
import { createPaginatedResponse, getPaginationSkipLimit } from '../../lib/pagination.js'
import { createLeadService } from './lead.service.js'
import {
  advancedSearchQuerySchema,
  assignLeadSchema,
  createLeadSchema,
  leadClientParamSchema,
  leadIdParamSchema,
  leadStatusUpdateSchema,
  listLeadsQuerySchema,
  recentLeadsQuerySchema,
  updateLeadSchema,
} from './lead.schema.js'

export const createLead = asyncHandler(async (req: Request, res: Response) => {
  const input = createLeadSchema.parse(req.body)
  const lead = await createLeadService().createLead(input)

  res.status(httpStatus.CREATED).json({
    message: 'Lead created successfully',
    data: lead,
  })
})

export const listLeads = asyncHandler(async (req: Request, res: Response) => {
  const { page, pageSize, ...filters } = listLeadsQuerySchema.parse(req.query)
  const { skip, limit } = getPaginationSkipLimit(page, pageSize)
  const result = await createLeadService().listLeads(filters, skip, limit)

  res.status(httpStatus.OK).json({
    message: 'Leads retrieved successfully',
    ...createPaginatedResponse(result.items, result.total, page, pageSize),
  })
})

export const getLeadStats = asyncHandler(async (_req: Request, res: Response) => {
  const stats = await createLeadService().getStats()

  res.status(httpStatus.OK).json({
    message: 'Lead statistics retrieved successfully',
    data: stats,
  })
})

export const getRecentLeads = asyncHandler(async (req: Request, res: Response) => {
  const { hours, limit } = recentLeadsQuerySchema.parse(req.query)
  const leads = await createLeadService().getRecentLeads(hours, limit)

  res.status(httpStatus.OK).json({
    message: 'Leads retrieved successfully',
    data: leads,
  })
})

export const advancedSearchLeads = asyncHandler(async (req: Request, res: Response) => {
  const { page, pageSize, ...filters } = advancedSearchQuerySchema.parse(req.query)
  const { skip, limit } = getPaginationSkipLimit(page, pageSize)
  const leads = await createLeadService().advancedSearch(filters, skip, limit)

  res.status(httpStatus.OK).json({
    message: 'Leads retrieved successfully',
    data: leads,
  })
})

export const getLeadsByClient = asyncHandler(async (req: Request, res: Response) => {
  const { clientId } = leadClientParamSchema.parse(req.params)
  const leads = await createLeadService().getLeadsByClient(clientId)

  res.status(httpStatus.OK).json({
    message: 'Leads retrieved successfully',
    data: leads,
  })
})

export const getLead = asyncHandler(async (req: Request, res: Response) => {
  const { id } = leadIdParamSchema.parse(req.params)
  const lead = await createLeadService().getLeadWithDetails(id)
  if (!lead) {
    throw notFound('Lead not found')
  }

  res.status(httpStatus.OK).json({
    message: 'Lead retrieved successfully',
    data: lead,
  })
})

export const updateLead = asyncHandler(async (req: Request, res: Response) => {
  const { id } = leadIdParamSchema.parse(req.params)
  const input = updateLeadSchema.parse(req.body)
  const lead = await createLeadService().updateLead(id, input)

  res.status(httpStatus.OK).json({
    message: 'Lead updated successfully',
    data: lead,
  })
})

export const updateLeadStatus = asyncHandler(async (req: Request, res: Response) => {
  const { id } = leadIdParamSchema.parse(req.params)
  const { status } = leadStatusUpdateSchema.parse(req.body)
  const lead = await createLeadService().updateStatus(id, status)

  res.status(httpStatus.OK).json({
    message: 'Lead status updated successfully',
    data: lead,
  })
})

export const assignLead = asyncHandler(async (req: Request, res: Response) => {
  const { id } = leadIdParamSchema.parse(req.params)
  const { assignedToId } = assignLeadSchema.parse(req.body)
  const lead = await createLeadService().assignLead(id, assignedToId)

  res.status(httpStatus.OK).json({
    message: 'Lead assigned successfully',
    data: lead,
  })
})

export const deleteLead = asyncHandler(async (req: Request, res: Response) => {
  const { id } = leadIdParamSchema.parse(req.params)
  await createLeadService().deleteLead(id)

  res.status(httpStatus.OK).json({
    message: 'Lead deleted successfully',
  })
})
