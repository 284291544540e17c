import { z, commonSchemas } from '../../lib/validation.js'
import { Channel, LeadStatus } from './lead.entity.js'

const notes = z.string().max(5000)

// Create lead input
export const createLeadSchema = z.object({
  clientId: commonSchemas.id,
  channel: z.nativeEnum(Channel),
  status: z.nativeEnum(LeadStatus).default(LeadStatus.NEW),
  adminNotes: notes.nullish(),
  salesNotes: notes.nullish(),
  assignedToId: commonSchemas.id.nullish(),
})

export type CreateLeadInput = z.input<typeof createLeadSchema>

// Update lead input: null or absent leaves a field unchanged
export const updateLeadSchema = z.object({
  clientId: commonSchemas.id.nullish(),
  channel: z.nativeEnum(Channel).nullish(),
  status: z.nativeEnum(LeadStatus).nullish(),
  adminNotes: notes.nullish(),
  salesNotes: notes.nullish(),
  assignedToId: commonSchemas.id.nullish(),
})

export type UpdateLeadInput = z.infer<typeof updateLeadSchema>

export const leadStatusUpdateSchema = z.object({
  status: z.nativeEnum(LeadStatus),
})

export const assignLeadSchema = z.object({
  assignedToId: commonSchemas.id,
})

export const listLeadsQuerySchema = commonSchemas.pagination.extend({
  status: z.nativeEnum(LeadStatus).optional(),
  channel: z.nativeEnum(Channel).optional(),
  assignedToId: commonSchemas.id.optional(),
})

export type LeadListFilters = Omit<z.infer<typeof listLeadsQuerySchema>, 'page' | 'pageSize'>

export const recentLeadsQuerySchema = z.object({
  hours: z.coerce.number().int().min(1).max(168).default(24),
  limit: z.coerce.number().int().min(1).max(100).default(10),
})

export const advancedSearchQuerySchema = commonSchemas.pagination.extend({
  clientId: commonSchemas.id.optional(),
  status: z.nativeEnum(LeadStatus).optional(),
  channel: z.nativeEnum(Channel).optional(),
  createdById: commonSchemas.id.optional(),
  assignedToId: commonSchemas.id.optional(),
  dateFrom: commonSchemas.date.optional(),
  dateTo: commonSchemas.date.optional(),
})

export type LeadSearchFilters = Omit<z.infer<typeof advancedSearchQuerySchema>, 'page' | 'pageSize'>

export const leadIdParamSchema = commonSchemas.idParam

export const leadClientParamSchema = z.object({
  clientId: commonSchemas.id,
})
