import { z } from 'zod'
import { defineEntity } from '../../db/entity.js'

export enum Channel {
  WEB = 'web',
  WHATSAPP = 'whatsapp',
  INSTAGRAM = 'instagram',
  MANUAL = 'manual',
}

export enum LeadStatus {
  NEW = 'new',
  CONTACTED = 'contacted',
  QUOTED = 'quoted',
  CLOSED = 'closed',
  DISCARDED = 'discarded',
}

export interface Lead {
  id: number
  clientId: number
  channel: Channel
  status: LeadStatus
  adminNotes: string | null
  salesNotes: string | null
  createdById: number
  assignedToId: number | null
  createdAt: Date
  updatedAt: Date | null
}

export const leadEntity = defineEntity<Lead>({
  name: 'Lead',
  table: 'leads',
  columns: {
    id: 'id',
    clientId: 'client_id',
    channel: 'channel',
    status: 'status',
    adminNotes: 'admin_notes',
    salesNotes: 'sales_notes',
    createdById: 'created_by_id',
    assignedToId: 'assigned_to_id',
    createdAt: 'created_at',
    updatedAt: 'updated_at',
  },
  updatedAtColumn: 'updated_at',
  schema: z.object({
    id: z.number().int(),
    clientId: z.number().int(),
    channel: z.nativeEnum(Channel),
    status: z.nativeEnum(LeadStatus),
    adminNotes: z.string().nullable(),
    salesNotes: z.string().nullable(),
    createdById: z.number().int(),
    assignedToId: z.number().int().nullable(),
    createdAt: z.coerce.date(),
    updatedAt: z.coerce.date().nullable(),
  }),
})
