import { z } from 'zod'
import { defineEntity } from '../../db/entity.js'

export enum ClientType {
  NATURAL = 'natural',
  JURIDICAL = 'juridical',
}

export interface Client {
  id: number
  clientType: ClientType
  contactName: string
  companyName: string | null
  /** E.164 */
  phone: string | null
  email: string | null
  instagram: string | null
  address: string | null
  country: string | null
  createdAt: Date
  updatedAt: Date | null
}

export const clientEntity = defineEntity<Client>({
  name: 'Client',
  table: 'clients',
  columns: {
    id: 'id',
    clientType: 'client_type',
    contactName: 'contact_name',
    companyName: 'company_name',
    phone: 'phone',
    email: 'email',
    instagram: 'instagram',
    address: 'address',
    country: 'country',
    createdAt: 'created_at',
    updatedAt: 'updated_at',
  },
  updatedAtColumn: 'updated_at',
  schema: z.object({
    id: z.number().int(),
    clientType: z.nativeEnum(ClientType),
    contactName: z.string(),
    companyName: z.string().nullable(),
    phone: z.string().nullable(),
    email: z.string().nullable(),
    instagram: z.string().nullable(),
    address: z.string().nullable(),
    country: z.string().nullable(),
    createdAt: z.coerce.date(),
    updatedAt: z.coerce.date().nullable(),
  }),
})
