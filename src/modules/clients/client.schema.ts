import { z, commonSchemas } from '../../lib/validation.js'
import { ClientType } from './client.entity.js'

const contactName = z.string().trim().min(1).max(150)
const companyName = z.string().max(150)
const phone = z.string().trim().min(7).max(20)
const email = z.string().email().max(255)
const instagram = z.string().max(100)
const address = z.string().max(500)
const country = z.string().max(100)

// Create client input
export const createClientSchema = z.object({
  clientType: z.nativeEnum(ClientType),
  contactName,
  companyName: companyName.nullish(),
  phone: phone.nullish(),
  email: email.nullish(),
  instagram: instagram.nullish(),
  address: address.nullish(),
  country: country.nullish(),
})

export type CreateClientInput = z.infer<typeof createClientSchema>

// Update client input: null or absent leaves a field unchanged
export const updateClientSchema = z.object({
  clientType: z.nativeEnum(ClientType).nullish(),
  contactName: contactName.nullish(),
  companyName: companyName.nullish(),
  phone: phone.nullish(),
  email: email.nullish(),
  instagram: instagram.nullish(),
  address: address.nullish(),
  country: country.nullish(),
})

export type UpdateClientInput = z.infer<typeof updateClientSchema>

export const listClientsQuerySchema = commonSchemas.pagination

export const searchClientsQuerySchema = commonSchemas.pagination.extend({
  name: z.string().trim().min(1),
})

export const advancedSearchQuerySchema = commonSchemas.pagination.extend({
  contactName: z.string().optional(),
  companyName: z.string().optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
  instagram: z.string().optional(),
  clientType: z.nativeEnum(ClientType).optional(),
  country: z.string().optional(),
  dateFrom: commonSchemas.date.optional(),
  dateTo: commonSchemas.date.optional(),
})

export type ClientSearchFilters = Omit<z.infer<typeof advancedSearchQuerySchema>, 'page' | 'pageSize'>

export const checkExistsQuerySchema = z.object({
  phone: z.string().optional(),
  email: z.string().optional(),
  instagram: z.string().optional(),
})

export type CheckExistsQuery = z.infer<typeof checkExistsQuerySchema>

export const clientIdParamSchema = commonSchemas.idParam

export const clientPhoneParamSchema = z.object({
  phone: z.string().min(1),
})
