import type { Request, Response } from 'express'
import httpStatus from 'http-status'
import { asyncHandler } from '../../lib/async-handler.js'
import { notFound } from '../../lib/errors.js'
import { createPaginatedResponse, getPaginationSkipLimit } from '../../lib/pagination.js'
import { createClientService } from './client.service.js'
import {
  advancedSearchQuerySchema,
  checkExistsQuerySchema,
  clientIdParamSchema,
  clientPhoneParamSchema,
  createClientSchema,
  listClientsQuerySchema,
  searchClientsQuerySchema,
  updateClientSchema,
} from './client.schema.js'

export const createClient = asyncHandler(async (req: Request, res: Response) => {
  const input = createClientSchema.parse(req.body)
  const client = await createClientService().createClient(input)

  res.status(httpStatus.CREATED).json({
    message: 'Client created successfully',
    data: client,
  })
})

export const listClients = asyncHandler(async (req: Request, res: Response) => {
  const { page, pageSize } = listClientsQuerySchema.parse(req.query)
  const { skip, limit } = getPaginationSkipLimit(page, pageSize)
  const result = await createClientService().listClients(skip, limit)

  res.status(httpStatus.OK).json({
    message: 'Clients retrieved successfully',
    ...createPaginatedResponse(result.items, result.total, page, pageSize),
  })
})

export const searchClients = asyncHandler(async (req: Request, res: Response) => {
  const { name, page, pageSize } = searchClientsQuerySchema.parse(req.query)
  const { skip, limit } = getPaginationSkipLimit(page, pageSize)
  const clients = await createClientService().searchByName(name, skip, limit)

  res.status(httpStatus.OK).json({
    message: 'Clients retrieved successfully',
    data: clients,
  })
})

export const advancedSearchClients = asyncHandler(async (req: Request, res: Response) => {
  const { page, pageSize, ...filters } = advancedSearchQuerySchema.parse(req.query)
  const { skip, limit } = getPaginationSkipLimit(page, pageSize)
  const clients = await createClientService().advancedSearch(filters, skip, limit)

  res.status(httpStatus.OK).json({
    message: 'Clients retrieved successfully',
    data: clients,
  })
})

export const checkClientExists = asyncHandler(async (req: Request, res: Response) => {
  const query = checkExistsQuerySchema.parse(req.query)
  const client = await createClientService().checkExists(query)

  res.status(httpStatus.OK).json({
    message: client ? 'Client found' : 'Client not found',
    data: client,
  })
})

export const getClientByPhone = asyncHandler(async (req: Request, res: Response) => {
  const { phone } = clientPhoneParamSchema.parse(req.params)
  const client = await createClientService().getByPhone(phone)
  if (!client) {
    throw notFound('Client not found')
  }

  res.status(httpStatus.OK).json({
    message: 'Client retrieved successfully',
    data: client,
  })
})

export const getClient = asyncHandler(async (req: Request, res: Response) => {
  const { id } = clientIdParamSchema.parse(req.params)
  const client = await createClientService().getClientWithLeads(id)
  if (!client) {
    throw notFound('Client not found')
  }

  res.status(httpStatus.OK).json({
    message: 'Client retrieved successfully',
    data: client,
  })
})

export const updateClient = asyncHandler(async (req: Request, res: Response) => {
  const { id } = clientIdParamSchema.parse(req.params)
  const input = updateClientSchema.parse(req.body)
  const client = await createClientService().updateClient(id, input)

  res.status(httpStatus.OK).json({
    message: 'Client updated successfully',
    data: client,
  })
})

export const deleteClient = asyncHandler(async (req: Request, res: Response) => {
  const { id } = clientIdParamSchema.parse(req.params)
  await createClientService().deleteClient(id)

  res.status(httpStatus.OK).json({
    message: 'Client deleted successfully',
  })
})
