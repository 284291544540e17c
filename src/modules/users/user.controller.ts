import type { Request, Response } from 'express'
import httpStatus from 'http-status'
import { asyncHandler } from '../../lib/async-handler.js'
import { badRequest, notFound } from '../../lib/errors.js'
import { createPaginatedResponse, getPaginationSkipLimit } from '../../lib/pagination.js'
import { getUserId } from '../../lib/request-context.js'
import { toPublicUser } from './user.entity.js'
import { createUserService } from './user.service.js'
import {
  createUserSchema,
  listUsersQuerySchema,
  updateUserSchema,
  userIdParamSchema,
} from './user.schema.js'

export const createUser = asyncHandler(async (req: Request, res: Response) => {
  const input = createUserSchema.parse(req.body)
  const user = await createUserService().createUser(input)

  res.status(httpStatus.CREATED).json({
    message: 'User created successfully',
    data: toPublicUser(user),
  })
})

export const listUsers = asyncHandler(async (req: Request, res: Response) => {
  const { page, pageSize } = listUsersQuerySchema.parse(req.query)
  const { skip, limit } = getPaginationSkipLimit(page, pageSize)
  const result = await createUserService().listUsers(skip, limit)

  res.status(httpStatus.OK).json({
    message: 'Users retrieved successfully',
    ...createPaginatedResponse(result.items.map(toPublicUser), result.total, page, pageSize),
  })
})

export const getUser = asyncHandler(async (req: Request, res: Response) => {
  const { id } = userIdParamSchema.parse(req.params)
  const user = await createUserService().getById(id)
  if (!user) {
    throw notFound('User not found')
  }

  res.status(httpStatus.OK).json({
    message: 'User retrieved successfully',
    data: toPublicUser(user),
  })
})

export const updateUser = asyncHandler(async (req: Request, res: Response) => {
  const { id } = userIdParamSchema.parse(req.params)
  const input = updateUserSchema.parse(req.body)
  const user = await createUserService().updateUser(id, input)

  res.status(httpStatus.OK).json({
    message: 'User updated successfully',
    data: toPublicUser(user),
  })
})

export const deleteUser = asyncHandler(async (req: Request, res: Response) => {
  const { id } = userIdParamSchema.parse(req.params)
  if (id === getUserId()) {
    throw badRequest('Cannot delete your own account')
  }

  await createUserService().deleteUser(id)

  res.status(httpStatus.OK).json({
    message: 'User deleted successfully',
  })
})
