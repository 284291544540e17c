import type { Request, Response } from 'express'
import httpStatus from 'http-status'
import { asyncHandler } from '../../lib/async-handler.js'
import { badRequest, unauthorized } from '../../lib/errors.js'
import { info, warn } from '../../lib/logger.js'
import { getUserId } from '../../lib/request-context.js'
import { issueAccessToken } from '../../lib/tokens.js'
import { toPublicUser } from '../users/user.entity.js'
import { createUserService } from '../users/user.service.js'
import { loginSchema } from './auth.schema.js'

/**
 * Exchange username and password for a bearer token.
 * The token body is returned as is, without the `{ message, data }` envelope.
 */
export const login = asyncHandler(async (req: Request, res: Response) => {
  const { username, password } = loginSchema.parse(req.body)

  const user = await createUserService().authenticate(username, password)
  if (!user) {
    warn('Login failed', { event: 'LoginFailed', metadata: { username } })
    throw unauthorized('Incorrect username or password')
  }
  if (!user.isActive) {
    throw badRequest('Inactive user')
  }

  info('Login succeeded', { event: 'LoginSucceeded', metadata: { userId: user.id } })

  res.status(httpStatus.OK).json(await issueAccessToken({ id: user.id, role: user.role }))
})

export const me = asyncHandler(async (_req: Request, res: Response) => {
  const userId = getUserId()
  const user = userId === undefined ? null : await createUserService().getById(userId)
  if (!user) {
    throw unauthorized('Could not validate credentials')
  }

  res.status(httpStatus.OK).json({
    message: 'User retrieved successfully',
    data: toPublicUser(user),
  })
})
