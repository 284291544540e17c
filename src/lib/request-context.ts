import { AsyncLocalStorage } from 'async_hooks'
import type { Request, Response, NextFunction } from 'express'
import { v4 as uuid } from 'uuid'
import type { Logger } from './logger.js'
import { createRequestLogger } from './logger.js'
import type { UserRole } from '../modules/users/user.entity.js'

export interface UserContext {
  id: number // users.id (token subject)
  username: string
  role: UserRole
}

export interface RequestContext {
  requestId: string
  startTime: number
  user?: UserContext
  logger: Logger
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>()

// Getters for accessing context from anywhere
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore()
}

export function getRequestId(): string {
  return getRequestContext()?.requestId ?? 'unknown'
}

export function getUser(): UserContext | undefined {
  return getRequestContext()?.user
}

/**
 * Acting user id for audited mutations; undefined outside an authenticated request.
 */
export function getUserId(): number | undefined {
  return getUser()?.id
}

export function hasRole(role: UserRole): boolean {
  return getUser()?.role === role
}

export function hasAnyRole(roles: UserRole[]): boolean {
  const role = getUser()?.role
  return role !== undefined && roles.includes(role)
}

export function getLogger(): Logger | undefined {
  return getRequestContext()?.logger
}

// Setters for middleware to populate context
export function setUser(user: UserContext): void {
  const ctx = getRequestContext()
  if (ctx) {
    ctx.user = user
  }
}

/**
 * Run `fn` inside a fresh context. Used by scripts and tests that call services directly.
 */
export function runWithContext<R>(
  context: { requestId?: string; user?: UserContext },
  fn: () => R
): R {
  const requestId = context.requestId ?? uuid()
  return asyncLocalStorage.run(
    { requestId, startTime: Date.now(), user: context.user, logger: createRequestLogger(null, requestId) },
    fn
  )
}

// Middleware to establish context
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = req.get('x-request-id') || uuid()
  const logger = createRequestLogger(req, requestId)

  const context: RequestContext = {
    requestId,
    startTime: Date.now(),
    logger,
  }

  // Add request ID to response headers
  res.setHeader('x-request-id', requestId)

  asyncLocalStorage.run(context, () => {
    next()
  })
}
