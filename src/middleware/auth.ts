import { auth } from 'express-oauth2-jwt-bearer'
import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { getEnv } from '../config/env.js'
import { getDatabase } from '../db/postgres.js'
import { unauthorized } from '../lib/errors.js'
import { setUser } from '../lib/request-context.js'
import { userEntity } from '../modules/users/user.entity.js'

/**
 * Create the JWT validator middleware.
 * Validates HS256 access tokens issued by POST /auth/login.
 *
 * Configuration:
 * - JWT_SECRET: shared signing secret
 * - JWT_ISSUER / JWT_AUDIENCE: expected `iss` and `aud` claims
 */
export function createAuthMiddleware(): RequestHandler {
  const env = getEnv()

  return auth({
    issuer: env.JWT_ISSUER,
    audience: env.JWT_AUDIENCE,
    secret: env.JWT_SECRET,
    tokenSigningAlg: 'HS256',
  })
}

let validator: RequestHandler | null = null

/**
 * Token validator built on first use, for routers that are created before configuration loads.
 */
export function requireAuthentication(req: Request, res: Response, next: NextFunction): void {
  validator ??= createAuthMiddleware()
  validator(req, res, next)
}

function subjectToUserId(sub: string | undefined): number | null {
  if (!sub || !/^\d+$/.test(sub)) return null
  return Number(sub)
}

/**
 * Load the token subject from the database and store it in AsyncLocalStorage.
 * This makes the user available everywhere via getUser() and getUserId().
 *
 * Must be used after createAuthMiddleware().
 */
export function populateUserContext(req: Request, _res: Response, next: NextFunction): void {
  const userId = subjectToUserId(req.auth?.payload.sub)
  if (userId === null) {
    next(unauthorized('Could not validate credentials'))
    return
  }

  getDatabase()
    .repository(userEntity)
    .getById(userId)
    .then((user) => {
      if (!user || !user.isActive) {
        throw unauthorized('Could not validate credentials')
      }
      setUser({ id: user.id, username: user.username, role: user.role })
      next()
    })
    .catch(next)
}
