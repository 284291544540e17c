import type { Request, Response, NextFunction } from 'express'
import { forbidden, unauthorized } from '../lib/errors.js'
import { getUser } from '../lib/request-context.js'
import type { UserRole } from '../modules/users/user.entity.js'

/**
 * Require the authenticated user to have one of the specified roles.
 * The user comes from the request context populated by populateUserContext().
 *
 * @example
 * // Admin only
 * router.get('/', requireRole(UserRole.ADMIN), handler)
 *
 * @example
 * // Any of these roles
 * router.get('/reports', requireRole(UserRole.ADMIN, UserRole.MANAGEMENT), handler)
 */
export function requireRole(...roles: UserRole[]) {
  return (_req: Request, _res: Response, next: NextFunction) => {
    const user = getUser()

    if (!user) {
      throw unauthorized('Could not validate credentials')
    }

    if (!roles.includes(user.role)) {
      throw forbidden('Not enough permissions')
    }

    next()
  }
}

/**
 * Require any authenticated, active user.
 */
export function requireActiveUser(_req: Request, _res: Response, next: NextFunction): void {
  if (!getUser()) {
    throw unauthorized('Could not validate credentials')
  }
  next()
}
