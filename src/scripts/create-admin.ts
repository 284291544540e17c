/**
 * Create the initial admin user.
 *
 * Usage: npm run build && npm run create-admin
 * Reads ADMIN_USERNAME (default `admin`), ADMIN_PASSWORD (required) and ADMIN_EMAIL.
 * Does nothing when the username is already taken.
 */

import { bootstrap } from '../config/env.js'
import { closeDatabase, getDatabase } from '../db/postgres.js'
import { info, warn, fatal } from '../lib/logger.js'
import { getNotifier } from '../lib/notifications/index.js'
import { UserRole } from '../modules/users/user.entity.js'
import { UserService } from '../modules/users/user.service.js'

export interface AdminSeed {
  username: string
  password: string
  email: string | null
}

/**
 * Returns true when the admin was created, false when the username already exists.
 */
export async function createAdmin(service: UserService, seed: AdminSeed): Promise<boolean> {
  if (await service.getByUsername(seed.username)) {
    warn('Admin user already exists', { event: 'CreateAdminSkipped', metadata: { username: seed.username } })
    return false
  }

  const admin = await service.createUser({
    username: seed.username,
    email: seed.email,
    password: seed.password,
    role: UserRole.ADMIN,
    isActive: true,
  })

  info('Admin user created', { event: 'CreateAdmin', metadata: { userId: admin.id, username: admin.username } })
  return true
}

async function main(): Promise<void> {
  const env = bootstrap()
  const password = process.env.ADMIN_PASSWORD
  if (!password) {
    throw new Error('ADMIN_PASSWORD is required')
  }

  // No acting user: the seed itself is not audited
  const service = new UserService({ db: getDatabase(), notifier: getNotifier() })
  try {
    await createAdmin(service, {
      username: process.env.ADMIN_USERNAME || 'admin',
      password,
      email: env.ADMIN_EMAIL,
    })
  } finally {
    await closeDatabase()
  }
}

if (process.argv[1] && import.meta.url.endsWith(process.argv[1].replace(/\\/g, '/'))) {
  main().catch((err: unknown) => {
    fatal('Failed to create admin user', { event: 'CreateAdminError', metadata: { err } })
    process.exitCode = 1
  })
}
