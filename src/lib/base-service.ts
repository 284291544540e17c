/**
 * Shared pieces of the service layer: the dependencies every entity service is built from.
 */

import type { Database } from '../db/database.js'
import { getDatabase } from '../db/postgres.js'
import { getNotifier, type Notifier } from './notifications/index.js'
import { getUserId } from './request-context.js'

export interface ServiceDeps {
  db: Database
  /** Acting user for audit attribution; undefined outside an authenticated request */
  actingUserId?: number
  notifier: Notifier
}

/**
 * Dependencies for the current request: process database, process notifier and the user
 * from the request context.
 */
export function getServiceDeps(): ServiceDeps {
  return {
    db: getDatabase(),
    actingUserId: getUserId(),
    notifier: getNotifier(),
  }
}

/**
 * A page of results plus the total matching count
 */
export interface Page<T> {
  items: T[]
  total: number
}
