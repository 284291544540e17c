import { vi } from 'vitest'
import type { Insert } from '../../src/db/entity.js'
import type { ServiceDeps } from '../../src/lib/base-service.js'
import type {
  LeadStatusChangeNotification,
  NewClientNotification,
  NewLeadNotification,
} from '../../src/lib/notifications/index.js'
import type { UserContext } from '../../src/lib/request-context.js'
import { type Client, ClientType, clientEntity } from '../../src/modules/clients/client.entity.js'
import { Channel, type Lead, LeadStatus, leadEntity } from '../../src/modules/leads/lead.entity.js'
import { type User, UserRole, userEntity } from '../../src/modules/users/user.entity.js'
import { InMemoryDatabase } from './in-memory-database.js'

/**
 * Notifier whose methods are spies resolving to true
 */
export function createFakeNotifier() {
  return {
    notifyNewClient: vi.fn(async (_event: NewClientNotification) => true),
    notifyNewLead: vi.fn(async (_event: NewLeadNotification) => true),
    notifyLeadStatusChange: vi.fn(async (_event: LeadStatusChangeNotification) => true),
  }
}

export type FakeNotifier = ReturnType<typeof createFakeNotifier>

export function createDeps(db: InMemoryDatabase, notifier: FakeNotifier, actingUserId?: number): ServiceDeps {
  return { db, notifier, actingUserId }
}

// Rows written straight to the store, without going through the audited services

export function seedUser(db: InMemoryDatabase, overrides: Partial<Insert<User>> = {}): Promise<User> {
  return db.repository(userEntity).create({
    username: 'seller',
    email: null,
    hashedPassword: 'not-a-real-hash',
    role: UserRole.SALES,
    isActive: true,
    ...overrides,
  })
}

export function seedClient(db: InMemoryDatabase, overrides: Partial<Insert<Client>> = {}): Promise<Client> {
  return db.repository(clientEntity).create({
    clientType: ClientType.NATURAL,
    contactName: 'Juan Perez',
    companyName: null,
    phone: '+584241234567',
    email: null,
    instagram: null,
    address: 'Calle 123',
    country: null,
    ...overrides,
  })
}

export function seedLead(
  db: InMemoryDatabase,
  values: Pick<Lead, 'clientId' | 'createdById'> & Partial<Insert<Lead>>
): Promise<Lead> {
  return db.repository(leadEntity).create({
    channel: Channel.WEB,
    status: LeadStatus.NEW,
    adminNotes: null,
    salesNotes: null,
    assignedToId: null,
    ...values,
  })
}

export function userContext(user: User): UserContext {
  return { id: user.id, username: user.username, role: user.role }
}
