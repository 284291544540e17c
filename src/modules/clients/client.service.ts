import type { Condition, Repository } from '../../db/database.js'
import { DEFAULT_LIST_LIMIT } from '../../db/repository.js'
import { buildDateRangeFilter, combineFilters } from '../../db/query-builder.js'
import { AuditRecorder, ChangeTrackingMutator } from '../../lib/audit/index.js'
import { getServiceDeps, type Page, type ServiceDeps } from '../../lib/base-service.js'
import { badRequest } from '../../lib/errors.js'
import { info } from '../../lib/logger.js'
import { normalizePhone, tryNormalizePhone } from '../../lib/phone.js'
import { type Client, ClientType, clientEntity } from './client.entity.js'
import { type Lead, leadEntity } from '../leads/lead.entity.js'
import type {
  CheckExistsQuery,
  ClientSearchFilters,
  CreateClientInput,
  UpdateClientInput,
} from './client.schema.js'

export interface ClientWithLeads extends Client {
  leads: Lead[]
}

function requireCompanyNameForJuridical(clientType: ClientType, companyName: string | null | undefined) {
  if (clientType === ClientType.JURIDICAL && !companyName?.trim()) {
    throw badRequest('Company name is required for juridical clients')
  }
}

// Stored phone match: exact on the normalized number, substring when it cannot be normalized
function phoneCondition(phone: string): Condition<Client> {
  const normalized = tryNormalizePhone(phone)
  return normalized
    ? { op: 'eq', field: 'phone', value: normalized }
    : { op: 'contains', field: 'phone', value: phone }
}

export class ClientService {
  private readonly mutator: ChangeTrackingMutator<Client>

  constructor(private readonly deps: ServiceDeps) {
    const recorder = new AuditRecorder(deps.db, deps.actingUserId)
    this.mutator = new ChangeTrackingMutator(deps.db, clientEntity, recorder)
  }

  private get clients(): Repository<Client> {
    return this.deps.db.repository(clientEntity)
  }

  private async assertPhoneAvailable(phone: string, exceptId?: number): Promise<void> {
    const existing = await this.clients.getByField('phone', phone)
    if (existing && existing.id !== exceptId) {
      throw badRequest(`Client with phone '${phone}' already exists`)
    }
  }

  /**
   * @throws {ApiError} 400 on an invalid or duplicate phone, or a juridical client without company
   */
  async createClient(input: CreateClientInput): Promise<Client> {
    const phone = input.phone ? normalizePhone(input.phone) : null
    if (phone) {
      await this.assertPhoneAvailable(phone)
    }

    requireCompanyNameForJuridical(input.clientType, input.companyName)

    const client = await this.mutator.create({
      clientType: input.clientType,
      contactName: input.contactName,
      companyName: input.companyName ?? null,
      phone,
      email: input.email ?? null,
      instagram: input.instagram ?? null,
      address: input.address ?? null,
      country: input.country ?? null,
    })

    info('Client created', { event: 'ClientCreated', metadata: { clientId: client.id } })

    await this.deps.notifier.notifyNewClient({
      clientId: client.id,
      clientName: client.contactName,
      phone: client.phone,
    })

    return client
  }

  /**
   * Partial update. The juridical rule is checked against the record as it will be stored.
   *
   * @throws {ApiError} 404 when the client does not exist
   */
  async updateClient(id: number, input: UpdateClientInput): Promise<Client> {
    const current = await this.clients.getByIdOrFail(id)

    const phone = input.phone ? normalizePhone(input.phone) : undefined
    if (phone) {
      await this.assertPhoneAvailable(phone, id)
    }

    requireCompanyNameForJuridical(
      input.clientType ?? current.clientType,
      input.companyName ?? current.companyName
    )

    return this.mutator.update(id, {
      clientType: input.clientType ?? undefined,
      contactName: input.contactName ?? undefined,
      companyName: input.companyName,
      phone,
      email: input.email,
      instagram: input.instagram,
      address: input.address,
      country: input.country,
    })
  }

  getById(id: number): Promise<Client | null> {
    return this.clients.getById(id)
  }

  async getClientWithLeads(id: number): Promise<ClientWithLeads | null> {
    const client = await this.clients.getById(id)
    if (!client) return null

    const leads = await this.deps.db.repository(leadEntity).listByField('clientId', id)
    return { ...client, leads }
  }

  /**
   * @throws {ApiError} 400 when the phone cannot be normalized
   */
  getByPhone(phone: string): Promise<Client | null> {
    return this.clients.getByField('phone', normalizePhone(phone))
  }

  async listClients(skip = 0, limit = DEFAULT_LIST_LIMIT): Promise<Page<Client>> {
    const [items, total] = await Promise.all([this.clients.listAll(skip, limit), this.clients.count()])
    return { items, total }
  }

  /**
   * Contact or company name containing `name`, case-insensitive.
   */
  searchByName(name: string, skip = 0, limit = DEFAULT_LIST_LIMIT): Promise<Client[]> {
    return this.clients.find({
      where: [
        {
          op: 'or',
          conditions: [
            { op: 'contains', field: 'contactName', value: name },
            { op: 'contains', field: 'companyName', value: name },
          ],
        },
      ],
      orderBy: [{ field: 'id', direction: 'asc' }],
      skip,
      limit,
    })
  }

  advancedSearch(filters: ClientSearchFilters, skip = 0, limit = DEFAULT_LIST_LIMIT): Promise<Client[]> {
    const instagram = filters.instagram
    const where = combineFilters<Client>(
      filters.contactName && { op: 'contains', field: 'contactName', value: filters.contactName },
      filters.companyName && { op: 'contains', field: 'companyName', value: filters.companyName },
      filters.phone && phoneCondition(filters.phone),
      filters.email && { op: 'contains', field: 'email', value: filters.email },
      instagram && {
        op: 'or',
        conditions: [
          { op: 'contains', field: 'instagram', value: instagram },
          { op: 'contains', field: 'instagram', value: instagram.replace(/^@+/, '') },
        ],
      },
      filters.clientType !== undefined && { op: 'eq', field: 'clientType', value: filters.clientType },
      filters.country && { op: 'contains', field: 'country', value: filters.country },
      buildDateRangeFilter<Client>('createdAt', filters.dateFrom, filters.dateTo)
    )

    return this.clients.find({ where, orderBy: [{ field: 'id', direction: 'asc' }], skip, limit })
  }

  /**
   * First client matching any of phone, email (case-insensitive) or instagram (with or
   * without a leading `@`).
   *
   * @throws {ApiError} 400 when no parameter is given
   */
  async checkExists(query: CheckExistsQuery): Promise<Client | null> {
    const { phone, email, instagram } = query
    const conditions = combineFilters<Client>(
      phone && phoneCondition(phone),
      email && { op: 'iequals', field: 'email', value: email },
      instagram && { op: 'iequals', field: 'instagram', value: instagram },
      instagram && { op: 'iequals', field: 'instagram', value: instagram.replace(/^@+/, '') }
    )

    if (conditions.length === 0) {
      throw badRequest('At least one search parameter is required (phone, email, or instagram)')
    }

    return this.clients.findOne({
      where: [{ op: 'or', conditions }],
      orderBy: [{ field: 'id', direction: 'asc' }],
    })
  }

  async deleteClient(id: number): Promise<void> {
    await this.mutator.delete(id)
    info('Client deleted', { event: 'ClientDeleted', metadata: { clientId: id } })
  }
}

export function createClientService(): ClientService {
  return new ClientService(getServiceDeps())
}
