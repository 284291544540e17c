import type { Repository } from '../../db/database.js'
import { DEFAULT_LIST_LIMIT } from '../../db/repository.js'
import { buildDateRangeFilter, combineFilters } from '../../db/query-builder.js'
import { AuditRecorder, ChangeTrackingMutator } from '../../lib/audit/index.js'
import { getServiceDeps, type Page, type ServiceDeps } from '../../lib/base-service.js'
import { badRequest, unauthorized } from '../../lib/errors.js'
import { info } from '../../lib/logger.js'
import { type Lead, LeadStatus, leadEntity } from './lead.entity.js'
import { type Client, clientEntity } from '../clients/client.entity.js'
import { type PublicUser, toPublicUser, userEntity } from '../users/user.entity.js'
import type {
  CreateLeadInput,
  LeadListFilters,
  LeadSearchFilters,
  UpdateLeadInput,
} from './lead.schema.js'

export interface LeadWithDetails extends Lead {
  client: Client | null
  createdBy: PublicUser | null
  assignedTo: PublicUser | null
}

export interface LeadStats {
  byStatus: Record<string, number>
  byChannel: Record<string, number>
}

const NEWEST_FIRST = [
  { field: 'createdAt', direction: 'desc' },
  { field: 'id', direction: 'desc' },
] as const

export class LeadService {
  private readonly mutator: ChangeTrackingMutator<Lead>

  constructor(private readonly deps: ServiceDeps) {
    const recorder = new AuditRecorder(deps.db, deps.actingUserId)
    this.mutator = new ChangeTrackingMutator(deps.db, leadEntity, recorder)
  }

  private get leads(): Repository<Lead> {
    return this.deps.db.repository(leadEntity)
  }

  private async assertClientExists(clientId: number): Promise<void> {
    if (!(await this.deps.db.repository(clientEntity).exists(clientId))) {
      throw badRequest('The specified client does not exist.')
    }
  }

  private async assertUserExists(userId: number): Promise<void> {
    if (!(await this.deps.db.repository(userEntity).exists(userId))) {
      throw badRequest('The specified user does not exist.')
    }
  }

  /**
   * Create a lead attributed to the acting user and notify the administrator.
   *
   * @throws {ApiError} 400 when the client or assignee does not exist (nothing is written)
   */
  async createLead(input: CreateLeadInput): Promise<Lead> {
    const createdById = this.deps.actingUserId
    if (createdById === undefined) {
      throw unauthorized('Could not validate credentials')
    }

    await this.assertClientExists(input.clientId)
    if (input.assignedToId) {
      await this.assertUserExists(input.assignedToId)
    }

    const lead = await this.mutator.create({
      clientId: input.clientId,
      channel: input.channel,
      status: input.status ?? LeadStatus.NEW,
      adminNotes: input.adminNotes ?? null,
      salesNotes: input.salesNotes ?? null,
      createdById,
      assignedToId: input.assignedToId ?? null,
    })

    info('Lead created', { event: 'LeadCreated', metadata: { leadId: lead.id, clientId: lead.clientId } })

    const client = await this.deps.db.repository(clientEntity).getById(lead.clientId)
    if (client) {
      await this.deps.notifier.notifyNewLead({
        leadId: lead.id,
        clientName: client.contactName,
        channel: lead.channel,
      })
    }

    return lead
  }

  async updateLead(id: number, input: UpdateLeadInput): Promise<Lead> {
    if (input.clientId) {
      await this.assertClientExists(input.clientId)
    }
    if (input.assignedToId) {
      await this.assertUserExists(input.assignedToId)
    }

    return this.mutator.update(id, {
      clientId: input.clientId ?? undefined,
      channel: input.channel ?? undefined,
      status: input.status ?? undefined,
      adminNotes: input.adminNotes,
      salesNotes: input.salesNotes,
      assignedToId: input.assignedToId,
    })
  }

  /**
   * Change the status. Writing, auditing and notifying only happen when it differs from the
   * stored one.
   *
   * @throws {ApiError} 404 when the lead does not exist
   */
  async updateStatus(id: number, status: LeadStatus): Promise<Lead> {
    const { before, after, changed } = await this.mutator.apply(id, { status })
    if (!changed) {
      return after
    }

    const client = await this.deps.db.repository(clientEntity).getById(after.clientId)
    if (client) {
      await this.deps.notifier.notifyLeadStatusChange({
        leadId: after.id,
        clientName: client.contactName,
        oldStatus: before.status,
        newStatus: after.status,
      })
    }

    return after
  }

  /**
   * @throws {ApiError} 400 when the assignee does not exist, 404 when the lead does not
   */
  async assignLead(id: number, assignedToId: number): Promise<Lead> {
    await this.assertUserExists(assignedToId)
    return this.mutator.update(id, { assignedToId })
  }

  getById(id: number): Promise<Lead | null> {
    return this.leads.getById(id)
  }

  async getLeadWithDetails(id: number): Promise<LeadWithDetails | null> {
    const lead = await this.leads.getById(id)
    if (!lead) return null

    const users = this.deps.db.repository(userEntity)
    const [client, createdBy, assignedTo] = await Promise.all([
      this.deps.db.repository(clientEntity).getById(lead.clientId),
      users.getById(lead.createdById),
      lead.assignedToId === null ? Promise.resolve(null) : users.getById(lead.assignedToId),
    ])

    return {
      ...lead,
      client,
      createdBy: createdBy && toPublicUser(createdBy),
      assignedTo: assignedTo && toPublicUser(assignedTo),
    }
  }

  async listLeads(filters: LeadListFilters = {}, skip = 0, limit = DEFAULT_LIST_LIMIT): Promise<Page<Lead>> {
    const where = combineFilters<Lead>(
      filters.status !== undefined && { op: 'eq', field: 'status', value: filters.status },
      filters.channel !== undefined && { op: 'eq', field: 'channel', value: filters.channel },
      filters.assignedToId !== undefined && { op: 'eq', field: 'assignedToId', value: filters.assignedToId }
    )

    const [items, total] = await Promise.all([
      this.leads.find({ where, orderBy: [{ field: 'id', direction: 'asc' }], skip, limit }),
      this.leads.count(where),
    ])
    return { items, total }
  }

  getLeadsByClient(clientId: number): Promise<Lead[]> {
    return this.leads.listByField('clientId', clientId)
  }

  async getStats(): Promise<LeadStats> {
    const [byStatus, byChannel] = await Promise.all([
      this.leads.countBy('status'),
      this.leads.countBy('channel'),
    ])
    return { byStatus, byChannel }
  }

  /**
   * Leads created in the last `hours`, newest first.
   */
  getRecentLeads(hours = 24, limit = 10): Promise<Lead[]> {
    const since = new Date(Date.now() - hours * 60 * 60 * 1000)
    return this.leads.find({
      where: [{ op: 'gte', field: 'createdAt', value: since }],
      orderBy: [...NEWEST_FIRST],
      limit,
    })
  }

  advancedSearch(filters: LeadSearchFilters, skip = 0, limit = DEFAULT_LIST_LIMIT): Promise<Lead[]> {
    const where = combineFilters<Lead>(
      filters.clientId !== undefined && { op: 'eq', field: 'clientId', value: filters.clientId },
      filters.status !== undefined && { op: 'eq', field: 'status', value: filters.status },
      filters.channel !== undefined && { op: 'eq', field: 'channel', value: filters.channel },
      filters.createdById !== undefined && { op: 'eq', field: 'createdById', value: filters.createdById },
      filters.assignedToId !== undefined && { op: 'eq', field: 'assignedToId', value: filters.assignedToId },
      buildDateRangeFilter<Lead>('createdAt', filters.dateFrom, filters.dateTo)
    )

    return this.leads.find({ where, orderBy: [...NEWEST_FIRST], skip, limit })
  }

  async deleteLead(id: number): Promise<void> {
    await this.mutator.delete(id)
    info('Lead deleted', { event: 'LeadDeleted', metadata: { leadId: id } })
  }
}

export function createLeadService(): LeadService {
  return new LeadService(getServiceDeps())
}
