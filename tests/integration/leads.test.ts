import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import request from 'supertest'
import type { Client } from '../../src/modules/clients/client.entity.js'
import { Channel, LeadStatus } from '../../src/modules/leads/lead.entity.js'
import { type User, UserRole } from '../../src/modules/users/user.entity.js'
import { seedClient, seedLead, seedUser } from '../helpers/fixtures.js'
import { authHeader, createTestApp, resetTestApp, type TestApp } from '../helpers/test-app.js'

describe('Lead Routes', () => {
  let ctx: TestApp
  let seller: User
  let client: Client
  let auth: string

  beforeEach(async () => {
    ctx = createTestApp()
    seller = await seedUser(ctx.db)
    client = await seedClient(ctx.db)
    auth = await authHeader(seller)
  })

  afterEach(() => {
    resetTestApp()
  })

  describe('POST /api/v1/leads', () => {
    it('should create a lead attributed to the caller', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/leads')
        .set('authorization', auth)
        .send({ clientId: client.id, channel: 'whatsapp', salesNotes: 'Wants a quote' })

      expect(response.status).toBe(201)
      expect(response.body.message).toBe('Lead created successfully')
      expect(response.body.data).toMatchObject({
        id: 1,
        clientId: client.id,
        channel: 'whatsapp',
        status: 'new',
        salesNotes: 'Wants a quote',
        adminNotes: null,
        createdById: seller.id,
        assignedToId: null,
      })
      expect(ctx.notifier.notifyNewLead).toHaveBeenCalledWith({
        leadId: 1,
        clientName: 'Juan Perez',
        channel: Channel.WHATSAPP,
      })
      expect(ctx.db.rows('audit_logs')).toHaveLength(1)
    })

    it('should reject an unknown client without writing', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/leads')
        .set('authorization', auth)
        .send({ clientId: 99, channel: 'web' })

      expect(response.status).toBe(400)
      expect(response.body.message).toBe('The specified client does not exist.')
      expect(ctx.db.rows('leads')).toEqual([])
      expect(ctx.db.rows('audit_logs')).toEqual([])
    })

    it('should reject an unknown assignee', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/leads')
        .set('authorization', auth)
        .send({ clientId: client.id, channel: 'web', assignedToId: 99 })

      expect(response.status).toBe(400)
      expect(response.body.message).toBe('The specified user does not exist.')
    })

    it('should reject an unknown channel', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/leads')
        .set('authorization', auth)
        .send({ clientId: client.id, channel: 'fax' })

      expect(response.status).toBe(400)
      expect(response.body.message).toBe('Validation failed')
    })
  })

  describe('GET /api/v1/leads', () => {
    it('should filter by status', async () => {
      await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })
      await seedLead(ctx.db, { clientId: client.id, createdById: seller.id, status: LeadStatus.QUOTED })

      const response = await request(ctx.app).get('/api/v1/leads?status=quoted').set('authorization', auth)

      expect(response.status).toBe(200)
      expect(response.body.data).toHaveLength(1)
      expect(response.body.data[0].id).toBe(2)
      expect(response.body.pagination.total).toBe(1)
    })

    it('should count leads by status and channel', async () => {
      await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })
      await seedLead(ctx.db, { clientId: client.id, createdById: seller.id, channel: Channel.INSTAGRAM })
      await seedLead(ctx.db, {
        clientId: client.id,
        createdById: seller.id,
        channel: Channel.INSTAGRAM,
        status: LeadStatus.CLOSED,
      })

      const response = await request(ctx.app).get('/api/v1/leads/stats').set('authorization', auth)

      expect(response.status).toBe(200)
      expect(response.body.data).toEqual({
        byStatus: { new: 2, closed: 1 },
        byChannel: { web: 1, instagram: 2 },
      })
    })

    it('should list recent leads newest first', async () => {
      await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })
      await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })

      const response = await request(ctx.app).get('/api/v1/leads/recent?hours=1').set('authorization', auth)

      expect(response.status).toBe(200)
      expect(response.body.data.map((l: { id: number }) => l.id)).toEqual([2, 1])
    })

    it('should list the leads of a client', async () => {
      const other = await seedClient(ctx.db, { contactName: 'Ana', phone: null })
      await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })
      await seedLead(ctx.db, { clientId: other.id, createdById: seller.id })

      const response = await request(ctx.app).get(`/api/v1/leads/client/${other.id}`).set('authorization', auth)

      expect(response.status).toBe(200)
      expect(response.body.data.map((l: { id: number }) => l.id)).toEqual([2])
    })
  })

  describe('GET /api/v1/leads/:id', () => {
    it('should return the lead with its client and users', async () => {
      const lead = await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })

      const response = await request(ctx.app).get(`/api/v1/leads/${lead.id}`).set('authorization', auth)

      expect(response.status).toBe(200)
      expect(response.body.data.client.contactName).toBe('Juan Perez')
      expect(response.body.data.createdBy.username).toBe('seller')
      expect(response.body.data.createdBy).not.toHaveProperty('hashedPassword')
      expect(response.body.data.assignedTo).toBeNull()
    })

    it('should answer 404 for an unknown lead', async () => {
      const response = await request(ctx.app).get('/api/v1/leads/99').set('authorization', auth)

      expect(response.status).toBe(404)
      expect(response.body.message).toBe('Lead not found')
    })
  })

  describe('PATCH /api/v1/leads/:id/status', () => {
    it('should change the status and notify', async () => {
      const lead = await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })

      const response = await request(ctx.app)
        .patch(`/api/v1/leads/${lead.id}/status`)
        .set('authorization', auth)
        .send({ status: 'contacted' })

      expect(response.status).toBe(200)
      expect(response.body.message).toBe('Lead status updated successfully')
      expect(response.body.data.status).toBe('contacted')
      expect(ctx.notifier.notifyLeadStatusChange).toHaveBeenCalledWith({
        leadId: lead.id,
        clientName: 'Juan Perez',
        oldStatus: LeadStatus.NEW,
        newStatus: LeadStatus.CONTACTED,
      })
      expect(ctx.db.rows('audit_logs')[0]).toMatchObject({
        action: 'update',
        old_values: { status: 'new' },
        new_values: { status: 'contacted' },
      })
    })

    it('should not write or notify when the status is unchanged', async () => {
      const lead = await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })

      const response = await request(ctx.app)
        .patch(`/api/v1/leads/${lead.id}/status`)
        .set('authorization', auth)
        .send({ status: 'new' })

      expect(response.status).toBe(200)
      expect(ctx.notifier.notifyLeadStatusChange).not.toHaveBeenCalled()
      expect(ctx.db.rows('audit_logs')).toEqual([])
    })

    it('should answer 404 for an unknown lead', async () => {
      const response = await request(ctx.app)
        .patch('/api/v1/leads/99/status')
        .set('authorization', auth)
        .send({ status: 'contacted' })

      expect(response.status).toBe(404)
      expect(response.body.message).toBe('Lead with id 99 not found')
    })
  })

  describe('PATCH /api/v1/leads/:id/assign', () => {
    it('should assign the lead', async () => {
      const other = await seedUser(ctx.db, { username: 'closer', role: UserRole.SALES })
      const lead = await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })

      const response = await request(ctx.app)
        .patch(`/api/v1/leads/${lead.id}/assign`)
        .set('authorization', auth)
        .send({ assignedToId: other.id })

      expect(response.status).toBe(200)
      expect(response.body.message).toBe('Lead assigned successfully')
      expect(response.body.data.assignedToId).toBe(other.id)
    })

    it('should reject an unknown assignee', async () => {
      const lead = await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })

      const response = await request(ctx.app)
        .patch(`/api/v1/leads/${lead.id}/assign`)
        .set('authorization', auth)
        .send({ assignedToId: 99 })

      expect(response.status).toBe(400)
      expect(response.body.message).toBe('The specified user does not exist.')
    })
  })

  describe('DELETE /api/v1/leads/:id', () => {
    it('should delete the lead', async () => {
      const lead = await seedLead(ctx.db, { clientId: client.id, createdById: seller.id })

      const response = await request(ctx.app).delete(`/api/v1/leads/${lead.id}`).set('authorization', auth)

      expect(response.status).toBe(200)
      expect(response.body).toEqual({ message: 'Lead deleted successfully' })
      expect(ctx.db.rows('leads')).toEqual([])
      expect(ctx.db.rows('audit_logs')[0]).toMatchObject({ action: 'delete', new_values: null })
    })
  })
})
