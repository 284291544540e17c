import { describe, it, expect, beforeEach } from 'vitest'
import { AuditAction, auditLogEntity } from '../../../src/lib/audit/index.js'
import { ClientType } from '../../../src/modules/clients/client.entity.js'
import { ClientService } from '../../../src/modules/clients/client.service.js'
import { InMemoryDatabase } from '../../helpers/in-memory-database.js'
import { createDeps, createFakeNotifier, seedClient, seedLead, seedUser, type FakeNotifier } from '../../helpers/fixtures.js'

describe('ClientService', () => {
  let db: InMemoryDatabase
  let notifier: FakeNotifier
  let service: ClientService
  let sellerId: number

  beforeEach(async () => {
    db = new InMemoryDatabase()
    notifier = createFakeNotifier()
    sellerId = (await seedUser(db)).id
    service = new ClientService(createDeps(db, notifier, sellerId))
  })

  const auditEntries = () => db.repository(auditLogEntity).find({ orderBy: [{ field: 'id', direction: 'asc' }] })

  describe('createClient', () => {
    it('should create a natural client, audit it and notify', async () => {
      const client = await service.createClient({
        clientType: ClientType.NATURAL,
        contactName: 'Juan Perez',
        phone: '+584241234567',
        address: 'Calle 123',
      })

      expect(client).toMatchObject({
        clientType: ClientType.NATURAL,
        contactName: 'Juan Perez',
        companyName: null,
        phone: '+584241234567',
        address: 'Calle 123',
        updatedAt: null,
      })

      const entries = await auditEntries()
      expect(entries).toHaveLength(1)
      expect(entries[0]).toMatchObject({
        tableName: 'clients',
        recordId: client.id,
        action: AuditAction.CREATE,
        changedById: sellerId,
      })

      expect(notifier.notifyNewClient).toHaveBeenCalledWith({
        clientId: client.id,
        clientName: 'Juan Perez',
        phone: '+584241234567',
      })
    })

    it('should store the normalized phone', async () => {
      const client = await service.createClient({
        clientType: ClientType.NATURAL,
        contactName: 'Ana Gomez',
        phone: '0424-123.4567',
      })

      expect(client.phone).toBe('+584241234567')
    })

    it('should accept a client without phone or address', async () => {
      const client = await service.createClient({ clientType: ClientType.NATURAL, contactName: 'Ana Gomez' })

      expect(client.phone).toBeNull()
      expect(client.address).toBeNull()
    })

    it('should require a company name for juridical clients', async () => {
      await expect(
        service.createClient({ clientType: ClientType.JURIDICAL, contactName: 'Maria Lopez', companyName: '  ' })
      ).rejects.toMatchObject({ statusCode: 400, message: 'Company name is required for juridical clients' })

      expect(db.rows('clients')).toEqual([])
      expect(notifier.notifyNewClient).not.toHaveBeenCalled()
    })

    it('should reject a phone already used by another client', async () => {
      await seedClient(db, { phone: '+584241234567' })

      await expect(
        service.createClient({ clientType: ClientType.NATURAL, contactName: 'Otro', phone: '04241234567' })
      ).rejects.toThrow("Client with phone '+584241234567' already exists")
    })

    it('should reject an invalid phone', async () => {
      await expect(
        service.createClient({ clientType: ClientType.NATURAL, contactName: 'Otro', phone: 'call me maybe' })
      ).rejects.toThrow('Invalid phone number: call me maybe')
    })

    it('should not audit without an acting user', async () => {
      const anonymous = new ClientService(createDeps(db, notifier))

      await anonymous.createClient({ clientType: ClientType.NATURAL, contactName: 'Juan Perez' })

      expect(await auditEntries()).toEqual([])
    })
  })

  describe('updateClient', () => {
    it('should change only the given fields and audit once', async () => {
      const client = await seedClient(db)

      const updated = await service.updateClient(client.id, { contactName: 'Juan A. Perez', email: null })

      expect(updated.contactName).toBe('Juan A. Perez')
      expect(updated.phone).toBe(client.phone)
      expect(await auditEntries()).toHaveLength(1)
    })

    it('should not write anything when nothing changes', async () => {
      const client = await seedClient(db)

      const result = await service.updateClient(client.id, { contactName: 'Juan Perez', phone: '04241234567' })

      expect(result).toEqual(client)
      expect(await auditEntries()).toEqual([])
    })

    it('should allow keeping its own phone but not taking another client phone', async () => {
      const client = await seedClient(db)
      await seedClient(db, { contactName: 'Ana', phone: '+584121112233' })

      await expect(service.updateClient(client.id, { phone: '+584241234567' })).resolves.toBeDefined()
      await expect(service.updateClient(client.id, { phone: '+584121112233' })).rejects.toThrow('already exists')
    })

    it('should check the juridical rule against the merged record', async () => {
      const client = await seedClient(db)

      await expect(service.updateClient(client.id, { clientType: ClientType.JURIDICAL })).rejects.toThrow(
        'Company name is required for juridical clients'
      )

      const updated = await service.updateClient(client.id, {
        clientType: ClientType.JURIDICAL,
        companyName: 'Perez C.A.',
      })
      expect(updated).toMatchObject({ clientType: ClientType.JURIDICAL, companyName: 'Perez C.A.' })
    })

    it('should reject an unknown client with 404', async () => {
      await expect(service.updateClient(99, { contactName: 'Nadie' })).rejects.toMatchObject({ statusCode: 404 })
    })
  })

  describe('lookups', () => {
    it('should return a client with its leads', async () => {
      const client = await seedClient(db)
      await seedLead(db, { clientId: client.id, createdById: sellerId })

      const result = await service.getClientWithLeads(client.id)

      expect(result?.leads).toHaveLength(1)
      expect(await service.getClientWithLeads(99)).toBeNull()
    })

    it('should find a client by any phone spelling', async () => {
      const client = await seedClient(db)

      expect(await service.getByPhone('0424 123 4567')).toEqual(client)
    })

    it('should page the client list with a total', async () => {
      await seedClient(db, { phone: null })
      await seedClient(db, { contactName: 'Ana', phone: null })
      await seedClient(db, { contactName: 'Luis', phone: null })

      const page = await service.listClients(1, 1)

      expect(page.total).toBe(3)
      expect(page.items.map((c) => c.contactName)).toEqual(['Ana'])
    })

    it('should search contact and company names case-insensitively', async () => {
      await seedClient(db, { contactName: 'Juan Perez', phone: null })
      await seedClient(db, {
        clientType: ClientType.JURIDICAL,
        contactName: 'Maria',
        companyName: 'Perezosos S.A.',
        phone: null,
      })
      await seedClient(db, { contactName: 'Luis', phone: null })

      const found = await service.searchByName('PEREZ')

      expect(found.map((c) => c.contactName)).toEqual(['Juan Perez', 'Maria'])
    })
  })

  describe('advancedSearch', () => {
    it('should combine filters', async () => {
      await seedClient(db, { country: 'Venezuela' })
      await seedClient(db, { contactName: 'Ana', phone: '+584121112233', country: 'Colombia' })

      const found = await service.advancedSearch({ country: 'venez', contactName: 'juan' })

      expect(found.map((c) => c.contactName)).toEqual(['Juan Perez'])
    })

    it('should match instagram with or without the leading @', async () => {
      await seedClient(db, { instagram: 'juanp' })

      expect(await service.advancedSearch({ instagram: '@juanp' })).toHaveLength(1)
    })

    it('should match the stored phone in any spelling', async () => {
      await seedClient(db)

      expect(await service.advancedSearch({ phone: '04241234567' })).toHaveLength(1)
      expect(await service.advancedSearch({ phone: '+58 424 123 4567' })).toHaveLength(1)
      expect(await service.advancedSearch({ phone: '+584121112233' })).toEqual([])
    })
  })

  describe('checkExists', () => {
    it('should require at least one parameter', async () => {
      await expect(service.checkExists({})).rejects.toThrow(
        'At least one search parameter is required (phone, email, or instagram)'
      )
    })

    it('should match email case-insensitively and instagram without @', async () => {
      const client = await seedClient(db, { email: 'juan@example.com', instagram: 'juanp' })

      expect(await service.checkExists({ email: 'JUAN@example.com' })).toEqual(client)
      expect(await service.checkExists({ instagram: '@juanp' })).toEqual(client)
      expect(await service.checkExists({ email: 'nobody@example.com' })).toBeNull()
    })
  })

  describe('deleteClient', () => {
    it('should delete and audit the removal', async () => {
      const client = await seedClient(db)

      await service.deleteClient(client.id)

      expect(await service.getById(client.id)).toBeNull()
      const entries = await auditEntries()
      expect(entries).toHaveLength(1)
      expect(entries[0]).toMatchObject({ action: AuditAction.DELETE, newValues: null })
    })
  })
})
