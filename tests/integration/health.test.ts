import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import request from 'supertest'
import { createTestApp, resetTestApp, type TestApp } from '../helpers/test-app.js'

describe('Health Routes', () => {
  let ctx: TestApp

  beforeEach(() => {
    ctx = createTestApp()
  })

  afterEach(() => {
    resetTestApp()
  })

  describe('GET /health', () => {
    it('should return healthy status when postgres is up', async () => {
      const response = await request(ctx.app).get('/health')

      expect(response.status).toBe(200)
      expect(response.body).toMatchObject({
        status: 'healthy',
        services: { postgres: { status: 'up' } },
      })
      expect(response.body.timestamp).toBeDefined()
    })

    it('should return unhealthy status when postgres is down', async () => {
      ctx.db.healthy = false

      const response = await request(ctx.app).get('/health')

      expect(response.status).toBe(503)
      expect(response.body).toMatchObject({
        status: 'unhealthy',
        services: { postgres: { status: 'down' } },
      })
    })
  })

  describe('GET /health/live', () => {
    it('should return alive status', async () => {
      const response = await request(ctx.app).get('/health/live')

      expect(response.status).toBe(200)
      expect(response.body).toEqual({ status: 'alive' })
    })
  })

  describe('GET /health/ready', () => {
    it('should return ready when postgres is up', async () => {
      const response = await request(ctx.app).get('/health/ready')

      expect(response.status).toBe(200)
      expect(response.body).toEqual({ status: 'ready' })
    })

    it('should return not ready when postgres is down', async () => {
      ctx.db.healthy = false

      const response = await request(ctx.app).get('/health/ready')

      expect(response.status).toBe(503)
      expect(response.body).toEqual({ status: 'not ready' })
    })
  })

  it('should echo the request id header', async () => {
    const response = await request(ctx.app).get('/health/live').set('x-request-id', 'test-request-id')

    expect(response.headers['x-request-id']).toBe('test-request-id')
  })
})
