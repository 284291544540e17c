import { describe, it, expect, vi } from 'vitest'
import type { Request, Response } from 'express'
import { validate, commonSchemas, z } from '../../src/lib/validation.js'
import { createPaginatedResponse, getPaginationSkipLimit } from '../../src/lib/pagination.js'
import { createClientSchema } from '../../src/modules/clients/client.schema.js'
import { ApiError } from '../../src/lib/errors.js'

describe('commonSchemas', () => {
  describe('pagination', () => {
    it('should default and coerce values', () => {
      expect(commonSchemas.pagination.parse({})).toEqual({ page: 1, pageSize: 10 })
      expect(commonSchemas.pagination.parse({ page: '3', pageSize: '25' })).toEqual({ page: 3, pageSize: 25 })
    })

    it('should cap pageSize at 100', () => {
      expect(commonSchemas.pagination.safeParse({ pageSize: '101' }).success).toBe(false)
      expect(commonSchemas.pagination.safeParse({ page: '0' }).success).toBe(false)
    })

    it('should allow up to 500 audit entries per page', () => {
      expect(commonSchemas.auditPagination.parse({})).toEqual({ page: 1, pageSize: 100 })
      expect(commonSchemas.auditPagination.parse({ pageSize: '500' }).pageSize).toBe(500)
      expect(commonSchemas.auditPagination.safeParse({ pageSize: '501' }).success).toBe(false)
    })
  })

  describe('idParam', () => {
    it('should coerce positive integer ids', () => {
      expect(commonSchemas.idParam.parse({ id: '12' })).toEqual({ id: 12 })
      expect(commonSchemas.idParam.safeParse({ id: '0' }).success).toBe(false)
      expect(commonSchemas.idParam.safeParse({ id: 'abc' }).success).toBe(false)
    })
  })
})

describe('validate middleware', () => {
  function run(schema: Parameters<typeof validate>[0], req: Partial<Request>) {
    const next = vi.fn<(err?: unknown) => void>()
    validate(schema)(req as Request, {} as Response, next)
    return next
  }

  it('should replace the body with parsed data', () => {
    const req: Partial<Request> = { body: { clientType: 'natural', contactName: '  Juan Perez  ' } }

    const next = run({ body: createClientSchema }, req)

    expect(next).toHaveBeenCalledWith()
    expect(req.body).toEqual({ clientType: 'natural', contactName: 'Juan Perez' })
  })

  it('should collect errors from every part', () => {
    const next = run(
      { params: commonSchemas.idParam, body: z.object({ name: z.string() }) },
      { params: { id: 'abc' }, body: {} }
    )

    const error = next.mock.calls[0]?.[0]
    expect(error).toBeInstanceOf(ApiError)
    expect(error).toMatchObject({
      statusCode: 400,
      message: 'Validation failed',
      details: ['params: id: Expected number, received nan', 'body: name: Required'],
    })
  })
})

describe('pagination helpers', () => {
  it('should translate pages to skip and limit', () => {
    expect(getPaginationSkipLimit(1, 10)).toEqual({ skip: 0, limit: 10 })
    expect(getPaginationSkipLimit(3, 25)).toEqual({ skip: 50, limit: 25 })
  })

  it('should describe the surrounding pages', () => {
    expect(createPaginatedResponse(['a', 'b'], 12, 2, 5)).toEqual({
      data: ['a', 'b'],
      pagination: { page: 2, pageSize: 5, total: 12, totalPages: 3, hasNext: true, hasPrev: true },
    })
    expect(createPaginatedResponse([], 0, 1, 10).pagination).toMatchObject({
      totalPages: 0,
      hasNext: false,
      hasPrev: false,
    })
  })
})
