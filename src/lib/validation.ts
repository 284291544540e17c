import { z, type ZodType, type ZodError } from 'zod'
import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { badRequest } from './errors.js'
import { AUDIT_LOG_MAX_PAGE_SIZE } from '../config/constants.js'

export interface ValidationSchema {
  params?: ZodType<unknown>
  query?: ZodType<unknown>
  body?: ZodType<unknown>
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ')
}

/**
 * Validate request parts. The parsed body replaces `req.body`; params and query are only
 * checked here and re-parsed by controllers with the same schema to get typed values.
 */
export function validate(schema: ValidationSchema): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const errors: string[] = []

    if (schema.params) {
      const result = schema.params.safeParse(req.params)
      if (!result.success) {
        errors.push(`params: ${formatZodError(result.error)}`)
      }
    }

    if (schema.query) {
      const result = schema.query.safeParse(req.query)
      if (!result.success) {
        errors.push(`query: ${formatZodError(result.error)}`)
      }
    }

    if (schema.body) {
      const result = schema.body.safeParse(req.body)
      if (!result.success) {
        errors.push(`body: ${formatZodError(result.error)}`)
      } else {
        req.body = result.data
      }
    }

    if (errors.length > 0) {
      return next(badRequest('Validation failed', errors))
    }

    next()
  }
}

const positiveId = z.coerce.number().int().positive()

// Common validation schemas
export const commonSchemas = {
  id: positiveId,

  pagination: z.object({
    page: z.coerce.number().int().min(1).default(1),
    pageSize: z.coerce.number().int().min(1).max(100).default(10),
  }),

  auditPagination: z.object({
    page: z.coerce.number().int().min(1).default(1),
    pageSize: z.coerce.number().int().min(1).max(AUDIT_LOG_MAX_PAGE_SIZE).default(100),
  }),

  idParam: z.object({
    id: positiveId,
  }),

  /** ISO-8601 date or date-time in a query string */
  date: z.coerce.date(),
}

// Re-export zod for convenience
export { z }
