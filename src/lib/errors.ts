import httpStatus from 'http-status'

export interface ApiErrorOptions {
  statusCode: number
  message?: string
  isOperational?: boolean
  details?: unknown
  cause?: Error
}

/**
 * Error with an HTTP status. Operational errors are expected outcomes (bad input, missing
 * rows, denied access) and are reported to the client as-is.
 */
export class ApiError extends Error {
  public readonly statusCode: number
  public readonly isOperational: boolean
  public readonly details?: unknown

  constructor(options: ApiErrorOptions) {
    super(options.message || (httpStatus[options.statusCode] as string) || 'Unknown Error', {
      cause: options.cause,
    })

    this.statusCode = options.statusCode
    this.isOperational = options.isOperational ?? true
    this.details = options.details

    Error.captureStackTrace(this, this.constructor)
    Object.setPrototypeOf(this, ApiError.prototype)
  }

  toJSON() {
    return {
      statusCode: this.statusCode,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

const withStatus =
  (statusCode: number) =>
  (message?: string, details?: unknown): ApiError =>
    new ApiError({ statusCode, message, details })

export const badRequest = withStatus(httpStatus.BAD_REQUEST)
export const unauthorized = withStatus(httpStatus.UNAUTHORIZED)
export const forbidden = withStatus(httpStatus.FORBIDDEN)
export const notFound = withStatus(httpStatus.NOT_FOUND)
export const conflict = withStatus(httpStatus.CONFLICT)

/**
 * 404 for a missing entity row, e.g. `Client with id 7 not found`.
 */
export const entityNotFound = (resource: string, id: number | string) =>
  notFound(`${resource} with id ${id} not found`, { resource, id })

export const internalError = (message?: string, cause?: Error) =>
  new ApiError({
    statusCode: httpStatus.INTERNAL_SERVER_ERROR,
    message,
    isOperational: false,
    cause,
  })

// PostgreSQL SQLSTATE codes
const CONSTRAINT_MESSAGES: Record<string, string> = {
  '23505': 'Database constraint violation',
  '23503': 'Record is referenced by other records',
}

function sqlState(error: Error): string | null {
  if (!('code' in error) || typeof error.code !== 'string') return null
  return /^[0-9A-Z]{5}$/.test(error.code) ? error.code : null
}

/**
 * 409 for a unique or foreign-key violation raised by the database, null for anything else.
 */
export function fromConstraintViolation(error: Error): ApiError | null {
  const code = sqlState(error)
  const message = code ? CONSTRAINT_MESSAGES[code] : undefined
  if (!message) return null

  return new ApiError({ statusCode: httpStatus.CONFLICT, message, cause: error })
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError
}
