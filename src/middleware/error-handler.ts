import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express'
import httpStatus from 'http-status'
import { UnauthorizedError } from 'express-oauth2-jwt-bearer'
import { ZodError } from 'zod'
import { ApiError, fromConstraintViolation, isApiError } from '../lib/errors.js'
import { getLogger, getRequestId } from '../lib/request-context.js'
import { logger as rootLogger, cleanObject } from '../lib/logger.js'
import { isProduction } from '../config/env.js'

interface ErrorResponse {
  statusCode: number
  message: string
  requestId: string
  details?: unknown
  stack?: string
}

function convertToApiError(err: Error): ApiError {
  // Already an ApiError
  if (isApiError(err)) {
    return err
  }

  // Missing, malformed, expired or mis-signed bearer token
  if (err instanceof UnauthorizedError) {
    return new ApiError({
      statusCode: httpStatus.UNAUTHORIZED,
      message: 'Invalid or expired token',
      isOperational: true,
      cause: err,
    })
  }

  if (err instanceof ZodError) {
    return new ApiError({
      statusCode: httpStatus.BAD_REQUEST,
      message: 'Validation failed',
      isOperational: true,
      details: err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      cause: err,
    })
  }

  // Body parser errors (malformed JSON, payload too large)
  if (err instanceof SyntaxError && 'status' in err && err.status === httpStatus.BAD_REQUEST) {
    return new ApiError({
      statusCode: httpStatus.BAD_REQUEST,
      message: 'Malformed request body',
      isOperational: true,
      cause: err,
    })
  }

  const constraintError = fromConstraintViolation(err)
  if (constraintError) {
    return constraintError
  }

  // Default: internal server error
  return new ApiError({
    statusCode: httpStatus.INTERNAL_SERVER_ERROR,
    message: isProduction() ? 'Internal server error' : err.message,
    isOperational: false,
    cause: err,
  })
}

export const errorHandler: ErrorRequestHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const apiError = convertToApiError(err)
  const logger = getLogger() ?? rootLogger
  const requestId = getRequestId()

  // Log the error
  if (apiError.isOperational) {
    logger.warn(apiError.message, {
      event: 'RequestError',
      metadata: { statusCode: apiError.statusCode, requestId, error: cleanObject(err) },
    })
  } else {
    logger.error('Unhandled error', {
      event: 'UnhandledError',
      metadata: { statusCode: apiError.statusCode, requestId, error: cleanObject(err) },
    })
  }

  // Build response
  const response: ErrorResponse = {
    statusCode: apiError.statusCode,
    message: !apiError.isOperational && isProduction() ? 'Internal server error' : apiError.message,
    requestId,
  }

  // Include details if present
  if (apiError.details !== undefined) {
    response.details = apiError.details
  }

  // Include stack trace in non-production
  if (!isProduction() && err.stack) {
    response.stack = err.stack
  }

  res.status(apiError.statusCode).json(response)
}

// 404 handler for unmatched routes
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(
    new ApiError({
      statusCode: httpStatus.NOT_FOUND,
      message: `Route ${req.method} ${req.originalUrl} not found`,
      isOperational: true,
    })
  )
}
