import winston from 'winston'
import type { Request } from 'express'
import { peekEnv } from '../config/env.js'
import { DEFAULT_SERVICE_NAME } from '../config/constants.js'

interface LogMetadata {
  event?: string
  metadata?: Record<string, unknown>
  req?: Request | null
  sessionId?: string | null
}

const sensitiveFields = [
  'password',
  'newPassword',
  'hashedPassword',
  'hashed_password',
  'token',
  'access_token',
  'accessToken',
  'refreshToken',
  'apiKey',
  'secret',
  'jwtSecret',
  'JWT_SECRET',
  'MAIL_PASSWORD',
  'authorization',
]

function cleanObject(obj: unknown, depth = 0): unknown {
  if (depth > 4) return '[Max Depth Reached]'

  if (!obj || typeof obj !== 'object') return obj

  if (obj instanceof Date) return obj.toISOString()

  if (obj instanceof Error) {
    return { name: obj.name, message: obj.message, stack: obj.stack }
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => cleanObject(item, depth + 1))
  }

  const cleaned: Record<string, unknown> = {}
  const visited = new WeakSet<object>()
  visited.add(obj)

  for (const [key, value] of Object.entries(obj)) {
    if (sensitiveFields.includes(key)) {
      cleaned[key] = '[REDACTED]'
      continue
    }

    if (typeof value === 'object' && value !== null) {
      if (visited.has(value)) {
        cleaned[key] = '[Circular Reference]'
        continue
      }
      visited.add(value)
      cleaned[key] = cleanObject(value, depth + 1)
    } else {
      cleaned[key] = value
    }
  }

  return cleaned
}

const structuredFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const structuredLog: Record<string, unknown> = {
      timestamp,
      level,
      service: meta.service || DEFAULT_SERVICE_NAME,
      event: meta.event || 'General',
      message,
      metadata: meta.metadata || {},
      requestId: meta.requestId,
      sessionId: meta.sessionId || 'unknown',
    }

    return JSON.stringify(structuredLog)
  })
)

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : ''
    return `${timestamp} [${level}]: ${message}${metaStr}`
  })
)

const levels = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

// Config may not be loaded yet; fall back to process.env
const env = peekEnv()

const serviceName = env?.SERVICE_NAME || process.env.SERVICE_NAME || DEFAULT_SERVICE_NAME
const nodeEnv = env?.NODE_ENV || process.env.NODE_ENV || 'development'
const configuredLevel = env?.LOG_LEVEL || process.env.LOG_LEVEL || 'info'
const silent = configuredLevel === 'silent'
const logLevel = silent ? 'info' : configuredLevel

export const logger = winston.createLogger({
  levels,
  level: logLevel,
  format: structuredFormat,
  defaultMeta: { service: serviceName },
  silent,
  transports: [
    new winston.transports.Console({
      format: nodeEnv === 'production' ? structuredFormat : consoleFormat,
      level: logLevel,
    }),
  ],
})

function filterRequest(req: Request | null): Record<string, unknown> | null {
  if (!req) return null

  return {
    method: req.method,
    url: req.originalUrl || req.url,
    headers: {
      'user-agent': req.headers?.['user-agent'],
      'content-type': req.headers?.['content-type'],
    },
    query: cleanObject(req.query || {}),
    body: cleanObject(req.body || {}),
  }
}

function createLogMetadata(meta: LogMetadata): Record<string, unknown> {
  const logMetadata: Record<string, unknown> = {
    event: meta.event,
    metadata: cleanObject(meta.metadata ?? {}),
  }

  const cleanReq = meta.req ? filterRequest(meta.req) : null
  if (cleanReq) logMetadata.req = cleanReq
  if (meta.sessionId) logMetadata.sessionId = meta.sessionId

  return logMetadata
}

export const error = (message: string, meta: LogMetadata = {}) => {
  logger.error(message, createLogMetadata(meta))
}

export const warn = (message: string, meta: LogMetadata = {}) => {
  logger.warn(message, createLogMetadata(meta))
}

export const info = (message: string, meta: LogMetadata = {}) => {
  logger.info(message, createLogMetadata(meta))
}

export const debug = (message: string, meta: LogMetadata = {}) => {
  logger.debug(message, createLogMetadata(meta))
}

export const fatal = (message: string, meta: LogMetadata = {}) => {
  logger.log('fatal', message, createLogMetadata(meta))
}

export function createRequestLogger(req: Request | null, requestId: string) {
  if (!req) {
    return logger.child({ requestId })
  }

  return logger.child({
    requestId,
    method: req.method,
    url: req.originalUrl,
    userAgent: req.get('user-agent'),
  })
}

export { cleanObject }

export type Logger = typeof logger
