import express, { type Express } from 'express'
import helmet from 'helmet'
import cors from 'cors'
import compression from 'compression'

import { getCorsOrigins } from './config/env.js'
import { requestContextMiddleware } from './lib/request-context.js'
import { createAuthMiddleware, populateUserContext } from './middleware/auth.js'
import { metricsMiddleware } from './middleware/metrics.js'
import { errorHandler, notFoundHandler } from './middleware/error-handler.js'

// Routes
import healthRoutes from './modules/health/health.routes.js'
import authRoutes from './modules/auth/auth.routes.js'
import clientRoutes from './modules/clients/client.routes.js'
import leadRoutes from './modules/leads/lead.routes.js'
import userRoutes from './modules/users/user.routes.js'
import auditLogRoutes from './modules/audit-logs/audit-log.routes.js'

export function createApp(): Express {
  const app = express()

  // Security middleware
  app.use(helmet())
  const origins = getCorsOrigins()
  app.use(cors(origins.length > 0 ? { origin: origins, credentials: true } : undefined))

  // Request parsing with size limits
  app.use(express.json({ limit: '10kb' }))
  app.use(express.urlencoded({ extended: true, limit: '10kb' }))

  // Compression
  app.use(compression())

  // Request context (AsyncLocalStorage) - must be early in the chain
  app.use(requestContextMiddleware)

  // Request completion logging
  app.use(metricsMiddleware)

  // Health check routes (no auth required)
  app.use('/health', healthRoutes)

  // Login and current user
  app.use('/auth', authRoutes)

  // Auth middleware for protected routes
  app.use('/api', createAuthMiddleware(), populateUserContext)

  // API routes
  app.use('/api/v1/clients', clientRoutes)
  app.use('/api/v1/leads', leadRoutes)
  app.use('/api/v1/users', userRoutes)
  app.use('/api/v1/audit-logs', auditLogRoutes)

  // 404 handler
  app.use(notFoundHandler)

  // Error handler (must be last)
  app.use(errorHandler)

  return app
}
