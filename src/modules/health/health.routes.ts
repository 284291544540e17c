import { Router, type Request, type Response } from 'express'
import httpStatus from 'http-status'
import { getDatabase } from '../../db/postgres.js'
import { asyncHandler } from '../../lib/async-handler.js'

const router = Router()

interface HealthStatus {
  status: 'healthy' | 'unhealthy'
  timestamp: string
  uptime: number
  memory: {
    used: number
    total: number
    percentage: number
  }
  services: {
    postgres: { status: 'up' | 'down'; responseTime?: number }
  }
}

router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    // Measure response time
    const postgresStart = Date.now()
    const postgresOk = await getDatabase().healthCheck()
    const postgresTime = Date.now() - postgresStart

    // Memory metrics
    const memUsage = process.memoryUsage()
    const memUsed = memUsage.heapUsed
    const memTotal = memUsage.heapTotal
    const memPercentage = Math.round((memUsed / memTotal) * 100)

    const status: HealthStatus = {
      status: postgresOk ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      memory: {
        used: memUsed,
        total: memTotal,
        percentage: memPercentage,
      },
      services: {
        postgres: {
          status: postgresOk ? 'up' : 'down',
          responseTime: postgresTime,
        },
      },
    }

    res.status(postgresOk ? httpStatus.OK : httpStatus.SERVICE_UNAVAILABLE).json(status)
  })
)

// Simple liveness probe (doesn't check dependencies)
router.get('/live', (_req: Request, res: Response) => {
  res.status(httpStatus.OK).json({ status: 'alive' })
})

// Readiness probe (checks if ready to accept traffic)
router.get(
  '/ready',
  asyncHandler(async (_req: Request, res: Response) => {
    const postgresOk = await getDatabase().healthCheck()

    if (postgresOk) {
      res.status(httpStatus.OK).json({ status: 'ready' })
    } else {
      res.status(httpStatus.SERVICE_UNAVAILABLE).json({ status: 'not ready' })
    }
  })
)

export default router
