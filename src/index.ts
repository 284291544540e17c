import { info, error as logError, fatal } from './lib/logger.js'
import { bootstrap } from './config/env.js'
import { createApp } from './app.js'
import { closeDatabase } from './db/postgres.js'

function main() {
  try {
    // Load and validate configuration
    info('Bootstrapping configuration...', { event: 'Bootstrap' })
    const env = bootstrap()

    // Create Express app
    const app = createApp()

    // Start server
    const server = app.listen(env.PORT, () => {
      info('Server started', { event: 'ServerStarted', metadata: { port: env.PORT, env: env.NODE_ENV } })
    })

    // Graceful shutdown handler
    const shutdown = (signal: string) => {
      info('Shutdown signal received', { event: 'Shutdown', metadata: { signal } })

      // Stop accepting new connections
      server.close(() => {
        info('HTTP server closed', { event: 'Shutdown' })

        // Close database connections
        closeDatabase()
          .then(() => {
            info('Graceful shutdown completed', { event: 'Shutdown' })
            process.exit(0)
          })
          .catch((err: unknown) => {
            logError('Failed to close database', { event: 'ShutdownError', metadata: { err } })
            process.exit(1)
          })
      })

      // Force exit after timeout
      setTimeout(() => {
        logError('Forced shutdown after timeout', { event: 'ShutdownTimeout' })
        process.exit(1)
      }, 30000).unref()
    }

    // Register shutdown handlers
    process.on('SIGTERM', () => shutdown('SIGTERM'))
    process.on('SIGINT', () => shutdown('SIGINT'))

    // Handle uncaught errors
    process.on('uncaughtException', (err: Error) => {
      fatal('Uncaught exception', { event: 'UncaughtException', metadata: { err } })
      shutdown('uncaughtException')
    })

    process.on('unhandledRejection', (reason: unknown) => {
      fatal('Unhandled rejection', { event: 'UnhandledRejection', metadata: { reason } })
      shutdown('unhandledRejection')
    })
  } catch (err) {
    fatal('Failed to start server', { event: 'StartupError', metadata: { err } })
    process.exit(1)
  }
}

main()
