import { App } from './App.js'
import { logger } from '../utils/logger.js'

const app = new App()

const shutdown = (signal: NodeJS.Signals) => {
  logger.info('Signal received', { signal })
  app.shutdown()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Shutdown failed', { error })
      process.exit(1)
    })
}

process.once('SIGINT', shutdown)
process.once('SIGTERM', shutdown)

app.start().catch((error) => {
  logger.error('Fatal error', { error })
  process.exitCode = 1
})
