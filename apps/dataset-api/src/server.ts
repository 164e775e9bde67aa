import { captureError, createLogger, flushSentry, initSentry, SERVICE_NAMES } from '@csvapi/observability'
import { loadConfig } from './config'
import { createAppContext } from './context'
import { buildApp } from './app'

async function main() {
  // Initialize observability before anything else
  initSentry({ serviceName: SERVICE_NAMES.DATASET_API })

  const config = loadConfig()
  const logger = createLogger({ service: SERVICE_NAMES.DATASET_API, level: config.logLevel })
  const context = createAppContext(config, logger)
  const app = await buildApp(context, { logger })

  const shutdown = async (signal: string) => {
    logger.info(`[server] ${signal} received, shutting down`)
    await app.close()
    await flushSentry()
    process.exit(0)
  }
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((e) => {
        logger.error({ err: e }, '[server] Shutdown failed')
        process.exit(1)
      })
    })
  }

  await app.listen({ host: config.host, port: config.port })
}

main().catch(async (err) => {
  captureError(err, { service: SERVICE_NAMES.DATASET_API, operation: 'startup' })
  console.error(err)
  await flushSentry()
  process.exit(1)
})
