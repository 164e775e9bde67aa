import Fastify from 'fastify'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import { decorateTenantRequest, registerHealthRoute } from '@csvapi/gateway-core'
import { captureError, SERVICE_NAMES } from '@csvapi/observability'
import type { AppContext } from './context'
import { registerHelloRoutes } from './routes/hello'
import { registerKeyRoutes } from './routes/keys'
import { registerDataRoutes } from './routes/data'
import { registerDocsRoutes } from './routes/docs'

export interface BuildAppOptions {
  /** Request logger. `false` disables Fastify logging (tests). */
  logger?: FastifyBaseLogger | false
}

export async function buildApp(context: AppContext, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? false })

  await app.register(cors)
  decorateTenantRequest(app)

  app.setErrorHandler((error: Error & { statusCode?: number }, request, reply) => {
    const statusCode = error.statusCode || 500
    if (statusCode >= 500) {
      captureError(error, {
        service: SERVICE_NAMES.DATASET_API,
        operation: `${request.method} ${request.routeOptions.url ?? request.url}`,
        tenantId: request.tenant?.tenantId,
      })
      request.log.error({ err: error }, 'Request failed')
    } else {
      request.log.info({ statusCode, reason: error.message }, 'Request rejected')
    }
    reply.status(statusCode).send({
      error: error.message || 'Internal Server Error',
    })
  })

  app.setNotFoundHandler((_request, reply) => {
    reply.code(404).send({ error: 'Not Found' })
  })

  registerHelloRoutes(app)
  registerKeyRoutes(app, context)
  registerDataRoutes(app, context)
  registerDocsRoutes(app, context)
  registerHealthRoute(app, SERVICE_NAMES.DATASET_API, context.healthCheck)

  app.addHook('onClose', async () => {
    await context.close()
  })

  return app
}
