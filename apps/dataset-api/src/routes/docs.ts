import type { FastifyInstance } from 'fastify'
import { buildApiDocs, docsParamsSchema, listTenantDatasets, parseRequest } from '@csvapi/datasets'
import type { AppContext } from '../context'

export function registerDocsRoutes(app: FastifyInstance, context: AppContext) {
  // Public: shows a tenant how to call the API against its own datasets
  app.get('/api/docs/:user_id', async (request) => {
    const { user_id } = parseRequest(docsParamsSchema, request.params)
    const datasets = await listTenantDatasets(context.storage, user_id, context.logger)
    return buildApiDocs(context.config.apiBaseUrl, datasets)
  })
}
