import type { FastifyInstance, FastifyRequest } from 'fastify'
import { authorizeDatasetPath, createTenantAuthHook, requireTenant } from '@csvapi/gateway-core'
import {
  columnParamsSchema, datasetQuerySchema, describe, fetchTable, filterQuerySchema, filterRows, head,
  headQuerySchema, parseRequest, summarize, uniqueValues,
} from '@csvapi/datasets'
import type { Table } from '@csvapi/datasets'
import type { AppContext } from '../context'

/**
 * Dataset query routes. Each one resolves the tenant, validates its input,
 * checks that `bucket_path` sits in the tenant's folder and only then
 * downloads and decodes the file.
 */
export function registerDataRoutes(app: FastifyInstance, context: AppContext) {
  const preHandler = createTenantAuthHook({ reservedHostPrefixes: context.config.reservedHostPrefixes })

  async function loadAuthorized(request: FastifyRequest, bucketPath: string): Promise<Table> {
    const tenant = requireTenant(request)
    const authorized = authorizeDatasetPath(tenant.tenantId, bucketPath)
    if (!authorized.ok) {
      context.logger.warn({ tenantId: tenant.tenantId, bucketPath }, '[data] Dataset outside tenant folder')
      throw authorized.error
    }
    return fetchTable(context.storage, authorized.value, { logger: context.logger })
  }

  app.get('/api/data/summary', { preHandler }, async (request) => {
    const query = parseRequest(datasetQuerySchema, request.query)
    return summarize(await loadAuthorized(request, query.bucket_path))
  })

  app.get('/api/data/head', { preHandler }, async (request) => {
    const query = parseRequest(headQuerySchema, request.query)
    return head(await loadAuthorized(request, query.bucket_path), query.n)
  })

  app.get('/api/data/filter', { preHandler }, async (request) => {
    const query = parseRequest(filterQuerySchema, request.query)
    return filterRows(await loadAuthorized(request, query.bucket_path), query.column, query.value)
  })

  app.get('/api/data/stats', { preHandler }, async (request) => {
    const query = parseRequest(datasetQuerySchema, request.query)
    return describe(await loadAuthorized(request, query.bucket_path))
  })

  app.get('/api/data/unique/:column', { preHandler }, async (request) => {
    const { column } = parseRequest(columnParamsSchema, request.params)
    const query = parseRequest(datasetQuerySchema, request.query)
    return uniqueValues(await loadAuthorized(request, query.bucket_path), column)
  })
}
