import type { FastifyInstance, FastifyRequest } from 'fastify'
import type { ResolvedTenant } from '../types'
import { MissingCredentialError } from '../errors'
import { resolveTenant } from '../auth/tenant-resolver'
import type { TenantResolverOptions, TenantSignals } from '../auth/tenant-resolver'

declare module 'fastify' {
  interface FastifyRequest {
    tenant: ResolvedTenant | null
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value
  return raw?.trim() || undefined
}

export function readTenantSignals(request: FastifyRequest): TenantSignals {
  return {
    host: firstHeader(request.headers.host),
    apiKey: firstHeader(request.headers['x-api-key']),
  }
}

/** Adds the `tenant` slot every authenticated route reads. Call once per app. */
export function decorateTenantRequest(app: FastifyInstance): void {
  app.decorateRequest('tenant', null)
}

/**
 * preHandler that resolves the acting tenant before the route handler runs.
 * Resolution failures are thrown and answered by the app's error handler.
 */
export function createTenantAuthHook(options: TenantResolverOptions = {}) {
  return async function tenantAuthHook(request: FastifyRequest): Promise<void> {
    const result = await resolveTenant(readTenantSignals(request), options)
    if (!result.ok) throw result.error
    request.tenant = result.value
  }
}

/** Tenant set by the auth hook. Throws when a route forgot to install it. */
export function requireTenant(request: FastifyRequest): ResolvedTenant {
  if (!request.tenant) throw new MissingCredentialError()
  return request.tenant
}
