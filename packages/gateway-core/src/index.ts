// Types
export type { TenantId, ApiKeyRecord, SubdomainRecord, ResolvedTenant, QueryFn, Result } from './types'
export { ok, err } from './types'

// Errors
export {
  ApiError,
  MissingCredentialError,
  InvalidCredentialError,
  InvalidAuthTokenError,
  InvalidSubdomainError,
  TenantMismatchError,
  UnauthorizedError,
  BadRequestError,
  DatasetNotFoundError,
  StorageUnavailableError,
  CredentialStoreUnavailableError,
} from './errors'
export type { ApiErrorCode, AuthError } from './errors'

// Auth
export {
  hashApiKey, generateApiKey, registerApiKey, verifyApiKey, verifyApiKeyAsync, issueApiKey, initApiKeyDb,
  registerSubdomain, resolveSubdomain, resolveSubdomainAsync, initSubdomainDb,
  SupabaseTokenVerifier,
  extractBearerToken, authenticateBearer,
  resolveTenant, extractSubdomain, DEFAULT_RESERVED_HOST_PREFIXES,
  authorizeDatasetPath, tenantFolder,
} from './auth'
export type { TokenVerifier, TenantSignals, TenantResolverOptions } from './auth'

// DB
export { createDbClient } from './db/client'
export type { DbClient } from './db/client'

// HTTP
export { createTimeoutFetch } from './http/timeout-fetch'

// Fastify helpers
export { createTenantAuthHook, decorateTenantRequest, requireTenant, readTenantSignals } from './fastify/auth-hook'
export { registerHealthRoute } from './fastify/health-route'
export type { HealthCheckFn } from './fastify/health-route'
export { seedTenantsFromEnv } from './fastify/seed-tenants'

// Test-only resets (prefixed with _ to indicate internal use)
export { _resetKeys } from './auth/api-key-service'
export { _resetSubdomains } from './auth/subdomain-service'
