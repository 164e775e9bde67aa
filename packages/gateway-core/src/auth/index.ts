// Auth barrel: re-exports all public types and utilities.

export {
  hashApiKey, generateApiKey, registerApiKey, verifyApiKey, verifyApiKeyAsync, issueApiKey, initApiKeyDb,
} from './api-key-service'
export { registerSubdomain, resolveSubdomain, resolveSubdomainAsync, initSubdomainDb } from './subdomain-service'
export { SupabaseTokenVerifier } from './token-verifier'
export type { TokenVerifier } from './token-verifier'
export { extractBearerToken, authenticateBearer } from './bearer-auth'
export { resolveTenant, extractSubdomain, DEFAULT_RESERVED_HOST_PREFIXES } from './tenant-resolver'
export type { TenantSignals, TenantResolverOptions } from './tenant-resolver'
export { authorizeDatasetPath, tenantFolder } from './dataset-guard'
