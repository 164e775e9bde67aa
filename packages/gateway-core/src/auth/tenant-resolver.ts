/**
 * Tenant resolution for API-key authenticated routes.
 *
 * Two independent signals can name the acting tenant:
 *   1. the Host header, whose leading label is looked up as a tenant subdomain
 *   2. the X-API-Key header
 *
 * A qualifying host that maps to no tenant rejects the request outright. When
 * both signals resolve they must agree. The key wins when present.
 */

import type { ResolvedTenant, Result } from '../types'
import { err, ok } from '../types'
import {
  CredentialStoreUnavailableError,
  InvalidCredentialError,
  InvalidSubdomainError,
  MissingCredentialError,
  TenantMismatchError,
} from '../errors'
import type { AuthError } from '../errors'
import { verifyApiKeyAsync } from './api-key-service'
import { resolveSubdomainAsync } from './subdomain-service'

export const DEFAULT_RESERVED_HOST_PREFIXES: readonly string[] = ['localhost', '127.0.0.1', '0.0.0.0']

export interface TenantSignals {
  host?: string
  apiKey?: string
}

export interface TenantResolverOptions {
  /** Hosts starting with one of these never go through subdomain lookup. */
  reservedHostPrefixes?: readonly string[]
}

/**
 * Leading label of a dotted, non-local host, or null when the host does not
 * qualify for subdomain resolution.
 *
 * Note that any dotted host qualifies, bare IPs and the base domain included.
 */
export function extractSubdomain(
  host: string | undefined,
  reservedHostPrefixes: readonly string[] = DEFAULT_RESERVED_HOST_PREFIXES,
): string | null {
  if (!host) return null
  const hostname = host.trim().toLowerCase().split(':')[0]
  if (!hostname.includes('.')) return null
  if (reservedHostPrefixes.some((prefix) => hostname.startsWith(prefix))) return null
  return hostname.split('.')[0]
}

async function lookup<T>(fn: () => Promise<T>): Promise<Result<T, CredentialStoreUnavailableError>> {
  try {
    return ok(await fn())
  } catch (error) {
    if (error instanceof CredentialStoreUnavailableError) return err(error)
    throw error
  }
}

export async function resolveTenant(
  signals: TenantSignals,
  options: TenantResolverOptions = {},
): Promise<Result<ResolvedTenant, AuthError>> {
  let hostTenant: ResolvedTenant | null = null

  const subdomain = extractSubdomain(signals.host, options.reservedHostPrefixes)
  if (subdomain !== null) {
    const found = await lookup(() => resolveSubdomainAsync(subdomain))
    if (!found.ok) return found
    if (!found.value) return err(new InvalidSubdomainError(subdomain))
    hostTenant = { tenantId: found.value, source: 'subdomain', subdomain }
  }

  let keyTenant: ResolvedTenant | null = null

  if (signals.apiKey) {
    const apiKey = signals.apiKey
    const found = await lookup(() => verifyApiKeyAsync(apiKey))
    if (!found.ok) return found
    if (!found.value) return err(new InvalidCredentialError())
    keyTenant = { tenantId: found.value.tenantId, source: 'api_key', apiKeyId: found.value.id }
  }

  if (hostTenant && keyTenant && hostTenant.tenantId !== keyTenant.tenantId) {
    return err(new TenantMismatchError())
  }

  if (keyTenant) return ok(hostTenant ? { ...keyTenant, subdomain: hostTenant.subdomain } : keyTenant)
  if (hostTenant) return ok(hostTenant)
  return err(new MissingCredentialError())
}
