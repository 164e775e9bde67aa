import type { QueryFn, SubdomainRecord, TenantId } from '../types'
import { CredentialStoreUnavailableError } from '../errors'

let dbQuery: QueryFn | null = null

export function initSubdomainDb(query: QueryFn | null): void {
  dbQuery = query
}

// Keyed on subdomain: one subdomain can never point at two tenants.
const subdomains = new Map<string, SubdomainRecord>()

function normalize(subdomain: string): string {
  return subdomain.trim().toLowerCase()
}

export function registerSubdomain(subdomain: string, tenantId: TenantId): SubdomainRecord {
  const record = { subdomain: normalize(subdomain), tenantId }
  subdomains.set(record.subdomain, record)
  return record
}

export function resolveSubdomain(subdomain: string): TenantId | null {
  return subdomains.get(normalize(subdomain))?.tenantId ?? null
}

export async function resolveSubdomainAsync(subdomain: string): Promise<TenantId | null> {
  const key = normalize(subdomain)
  if (dbQuery) {
    let rows: Record<string, unknown>[]
    try {
      const result = await dbQuery('SELECT user_id FROM tenant_subdomains WHERE subdomain = $1', [key])
      rows = result.rows
    } catch (error) {
      throw new CredentialStoreUnavailableError('Error resolving subdomain', { cause: error })
    }
    if (rows[0]) return String(rows[0].user_id)
  }
  return resolveSubdomain(key)
}

/** Test-only: clear all subdomain mappings */
export function _resetSubdomains(): void {
  subdomains.clear()
  dbQuery = null
}
