export type TenantId = string

export type ApiKeyRecord = {
  id: string
  tenantId: TenantId
  keyHash: string
  createdAt: string
  disabled?: boolean
}

export type SubdomainRecord = {
  subdomain: string
  tenantId: TenantId
}

/** How the acting tenant of a request was established. */
export type ResolvedTenant = {
  tenantId: TenantId
  source: 'api_key' | 'subdomain'
  apiKeyId?: string
  subdomain?: string
}

export type QueryFn = (sql: string, params?: unknown[]) => Promise<{ rows: Record<string, unknown>[] }>

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}
