import type { Result, TenantId } from '../types'
import { err, ok } from '../types'
import { UnauthorizedError } from '../errors'

// Storage URLs collapse these, so they could step out of the tenant folder
const UNSAFE_SEGMENTS = new Set(['', '.', '..'])
const ENCODED_SEPARATOR = /%(2e|2f|5c)/i

/** Storage folder that holds a tenant's datasets. */
export function tenantFolder(tenantId: TenantId): string {
  return `user_${tenantId}`
}

function isPlainPath(path: string): boolean {
  if (path.includes('\\') || ENCODED_SEPARATOR.test(path)) return false
  return path.split('/').every((segment) => !UNSAFE_SEGMENTS.has(segment))
}

/**
 * Path ownership check. Runs after tenant resolution and before any dataset
 * is fetched: a path outside `user_{tenant}/` is rejected whether or not the
 * object exists. Relative, empty and encoded segments are rejected outright.
 */
export function authorizeDatasetPath(tenantId: TenantId, path: string): Result<string, UnauthorizedError> {
  if (!path.startsWith(`${tenantFolder(tenantId)}/`) || !isPlainPath(path)) return err(new UnauthorizedError())
  return ok(path)
}
