import type { Result, TenantId } from '../types'
import { err, ok } from '../types'
import { InvalidAuthTokenError } from '../errors'
import type { TokenVerifier } from './token-verifier'

export function extractBearerToken(authorization: string | undefined): string | null {
  if (!authorization?.startsWith('Bearer ')) return null
  const token = authorization.slice('Bearer '.length).trim()
  return token || null
}

/**
 * One-shot bearer flow used by key issuance. Verifier outages are thrown,
 * everything else comes back as InvalidAuthTokenError.
 */
export async function authenticateBearer(
  authorization: string | undefined,
  verifier: TokenVerifier,
): Promise<Result<TenantId, InvalidAuthTokenError>> {
  const token = extractBearerToken(authorization)
  if (!token) return err(new InvalidAuthTokenError('No authorization token provided'))

  const tenantId = await verifier.verify(token)
  if (!tenantId) return err(new InvalidAuthTokenError())
  return ok(tenantId)
}
