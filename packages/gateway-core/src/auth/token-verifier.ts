/**
 * TokenVerifier: exchanges a user session token for a tenant id.
 *
 * Only the key-issuance flow uses it. The Supabase implementation asks
 * Supabase Auth who the token belongs to; the user id is the tenant id.
 */

import { isAuthRetryableFetchError } from '@supabase/auth-js'
import type { GoTrueClient } from '@supabase/auth-js'
import type { TenantId } from '../types'
import { CredentialStoreUnavailableError } from '../errors'

export interface TokenVerifier {
  readonly name: string

  /** Tenant id for a valid token, null for a rejected one. */
  verify(token: string): Promise<TenantId | null>
}

export class SupabaseTokenVerifier implements TokenVerifier {
  readonly name = 'supabase'

  private readonly client: GoTrueClient

  constructor(client: GoTrueClient) {
    this.client = client
  }

  async verify(token: string): Promise<TenantId | null> {
    const { data, error } = await this.client.getUser(token)
    if (error) {
      // Network failures and timeouts, as opposed to a rejected token
      if (isAuthRetryableFetchError(error)) {
        throw new CredentialStoreUnavailableError('Error verifying authorization token', { cause: error })
      }
      return null
    }
    return data.user?.id ?? null
  }
}
