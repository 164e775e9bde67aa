import { createHash, randomBytes, randomUUID } from 'node:crypto'
import type { ApiKeyRecord, QueryFn, TenantId } from '../types'
import { CredentialStoreUnavailableError } from '../errors'

let dbQuery: QueryFn | null = null

export function initApiKeyDb(query: QueryFn | null): void {
  dbQuery = query
}

const keys = new Map<string, ApiKeyRecord>()

export function hashApiKey(raw: string): string {
  return createHash('sha256').update(raw).digest('hex')
}

/** 32 random bytes, URL-safe base64 (43 characters). */
export function generateApiKey(): string {
  return randomBytes(32).toString('base64url')
}

/** Registers a key in the in-memory registry only (seeding, tests). */
export function registerApiKey(record: Omit<ApiKeyRecord, 'keyHash'> & { rawKey: string }): ApiKeyRecord {
  const saved: ApiKeyRecord = {
    id: record.id,
    tenantId: record.tenantId,
    keyHash: hashApiKey(record.rawKey),
    createdAt: record.createdAt,
    disabled: record.disabled,
  }
  keys.set(saved.id, saved)
  return saved
}

export function verifyApiKey(rawKey: string): ApiKeyRecord | null {
  const targetHash = hashApiKey(rawKey)
  for (const record of keys.values()) {
    if (!record.disabled && record.keyHash === targetHash) return record
  }
  return null
}

function toRecord(row: Record<string, unknown>): ApiKeyRecord {
  const createdAt = row.created_at instanceof Date ? row.created_at.toISOString() : String(row.created_at)
  return {
    id: String(row.id),
    tenantId: String(row.user_id),
    keyHash: String(row.key_hash),
    createdAt,
    disabled: row.disabled === true,
  }
}

/**
 * Looks the key up in the database first, then in the in-memory registry.
 * A database error is not masked by the fallback: it surfaces as
 * CredentialStoreUnavailableError.
 */
export async function verifyApiKeyAsync(rawKey: string): Promise<ApiKeyRecord | null> {
  const targetHash = hashApiKey(rawKey)
  if (dbQuery) {
    let rows: Record<string, unknown>[]
    try {
      const result = await dbQuery(
        'SELECT id, user_id, key_hash, disabled, created_at FROM api_keys WHERE key_hash = $1 AND disabled = false',
        [targetHash],
      )
      rows = result.rows
    } catch (error) {
      throw new CredentialStoreUnavailableError('Error verifying API key', { cause: error })
    }
    if (rows[0]) return toRecord(rows[0])
  }
  return verifyApiKey(rawKey)
}

/**
 * Issues a new key for a tenant. Only the hash is stored; the raw key is
 * returned to the caller once.
 */
export async function issueApiKey(tenantId: TenantId): Promise<{ rawKey: string; record: ApiKeyRecord }> {
  const rawKey = generateApiKey()
  const record: ApiKeyRecord = {
    id: `key_${randomUUID()}`,
    tenantId,
    keyHash: hashApiKey(rawKey),
    createdAt: new Date().toISOString(),
    disabled: false,
  }

  if (dbQuery) {
    try {
      await dbQuery(
        'INSERT INTO api_keys (id, user_id, key_hash, disabled, created_at) VALUES ($1, $2, $3, $4, $5)',
        [record.id, record.tenantId, record.keyHash, false, record.createdAt],
      )
    } catch (error) {
      throw new CredentialStoreUnavailableError('Error storing API key', { cause: error })
    }
  } else {
    keys.set(record.id, record)
  }

  return { rawKey, record }
}

/** Test-only: clear all keys */
export function _resetKeys(): void {
  keys.clear()
  dbQuery = null
}
