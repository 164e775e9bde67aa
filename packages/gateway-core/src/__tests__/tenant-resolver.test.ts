import { describe, it, expect, beforeEach } from 'vitest'
import { extractSubdomain, resolveTenant } from '../auth/tenant-resolver'
import { registerApiKey, initApiKeyDb, _resetKeys } from '../auth/api-key-service'
import { registerSubdomain, initSubdomainDb, _resetSubdomains } from '../auth/subdomain-service'
import {
  CredentialStoreUnavailableError,
  InvalidCredentialError,
  InvalidSubdomainError,
  MissingCredentialError,
  TenantMismatchError,
} from '../errors'

describe('extractSubdomain', () => {
  it('takes the leading label of a dotted host', () => {
    expect(extractSubdomain('acme.example.com')).toBe('acme')
    expect(extractSubdomain('ACME.Example.com:8080')).toBe('acme')
  })

  it('ignores hosts without a dot', () => {
    expect(extractSubdomain('localhost:5000')).toBeNull()
    expect(extractSubdomain('api-server')).toBeNull()
    expect(extractSubdomain(undefined)).toBeNull()
  })

  it('ignores reserved local prefixes', () => {
    expect(extractSubdomain('127.0.0.1:5000')).toBeNull()
    expect(extractSubdomain('localhost.localdomain')).toBeNull()
  })

  it('treats bare IPs as subdomain candidates', () => {
    expect(extractSubdomain('10.0.0.5')).toBe('10')
  })

  it('accepts a custom reserved prefix list', () => {
    expect(extractSubdomain('dev.internal', ['dev.'])).toBeNull()
    expect(extractSubdomain('127.0.0.1', [])).toBe('127')
  })
})

describe('resolveTenant', () => {
  beforeEach(() => {
    _resetKeys()
    _resetSubdomains()
    registerApiKey({ id: 'k1', tenantId: 't1', rawKey: 'key-t1', createdAt: '2026-01-01' })
    registerApiKey({ id: 'k2', tenantId: 't2', rawKey: 'key-t2', createdAt: '2026-01-01' })
    registerSubdomain('acme', 't1')
    registerSubdomain('globex', 't2')
  })

  it('fails with MissingCredential when no signal is present', async () => {
    const result = await resolveTenant({ host: 'localhost:5000' })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBeInstanceOf(MissingCredentialError)
  })

  it('fails with InvalidCredential for an unknown key', async () => {
    const result = await resolveTenant({ apiKey: 'nope' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidCredentialError)
      expect(result.error.statusCode).toBe(401)
    }
  })

  it('resolves the key tenant', async () => {
    const result = await resolveTenant({ apiKey: 'key-t1', host: 'localhost:5000' })
    expect(result).toEqual({ ok: true, value: { tenantId: 't1', source: 'api_key', apiKeyId: 'k1' } })
  })

  it('resolves the host tenant when no key is sent', async () => {
    const result = await resolveTenant({ host: 'globex.datasets.example.com' })
    expect(result).toEqual({ ok: true, value: { tenantId: 't2', source: 'subdomain', subdomain: 'globex' } })
  })

  it('rejects an unknown subdomain even with a valid key', async () => {
    const result = await resolveTenant({ host: 'initech.example.com', apiKey: 'key-t1' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidSubdomainError)
      expect(result.error.message).toBe("Unknown subdomain 'initech'")
    }
  })

  it('rejects a key that belongs to another tenant than the host', async () => {
    const result = await resolveTenant({ host: 'globex.example.com', apiKey: 'key-t1' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TenantMismatchError)
      expect(result.error.statusCode).toBe(403)
    }
  })

  it('accepts a key and host that agree', async () => {
    const result = await resolveTenant({ host: 'acme.example.com', apiKey: 'key-t1' })
    expect(result).toEqual({ ok: true, value: { tenantId: 't1', source: 'api_key', apiKeyId: 'k1', subdomain: 'acme' } })
  })

  it('reports store outages as CredentialStoreUnavailable', async () => {
    initSubdomainDb(async () => { throw new Error('connect ECONNREFUSED') })
    const viaHost = await resolveTenant({ host: 'acme.example.com' })
    expect(viaHost.ok).toBe(false)
    if (!viaHost.ok) expect(viaHost.error).toBeInstanceOf(CredentialStoreUnavailableError)

    initApiKeyDb(async () => { throw new Error('connect ECONNREFUSED') })
    const viaKey = await resolveTenant({ apiKey: 'key-t1' })
    expect(viaKey.ok).toBe(false)
    if (!viaKey.ok) expect(viaKey.error.retryable).toBe(true)
  })
})
