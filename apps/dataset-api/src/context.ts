import { AuthClient } from '@supabase/auth-js'
import { StorageClient } from '@supabase/storage-js'
import {
  createDbClient, createTimeoutFetch, initApiKeyDb, initSubdomainDb, seedTenantsFromEnv, SupabaseTokenVerifier,
} from '@csvapi/gateway-core'
import type { DbClient, HealthCheckFn, TokenVerifier } from '@csvapi/gateway-core'
import { SupabaseStorage } from '@csvapi/datasets'
import type { ObjectStorage } from '@csvapi/datasets'
import type { Logger } from '@csvapi/observability'
import type { AppConfig } from './config'

/** Everything the routes need, built once at startup. */
export interface AppContext {
  config: AppConfig
  logger: Logger
  storage: ObjectStorage
  tokenVerifier: TokenVerifier
  db?: DbClient
  healthCheck: HealthCheckFn
  close(): Promise<void>
}

export type ContextParts = Pick<AppContext, 'config' | 'logger' | 'storage' | 'tokenVerifier' | 'db'>

async function runCheck(name: string, check: () => Promise<unknown>, logger: Logger): Promise<'ok' | 'error'> {
  try {
    await check()
    return 'ok'
  } catch (e) {
    logger.warn({ err: e }, `[health] ${name} check failed`)
    return 'error'
  }
}

/** Wires health checks and teardown around already built collaborators. */
export function assembleContext(parts: ContextParts): AppContext {
  const { storage, db, logger } = parts

  return {
    ...parts,
    healthCheck: async () => {
      const checks: Record<string, 'ok' | 'error'> = {
        storage: await runCheck('storage', () => storage.ping(), logger),
      }
      if (db) checks.database = await runCheck('database', () => db.query('SELECT 1'), logger)
      return checks
    },
    close: async () => {
      initApiKeyDb(null)
      initSubdomainDb(null)
      await db?.end()
    },
  }
}

export interface CreateAppContextOptions {
  /** Base fetch for Supabase calls, wrapped with the request timeout. */
  fetch?: typeof fetch
}

/**
 * Builds the production context. Supabase Storage and Auth are reached
 * through their own clients; the service never opens a realtime socket.
 */
export function createAppContext(config: AppConfig, logger: Logger, options: CreateAppContextOptions = {}): AppContext {
  const supabaseUrl = config.supabaseUrl.replace(/\/+$/, '')
  const headers = { apikey: config.supabaseKey, Authorization: `Bearer ${config.supabaseKey}` }
  const timedFetch = createTimeoutFetch(config.requestTimeoutMs, options.fetch)

  const storageClient = new StorageClient(`${supabaseUrl}/storage/v1`, headers, timedFetch)
  const authClient = new AuthClient({
    url: `${supabaseUrl}/auth/v1`,
    headers,
    fetch: timedFetch,
    persistSession: false,
    autoRefreshToken: false,
    detectSessionInUrl: false,
  })

  const db = createDbClient(config.databaseUrl, { timeoutMs: config.requestTimeoutMs, logger })
  if (db) {
    initApiKeyDb(db.query)
    initSubdomainDb(db.query)
    logger.info('[db] API keys and subdomains backed by Postgres')
  }

  seedTenantsFromEnv('DATASET_API_SEED_KEYS', logger)

  return assembleContext({
    config,
    logger,
    storage: new SupabaseStorage(storageClient, config.storageBucket),
    tokenVerifier: new SupabaseTokenVerifier(authClient),
    db,
  })
}
