import pg from 'pg'
import type { Logger } from '@csvapi/observability'
import type { QueryFn } from '../types'

export type DbClient = {
  query: QueryFn
  end: () => Promise<void>
}

export function createDbClient(
  databaseUrl: string | undefined,
  options: { timeoutMs?: number; logger?: Logger } = {},
): DbClient | undefined {
  if (!databaseUrl) {
    options.logger?.warn('[db] DATABASE_URL not set, API keys and subdomains are kept in memory')
    return undefined
  }
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 5,
    connectionTimeoutMillis: options.timeoutMs,
    query_timeout: options.timeoutMs,
  })
  pool.on('error', (error) => options.logger?.error({ err: error }, '[db] Idle client error'))
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values)
      return { rows: result.rows }
    },
    end: () => pool.end(),
  }
}
