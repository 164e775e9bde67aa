import { z } from 'zod'
import { DEFAULT_RESERVED_HOST_PREFIXES } from '@csvapi/gateway-core'
import { DEFAULT_BUCKET } from '@csvapi/datasets'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const commaList = z.string().transform((raw) => raw.split(',').map((entry) => entry.trim()).filter(Boolean))

const envSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_KEY: z.string().min(1),
  API_BASE_URL: z.string().url(),
  API_HOST: z.string().min(1).default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  STORAGE_BUCKET: z.string().min(1).default(DEFAULT_BUCKET),
  DATABASE_URL: z.string().min(1).optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RESERVED_HOST_PREFIXES: commaList.optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type LogLevel = (typeof LOG_LEVELS)[number]

export type AppConfig = {
  supabaseUrl: string
  supabaseKey: string
  /** Public URL the docs endpoint renders examples against. */
  apiBaseUrl: string
  host: string
  port: number
  storageBucket: string
  databaseUrl?: string
  requestTimeoutMs: number
  reservedHostPrefixes: readonly string[]
  logLevel: LogLevel
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Reads the service configuration from the environment. Blank variables
 * count as unset. Throws a ConfigError naming every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''))
  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} (${issue.message})`)
    throw new ConfigError(`Invalid configuration: ${problems.join(', ')}`)
  }

  const e = parsed.data
  return {
    supabaseUrl: e.SUPABASE_URL,
    supabaseKey: e.SUPABASE_KEY,
    apiBaseUrl: e.API_BASE_URL,
    host: e.API_HOST,
    port: e.API_PORT,
    storageBucket: e.STORAGE_BUCKET,
    databaseUrl: e.DATABASE_URL,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    reservedHostPrefixes: e.RESERVED_HOST_PREFIXES ?? DEFAULT_RESERVED_HOST_PREFIXES,
    logLevel: e.LOG_LEVEL,
  }
}
