/**
 * Shared observability conventions for csvapi services.
 */

export const SERVICE_NAMES = {
  DATASET_API: 'csvapi-dataset-api',
} as const

export const SAMPLING_DEFAULTS: Record<ServiceEnvironment, number> = {
  production: 0.1,
  staging: 1.0,
  development: 1.0,
  test: 0.0,
}

export type ServiceEnvironment = 'production' | 'staging' | 'development' | 'test'

const ENV_ALIASES: Record<string, ServiceEnvironment> = {
  prod: 'production',
  production: 'production',
  stage: 'staging',
  staging: 'staging',
  preview: 'staging',
  dev: 'development',
  development: 'development',
  test: 'test',
}

export function getServiceEnv(): ServiceEnvironment {
  const env = process.env.APP_ENV || process.env.NODE_ENV || 'development'
  return Object.hasOwn(ENV_ALIASES, env) ? ENV_ALIASES[env] : 'development'
}

/** Request headers that carry credentials. Redacted from logs and error reports. */
export const CREDENTIAL_HEADERS: readonly string[] = ['authorization', 'cookie', 'x-api-key']
