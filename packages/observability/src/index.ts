export { createLogger, createSilentLogger } from './logger'
export type { Logger } from './logger'
export { initSentry, captureError, flushSentry, scrubEvent } from './sentry'
export type { SentryInitOptions } from './sentry'
export { SERVICE_NAMES, SAMPLING_DEFAULTS, CREDENTIAL_HEADERS, getServiceEnv } from './conventions'
export type { ServiceEnvironment } from './conventions'
