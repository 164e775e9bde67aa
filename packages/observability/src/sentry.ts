/**
 * Sentry error tracking for csvapi services. A no-op without SENTRY_DSN.
 *
 * Only 5xx failures are reported (see the dataset API's error handler), so
 * events carry the request that failed. The credentials on that request are
 * stripped before anything leaves the process.
 */
import * as Sentry from '@sentry/node'
import { CREDENTIAL_HEADERS, getServiceEnv, SAMPLING_DEFAULTS } from './conventions'

let _initialized = false

export interface SentryInitOptions {
  serviceName: string
  dsn?: string
}

type EventWithRequest = {
  request?: { headers?: Record<string, string>; cookies?: Record<string, string> }
}

/** Removes credential headers and cookies from an outgoing event, in place. */
export function scrubEvent(event: EventWithRequest): void {
  const request = event.request
  if (!request) return
  if (request.headers) {
    request.headers = Object.fromEntries(
      Object.entries(request.headers).filter(([name]) => !CREDENTIAL_HEADERS.includes(name.toLowerCase())),
    )
  }
  delete request.cookies
}

export function initSentry(options: SentryInitOptions): void {
  if (_initialized) return

  const dsn = options.dsn || process.env.SENTRY_DSN
  if (!dsn) {
    console.warn(`[sentry] No SENTRY_DSN - error tracking disabled for ${options.serviceName}`)
    return
  }

  const environment = getServiceEnv()
  Sentry.init({
    dsn,
    environment,
    release: process.env.npm_package_version || 'dev',
    serverName: options.serviceName,
    tracesSampleRate: SAMPLING_DEFAULTS[environment],
    sendDefaultPii: false,
    beforeSend(event) {
      scrubEvent(event)
      return event
    },
  })

  _initialized = true
  console.log(`[sentry] Initialized for ${options.serviceName} (env=${environment})`)
}

export function captureError(
  error: unknown,
  context: { service: string; operation: string; tenantId?: string },
): void {
  if (!_initialized) return

  Sentry.withScope((scope) => {
    scope.setTag('service', context.service)
    scope.setTag('operation', context.operation)
    if (context.tenantId) scope.setTag('tenant_id', context.tenantId)
    Sentry.captureException(error instanceof Error ? error : new Error(String(error)))
  })
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!_initialized) return
  await Sentry.flush(timeoutMs)
}
