/**
 * Structured logging via pino for csvapi services.
 */
import pino from 'pino'
import { CREDENTIAL_HEADERS, getServiceEnv } from './conventions'

export type Logger = pino.Logger

export function createLogger(options: {
  service: string
  level?: string
  pretty?: boolean
}): Logger {
  const level = options.level || process.env.LOG_LEVEL || 'info'
  const pretty = options.pretty ?? (getServiceEnv() === 'development')

  return pino({
    name: options.service,
    level,
    ...(pretty ? { transport: { target: 'pino-pretty', options: { colorize: true } } } : {}),
    base: {
      service: options.service,
      env: getServiceEnv(),
    },
    redact: {
      paths: CREDENTIAL_HEADERS.map((header) => `req.headers["${header}"]`),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
    },
  })
}

/** Logger that drops everything. Used by tests and library defaults. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
