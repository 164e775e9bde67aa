/**
 * Error taxonomy shared by every csvapi service.
 *
 * Each error carries the HTTP status it maps to at the request boundary. The
 * Fastify error handler reads `statusCode` and answers `{ error: message }`.
 */

export type ApiErrorCode =
  | 'MISSING_CREDENTIAL'
  | 'INVALID_CREDENTIAL'
  | 'INVALID_AUTH_TOKEN'
  | 'INVALID_SUBDOMAIN'
  | 'TENANT_MISMATCH'
  | 'UNAUTHORIZED'
  | 'DATASET_NOT_FOUND'
  | 'DECODE_FAILURE'
  | 'BAD_REQUEST'
  | 'STORAGE_UNAVAILABLE'
  | 'CREDENTIAL_STORE_UNAVAILABLE'

export class ApiError extends Error {
  readonly code: ApiErrorCode
  readonly statusCode: number
  /** True when the same request may succeed later without changes. */
  readonly retryable: boolean

  constructor(code: ApiErrorCode, statusCode: number, message: string, options?: ErrorOptions & { retryable?: boolean }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.statusCode = statusCode
    this.retryable = options?.retryable ?? false
  }
}

// ── Authentication ──────────────────────────────────────────────────

export class MissingCredentialError extends ApiError {
  constructor(message = 'No API key provided') {
    super('MISSING_CREDENTIAL', 401, message)
  }
}

export class InvalidCredentialError extends ApiError {
  constructor(message = 'Invalid API key') {
    super('INVALID_CREDENTIAL', 401, message)
  }
}

export class InvalidAuthTokenError extends ApiError {
  constructor(message = 'Invalid authorization token') {
    super('INVALID_AUTH_TOKEN', 401, message)
  }
}

export class InvalidSubdomainError extends ApiError {
  readonly subdomain: string

  constructor(subdomain: string) {
    super('INVALID_SUBDOMAIN', 401, `Unknown subdomain '${subdomain}'`)
    this.subdomain = subdomain
  }
}

export class TenantMismatchError extends ApiError {
  constructor(message = 'API key does not belong to the tenant of this subdomain') {
    super('TENANT_MISMATCH', 403, message)
  }
}

// ── Authorization ───────────────────────────────────────────────────

export class UnauthorizedError extends ApiError {
  constructor(message = 'Unauthorized access to dataset') {
    super('UNAUTHORIZED', 403, message)
  }
}

// ── Request & data ──────────────────────────────────────────────────

export class BadRequestError extends ApiError {
  constructor(message: string) {
    super('BAD_REQUEST', 400, message)
  }
}

export class DatasetNotFoundError extends ApiError {
  constructor(message = 'No dataset found in storage') {
    super('DATASET_NOT_FOUND', 404, message)
  }
}

// ── External dependencies ───────────────────────────────────────────

export class StorageUnavailableError extends ApiError {
  constructor(message = 'Storage service unavailable', options?: ErrorOptions) {
    super('STORAGE_UNAVAILABLE', 500, message, { ...options, retryable: true })
  }
}

export class CredentialStoreUnavailableError extends ApiError {
  constructor(message = 'Error verifying credentials', options?: ErrorOptions) {
    super('CREDENTIAL_STORE_UNAVAILABLE', 500, message, { ...options, retryable: true })
  }
}

/** Failures the Tenant Resolver reports instead of throwing. */
export type AuthError =
  | MissingCredentialError
  | InvalidCredentialError
  | InvalidSubdomainError
  | TenantMismatchError
  | CredentialStoreUnavailableError
