/**
 * API Error Model
 *
 * Every failure that reaches a client is an ApiError. Managers and routes throw
 * the subclasses below; the server's error handler turns them into the
 * `{ success: false, error: { code, message, details? } }` envelope.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'TOKEN_EXPIRED'
  | 'INVALID_TOKEN'
  | 'INVALID_CREDENTIALS'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'DUPLICATE_EMAIL'
  | 'CONFLICT'
  | 'FILE_TOO_LARGE'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'RATE_LIMIT_EXCEEDED'
  | 'INTERNAL_ERROR'
  | 'SERVICE_UNAVAILABLE'

export const ERROR_STATUS: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 422,
  UNAUTHORIZED: 401,
  TOKEN_EXPIRED: 401,
  INVALID_TOKEN: 401,
  INVALID_CREDENTIALS: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  DUPLICATE_EMAIL: 409,
  CONFLICT: 409,
  FILE_TOO_LARGE: 413,
  UNSUPPORTED_FILE_TYPE: 415,
  RATE_LIMIT_EXCEEDED: 429,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
}

/** Field name → messages */
export type ErrorDetails = Record<string, string[]>

export interface ErrorBody {
  code: ErrorCode
  message: string
  details?: ErrorDetails
}

export class ApiError extends Error {
  readonly code: ErrorCode
  readonly statusCode: number
  readonly details?: ErrorDetails

  constructor(code: ErrorCode, message: string, details?: ErrorDetails, statusCode?: number) {
    super(message)
    this.name = 'ApiError'
    this.code = code
    this.statusCode = statusCode ?? ERROR_STATUS[code]
    this.details = details
  }

  toBody(): ErrorBody {
    const body: ErrorBody = { code: this.code, message: this.message }
    if (this.details && Object.keys(this.details).length > 0) {
      body.details = this.details
    }
    return body
  }
}

/**
 * Field-level validation failure.
 * Status is 422 for body fields and 400 for malformed query strings.
 */
export class ValidationError extends ApiError {
  constructor(message: string, details?: ErrorDetails, statusCode: 400 | 422 = 422) {
    super('VALIDATION_ERROR', message, details, statusCode)
    this.name = 'ValidationError'
  }

  static field(field: string, message: string, statusCode: 400 | 422 = 422): ValidationError {
    return new ValidationError(message, { [field]: [message] }, statusCode)
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = 'Authentication required') {
    super('UNAUTHORIZED', message)
    this.name = 'UnauthorizedError'
  }
}

export class TokenExpiredError extends ApiError {
  constructor() {
    super('TOKEN_EXPIRED', 'Access token has expired')
    this.name = 'TokenExpiredError'
  }
}

export class InvalidTokenError extends ApiError {
  constructor(message = 'Token is invalid or has expired') {
    super('INVALID_TOKEN', message)
    this.name = 'InvalidTokenError'
  }
}

export class InvalidCredentialsError extends ApiError {
  constructor() {
    super('INVALID_CREDENTIALS', 'Invalid email or password')
    this.name = 'InvalidCredentialsError'
  }
}

export class ForbiddenError extends ApiError {
  constructor(message = 'You do not have permission to perform this action') {
    super('FORBIDDEN', message)
    this.name = 'ForbiddenError'
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string) {
    super('NOT_FOUND', `${resource} not found`)
    this.name = 'NotFoundError'
  }
}

export class DuplicateEmailError extends ApiError {
  constructor() {
    super('DUPLICATE_EMAIL', 'An account with this email already exists')
    this.name = 'DuplicateEmailError'
  }
}

export class ConflictError extends ApiError {
  constructor(message: string) {
    super('CONFLICT', message)
    this.name = 'ConflictError'
  }
}

export class FileTooLargeError extends ApiError {
  constructor(maxBytes: number) {
    super('FILE_TOO_LARGE', `File exceeds the ${Math.round(maxBytes / (1024 * 1024))}MB limit`)
    this.name = 'FileTooLargeError'
  }
}

export class UnsupportedFileTypeError extends ApiError {
  constructor(mimeType: string, allowed: string[]) {
    super('UNSUPPORTED_FILE_TYPE', `File type ${mimeType} is not allowed`, {
      file: [`Allowed types: ${allowed.join(', ')}`],
    })
    this.name = 'UnsupportedFileTypeError'
  }
}

export class ServiceUnavailableError extends ApiError {
  constructor(message = 'Service temporarily unavailable') {
    super('SERVICE_UNAVAILABLE', message)
    this.name = 'ServiceUnavailableError'
  }
}

/**
 * Envelope body for an error that is not an ApiError.
 * Internal details never leave the process.
 */
export function internalErrorBody(): ErrorBody {
  return { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' }
}
