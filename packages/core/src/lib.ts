// Public API for consumption by the server package

// Errors
export {
  ApiError,
  ValidationError,
  UnauthorizedError,
  TokenExpiredError,
  InvalidTokenError,
  InvalidCredentialsError,
  ForbiddenError,
  NotFoundError,
  DuplicateEmailError,
  ConflictError,
  FileTooLargeError,
  UnsupportedFileTypeError,
  ServiceUnavailableError,
  ERROR_STATUS,
  internalErrorBody,
} from './errors.js'
export type { ErrorCode, ErrorBody, ErrorDetails } from './errors.js'

// Configuration and logging
export { loadConfig, DEFAULT_RATE_LIMITS } from './config.js'
export type {
  HomeroomConfig,
  LoadConfigOptions,
  AuthConfig,
  LogConfig,
  RateLimitRule,
  RateLimitBucket,
} from './config.js'
export { createLogger, REDACTED_PATHS } from './logger.js'
export type { Logger } from './logger.js'

// Pagination
export { buildPageMeta, pageOffset, DEFAULT_PAGE, DEFAULT_LIMIT, MAX_LIMIT } from './pagination.js'
export type { PageRequest, PageMeta, Page } from './pagination.js'

// Grades
export { letterGrade, averageScore } from './grades.js'
export type { LetterGrade } from './grades.js'

// Uploads
export { UPLOAD_POLICIES, extensionFor, allowedTypes } from './uploads.js'
export type { UploadKind, UploadPolicy } from './uploads.js'

// Auth primitives
export {
  hashPassword,
  verifyPassword,
  passwordProblems,
  PASSWORD_MIN_LENGTH,
  PASSWORD_MAX_LENGTH,
} from './auth/passwords.js'
export { TokenService, hashToken, generateOpaqueToken } from './auth/tokens.js'
export type { SignedToken, VerifiedRefreshToken, TokenType } from './auth/tokens.js'

// Recurrence
export * from './recurrence/index.js'

// Validation schemas
export * from './validation/index.js'
