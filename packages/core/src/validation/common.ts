import { DateTime, IANAZone } from 'luxon'
import { z } from 'zod'
import { type ErrorDetails, ValidationError } from '../errors.js'
import { DEFAULT_LIMIT, DEFAULT_PAGE, MAX_LIMIT } from '../pagination.js'

export const GRADE_LEVELS = ['PK', 'K', '1', '2', '3', '4', '5', '6', '7', '8', '9', '10', '11', '12'] as const
export type GradeLevel = (typeof GRADE_LEVELS)[number]

export const gradeLevel = z.enum(GRADE_LEVELS, {
  errorMap: () => ({ message: 'Grade level must be PK, K or 1 through 12' }),
})

/** Calendar date, YYYY-MM-DD */
export const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be a date in YYYY-MM-DD format')
  .refine((v) => DateTime.fromISO(v, { zone: 'utc' }).isValid, 'Must be a valid calendar date')

/** Calendar date that is not after today (UTC) */
export const pastOrTodayDate = isoDate.refine(
  (v) => v <= (DateTime.utc().toISODate() ?? v),
  'Date cannot be in the future',
)

/** ISO-8601 date-time with an offset, parsed to a Date */
export const dateTime = z
  .string()
  .datetime({ offset: true, message: 'Must be an ISO-8601 date-time' })
  .transform((v) => new Date(v))

export const hexColor = z.string().regex(/^#[0-9A-Fa-f]{6}$/, 'Color must be a hex value like #4A90D9')

export const timezone = z
  .string()
  .refine((v) => IANAZone.isValidZone(v), 'Must be an IANA time zone such as America/Chicago')

export const email = z.string().trim().toLowerCase().email('Must be a valid email address').max(255)

export const personName = z.string().trim().min(1, 'Required').max(50)

export const id = z.string().trim().min(1)

/** Optional free text; null clears the value on update */
export function text(max: number) {
  return z.string().trim().max(max).nullable().optional()
}

export const booleanQuery = z
  .enum(['true', 'false'], { errorMap: () => ({ message: 'Must be true or false' }) })
  .transform((v) => v === 'true')

export const order = z.enum(['asc', 'desc']).default('asc')

export const pageQuery = {
  page: z.coerce.number().int().min(1).default(DEFAULT_PAGE),
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT),
}

export const pageOnlyQuery = z.object(pageQuery)

export const permanentQuery = z.object({
  permanent: booleanQuery.default('false'),
})

function issueDetails(error: z.ZodError): ErrorDetails {
  const details: ErrorDetails = {}
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body'
    ;(details[field] ??= []).push(issue.message)
  }
  return details
}

/**
 * Validate `input` against `schema`, throwing a VALIDATION_ERROR with
 * per-field details on failure.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  statusCode: 400 | 422 = 422,
): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new ValidationError('Validation failed', issueDetails(result.error), statusCode)
  }
  return result.data
}

/** Query strings are malformed requests, not invalid entities */
export function parseQuery<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  return parseWith(schema, input ?? {}, 400)
}
