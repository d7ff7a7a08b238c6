/**
 * Recurrence Rule Parsing
 *
 * Parses and formats the RRULE subset used by calendar events, e.g.
 * `FREQ=WEEKLY;BYDAY=MO,WE,FR` or `RRULE:FREQ=MONTHLY;BYDAY=-1FR;COUNT=6`.
 */

import { DateTime } from 'luxon'
import { ValidationError } from '../errors.js'
import type { Frequency, RecurrenceRule, RuleUntil, SeriesBase, Weekday, WeekdaySpec } from './types.js'

export const WEEKDAYS: readonly Weekday[] = ['MO', 'TU', 'WE', 'TH', 'FR', 'SA', 'SU']

const FREQUENCIES: readonly Frequency[] = ['DAILY', 'WEEKLY', 'MONTHLY']

const KNOWN_KEYS = new Set(['FREQ', 'INTERVAL', 'BYDAY', 'BYMONTHDAY', 'COUNT', 'UNTIL', 'WKST'])

const MAX_INTERVAL = 1000
const MAX_COUNT = 100_000

/**
 * Malformed or inconsistent recurrence rule.
 * Surfaces as a 422 on the `recurrence_rule` field.
 */
export class RecurrenceRuleError extends ValidationError {
  constructor(message: string) {
    super(`Invalid recurrence rule: ${message}`, { recurrence_rule: [message] })
    this.name = 'RecurrenceRuleError'
  }
}

/** Luxon weekday number (1 = Monday … 7 = Sunday) */
export function weekdayNumber(day: Weekday): number {
  return WEEKDAYS.indexOf(day) + 1
}

function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some((day) => day === value)
}

function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some((frequency) => frequency === value)
}

function parsePositiveInt(key: string, raw: string, max: number): number {
  if (!/^[+-]?\d+$/.test(raw)) {
    throw new RecurrenceRuleError(`${key} must be an integer`)
  }
  const value = parseInt(raw, 10)
  if (value <= 0) {
    throw new RecurrenceRuleError(`${key} must be greater than zero`)
  }
  if (!Number.isSafeInteger(value) || value > max) {
    throw new RecurrenceRuleError(`${key} must be at most ${max}`)
  }
  return value
}

function parseByDay(raw: string): WeekdaySpec[] {
  return raw.split(',').map((part) => {
    const match = /^([+-]?\d{1,2})?([A-Z]{2})$/.exec(part.trim().toUpperCase())
    const weekday = match?.[2]
    if (!match || weekday === undefined || !isWeekday(weekday)) {
      throw new RecurrenceRuleError(`unknown BYDAY value '${part}'`)
    }
    const spec: WeekdaySpec = { weekday }
    if (match[1] !== undefined) {
      const ordinal = parseInt(match[1], 10)
      if (ordinal === 0 || Math.abs(ordinal) > 5) {
        throw new RecurrenceRuleError(`BYDAY ordinal must be between -5 and 5, excluding 0`)
      }
      spec.ordinal = ordinal
    }
    return spec
  })
}

function parseByMonthDay(raw: string): number[] {
  return raw.split(',').map((part) => {
    const trimmed = part.trim()
    if (!/^[+-]?\d{1,2}$/.test(trimmed)) {
      throw new RecurrenceRuleError(`unknown BYMONTHDAY value '${part}'`)
    }
    const day = parseInt(trimmed, 10)
    if (day === 0 || Math.abs(day) > 31) {
      throw new RecurrenceRuleError('BYMONTHDAY must be between -31 and 31, excluding 0')
    }
    return day
  })
}

function parseUntil(raw: string): RuleUntil {
  const value = raw.trim().toUpperCase()
  if (/^\d{8}$/.test(value)) {
    const date = DateTime.fromFormat(value, 'yyyyMMdd', { zone: 'utc' })
    if (!date.isValid) {
      throw new RecurrenceRuleError(`UNTIL '${raw}' is not a valid date`)
    }
    return { kind: 'date', date: date.toISODate() ?? '' }
  }
  if (/^\d{8}T\d{6}Z$/.test(value)) {
    const instant = DateTime.fromFormat(value, "yyyyMMdd'T'HHmmss'Z'", { zone: 'utc' })
    if (!instant.isValid) {
      throw new RecurrenceRuleError(`UNTIL '${raw}' is not a valid date-time`)
    }
    return { kind: 'datetime', instant: instant.toJSDate() }
  }
  throw new RecurrenceRuleError('UNTIL must be YYYYMMDD or YYYYMMDDTHHMMSSZ')
}

/**
 * Parse an RRULE string.
 * Throws RecurrenceRuleError on unknown keys, unknown tokens, repeated keys or
 * inconsistent combinations.
 */
export function parseRecurrenceRule(text: string): RecurrenceRule {
  let source = text.trim()
  if (/^RRULE:/i.test(source)) {
    source = source.slice('RRULE:'.length)
  }
  if (source.length === 0) {
    throw new RecurrenceRuleError('rule is empty')
  }

  const parts = new Map<string, string>()
  for (const segment of source.split(';')) {
    if (segment.trim() === '') continue
    const eq = segment.indexOf('=')
    if (eq <= 0) {
      throw new RecurrenceRuleError(`malformed part '${segment}'`)
    }
    const key = segment.slice(0, eq).trim().toUpperCase()
    const value = segment.slice(eq + 1).trim()
    if (!KNOWN_KEYS.has(key)) {
      throw new RecurrenceRuleError(`unsupported part '${key}'`)
    }
    if (parts.has(key)) {
      throw new RecurrenceRuleError(`${key} appears more than once`)
    }
    if (value === '') {
      throw new RecurrenceRuleError(`${key} has no value`)
    }
    parts.set(key, value)
  }

  const freqRaw = parts.get('FREQ')?.toUpperCase()
  if (!freqRaw) {
    throw new RecurrenceRuleError('FREQ is required')
  }
  if (!isFrequency(freqRaw)) {
    throw new RecurrenceRuleError(`unsupported FREQ '${freqRaw}'`)
  }

  const rule: RecurrenceRule = {
    freq: freqRaw,
    interval: 1,
    weekStart: 'MO',
  }

  const interval = parts.get('INTERVAL')
  if (interval !== undefined) rule.interval = parsePositiveInt('INTERVAL', interval, MAX_INTERVAL)

  const count = parts.get('COUNT')
  if (count !== undefined) rule.count = parsePositiveInt('COUNT', count, MAX_COUNT)

  const until = parts.get('UNTIL')
  if (until !== undefined) rule.until = parseUntil(until)

  if (rule.count !== undefined && rule.until !== undefined) {
    throw new RecurrenceRuleError('COUNT and UNTIL cannot both be set')
  }

  const byDay = parts.get('BYDAY')
  if (byDay !== undefined) {
    rule.byDay = parseByDay(byDay)
    if (rule.freq !== 'MONTHLY' && rule.byDay.some((d) => d.ordinal !== undefined)) {
      throw new RecurrenceRuleError('BYDAY ordinals are only allowed with FREQ=MONTHLY')
    }
  }

  const byMonthDay = parts.get('BYMONTHDAY')
  if (byMonthDay !== undefined) {
    if (rule.freq !== 'MONTHLY') {
      throw new RecurrenceRuleError('BYMONTHDAY is only allowed with FREQ=MONTHLY')
    }
    rule.byMonthDay = parseByMonthDay(byMonthDay)
  }

  const wkst = parts.get('WKST')?.toUpperCase()
  if (wkst !== undefined) {
    if (!isWeekday(wkst)) {
      throw new RecurrenceRuleError(`unknown WKST '${wkst}'`)
    }
    rule.weekStart = wkst
  }

  return rule
}

/**
 * Serialize a rule in canonical order.
 * Defaults (INTERVAL=1, WKST=MO) are omitted.
 */
export function formatRecurrenceRule(rule: RecurrenceRule): string {
  const parts = [`FREQ=${rule.freq}`]
  if (rule.interval !== 1) parts.push(`INTERVAL=${rule.interval}`)
  if (rule.byDay && rule.byDay.length > 0) {
    parts.push(`BYDAY=${rule.byDay.map((d) => `${d.ordinal ?? ''}${d.weekday}`).join(',')}`)
  }
  if (rule.byMonthDay && rule.byMonthDay.length > 0) {
    parts.push(`BYMONTHDAY=${rule.byMonthDay.join(',')}`)
  }
  if (rule.count !== undefined) parts.push(`COUNT=${rule.count}`)
  if (rule.until) {
    parts.push(
      rule.until.kind === 'date'
        ? `UNTIL=${rule.until.date.replace(/-/g, '')}`
        : `UNTIL=${DateTime.fromJSDate(rule.until.instant, { zone: 'utc' }).toFormat("yyyyMMdd'T'HHmmss'Z'")}`,
    )
  }
  if (rule.weekStart !== 'MO') parts.push(`WKST=${rule.weekStart}`)
  return parts.join(';')
}

/**
 * Resolve UNTIL to the last instant an occurrence may start at.
 */
export function untilInstant(rule: RecurrenceRule, timezone: string): Date | null {
  if (!rule.until) return null
  if (rule.until.kind === 'datetime') return rule.until.instant
  return DateTime.fromISO(rule.until.date, { zone: timezone }).endOf('day').toJSDate()
}

/**
 * Check a parsed rule against the series it belongs to.
 */
export function validateRecurrenceRule(rule: RecurrenceRule, base: SeriesBase): void {
  const until = untilInstant(rule, base.timezone)
  if (until && until.getTime() < base.start.getTime()) {
    throw new RecurrenceRuleError('UNTIL is before the event start')
  }
  if (rule.count !== undefined && rule.count <= 0) {
    throw new RecurrenceRuleError('COUNT must be greater than zero')
  }
  if (rule.interval <= 0) {
    throw new RecurrenceRuleError('INTERVAL must be greater than zero')
  }
}
