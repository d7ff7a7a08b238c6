/**
 * Recurrence Types
 *
 * A subset of the RFC 5545 RRULE model: DAILY, WEEKLY and MONTHLY rules with
 * interval, by-day, by-month-day, count, until and week start.
 */

export type Frequency = 'DAILY' | 'WEEKLY' | 'MONTHLY'

export type Weekday = 'MO' | 'TU' | 'WE' | 'TH' | 'FR' | 'SA' | 'SU'

/** BYDAY entry. `ordinal` is only valid for MONTHLY rules (1MO, -1FR). */
export interface WeekdaySpec {
  weekday: Weekday
  ordinal?: number
}

/**
 * UNTIL is either a calendar date (inclusive through the end of that day in the
 * event's zone) or an absolute UTC instant.
 */
export type RuleUntil = { kind: 'date'; date: string } | { kind: 'datetime'; instant: Date }

export interface RecurrenceRule {
  freq: Frequency
  interval: number
  byDay?: WeekdaySpec[]
  byMonthDay?: number[]
  count?: number
  until?: RuleUntil
  weekStart: Weekday
}

/**
 * The anchor of a series: its first occurrence.
 * `timezone` is an IANA zone; wall-clock time is preserved in it.
 */
export interface SeriesBase {
  start: Date
  end: Date
  allDay: boolean
  timezone: string
}

/** Half-open query window [from, to) */
export interface TimeWindow {
  from: Date
  to: Date
}

export interface Occurrence {
  start: Date
  end: Date
}

/**
 * A detached occurrence of a series.
 * `originalStart` is the generated start it replaces.
 */
export interface SeriesException {
  id: string
  originalStart: Date
  start: Date
  end: Date
  cancelled: boolean
}

export type SeriesOccurrence =
  | { kind: 'generated'; start: Date; end: Date }
  | { kind: 'exception'; exceptionId: string; originalStart: Date; start: Date; end: Date }

/** Which occurrences of a series an edit or delete applies to */
export type RecurringEditMode = 'this' | 'following' | 'all'
