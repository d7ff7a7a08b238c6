/**
 * Recurrence Expander
 *
 * Lazily turns a series (base start/end + rule) into concrete occurrences
 * inside a query window. Nothing is materialized beyond the window: the
 * generator walks the rule period by period (day, week or month) and stops as
 * soon as a period begins at or after the window end.
 *
 * The base start is always occurrence zero and counts toward COUNT, whether
 * or not it matches BYDAY/BYMONTHDAY.
 */

import { DateTime, type Duration } from 'luxon'
import { untilInstant, weekdayNumber } from './rule.js'
import type { Occurrence, RecurrenceRule, SeriesBase, TimeWindow, Weekday } from './types.js'

/** Upper bound on periods walked per expansion */
const MAX_PERIODS = 100_000

/**
 * Window membership: overlap for occurrences with a duration, start inside
 * [from, to) for zero-length ones.
 */
export function occursWithin(occurrence: Occurrence, window: TimeWindow): boolean {
  const start = occurrence.start.getTime()
  const end = occurrence.end.getTime()
  const from = window.from.getTime()
  const to = window.to.getTime()
  if (end <= start) {
    return start >= from && start < to
  }
  return start < to && end > from
}

function weekStartOf(day: DateTime, weekStart: Weekday): DateTime {
  const offset = (day.weekday - weekdayNumber(weekStart) + 7) % 7
  return day.minus({ days: offset })
}

function periodStart(rule: RecurrenceRule, anchorDay: DateTime, index: number): DateTime {
  switch (rule.freq) {
    case 'DAILY':
      return anchorDay.plus({ days: index * rule.interval })
    case 'WEEKLY':
      return weekStartOf(anchorDay, rule.weekStart).plus({ weeks: index * rule.interval })
    case 'MONTHLY':
      return anchorDay.startOf('month').plus({ months: index * rule.interval })
  }
}

/**
 * Days of the month selected by BYMONTHDAY and/or BYDAY.
 * Days a month does not have are skipped, never clamped.
 */
function monthlyDays(rule: RecurrenceRule, month: DateTime, anchorDay: DateTime): number[] {
  const daysInMonth = month.daysInMonth ?? 31

  let byMonthDay: Set<number> | null = null
  if (rule.byMonthDay) {
    byMonthDay = new Set()
    for (const value of rule.byMonthDay) {
      const day = value > 0 ? value : daysInMonth + value + 1
      if (day >= 1 && day <= daysInMonth) byMonthDay.add(day)
    }
  }

  let byDay: Set<number> | null = null
  if (rule.byDay) {
    byDay = new Set()
    for (const spec of rule.byDay) {
      const first = 1 + ((weekdayNumber(spec.weekday) - month.weekday + 7) % 7)
      const matches: number[] = []
      for (let day = first; day <= daysInMonth; day += 7) matches.push(day)
      if (spec.ordinal === undefined) {
        matches.forEach((day) => byDay?.add(day))
        continue
      }
      const picked = spec.ordinal > 0 ? matches[spec.ordinal - 1] : matches[matches.length + spec.ordinal]
      if (picked !== undefined) byDay.add(picked)
    }
  }

  let days: number[]
  if (byMonthDay && byDay) {
    const allowed = byDay
    days = [...byMonthDay].filter((day) => allowed.has(day))
  } else if (byMonthDay) {
    days = [...byMonthDay]
  } else if (byDay) {
    days = [...byDay]
  } else {
    days = anchorDay.day <= daysInMonth ? [anchorDay.day] : []
  }
  return days.sort((a, b) => a - b)
}

function candidateDays(rule: RecurrenceRule, period: DateTime, anchorDay: DateTime): DateTime[] {
  switch (rule.freq) {
    case 'DAILY': {
      if (rule.byDay && !rule.byDay.some((d) => weekdayNumber(d.weekday) === period.weekday)) {
        return []
      }
      return [period]
    }
    case 'WEEKLY': {
      const weekdays = rule.byDay
        ? rule.byDay.map((d) => weekdayNumber(d.weekday))
        : [anchorDay.weekday]
      const startNumber = weekdayNumber(rule.weekStart)
      const offsets = [...new Set(weekdays.map((w) => (w - startNumber + 7) % 7))].sort(
        (a, b) => a - b,
      )
      return offsets.map((offset) => period.plus({ days: offset }))
    }
    case 'MONTHLY':
      return monthlyDays(rule, period, anchorDay).map((day) => period.set({ day }))
  }
}

/**
 * Index of the first period worth walking for a window far past the base.
 * Only used for rules without COUNT, where earlier periods need not be counted.
 */
function firstUsefulPeriod(
  rule: RecurrenceRule,
  anchorDay: DateTime,
  from: Date,
  durationMs: number,
  zone: string,
): number {
  const lookFrom = DateTime.fromMillis(from.getTime() - durationMs, { zone }).startOf('day')
  if (lookFrom.toMillis() <= anchorDay.toMillis()) return 0

  let elapsed = 0
  switch (rule.freq) {
    case 'DAILY':
      elapsed = lookFrom.diff(anchorDay, 'days').days
      break
    case 'WEEKLY':
      elapsed = weekStartOf(lookFrom, rule.weekStart)
        .diff(weekStartOf(anchorDay, rule.weekStart), 'weeks').weeks
      break
    case 'MONTHLY':
      elapsed = lookFrom.startOf('month').diff(anchorDay.startOf('month'), 'months').months
      break
  }
  return Math.max(0, Math.floor(elapsed / rule.interval) - 1)
}

function atTimeOfDay(day: DateTime, time: DateTime): DateTime {
  return DateTime.fromObject(
    {
      year: day.year,
      month: day.month,
      day: day.day,
      hour: time.hour,
      minute: time.minute,
      second: time.second,
      millisecond: time.millisecond,
    },
    { zone: time.zone },
  )
}

/**
 * Expand a series into the occurrences that fall in `window`, in start order.
 *
 * Restartable: each call walks the rule from scratch, so repeated calls with
 * the same arguments yield identical sequences.
 */
export function* expandOccurrences(
  base: SeriesBase,
  rule: RecurrenceRule,
  window: TimeWindow,
): Generator<Occurrence> {
  const toMs = window.to.getTime()
  if (toMs <= window.from.getTime()) return
  if (base.start.getTime() >= toMs) return

  const zone = base.timezone
  const baseStart = DateTime.fromJSDate(base.start, { zone })
  const baseEnd = DateTime.fromJSDate(base.end, { zone })
  const durationMs = base.end.getTime() - base.start.getTime()
  const allDayDuration: Duration = baseEnd.diff(baseStart, ['days', 'milliseconds'])
  const until = untilInstant(rule, zone)

  const makeOccurrence = (start: DateTime): Occurrence => ({
    start: start.toJSDate(),
    end: base.allDay ? start.plus(allDayDuration).toJSDate() : new Date(start.toMillis() + durationMs),
  })

  const first: Occurrence = { start: base.start, end: base.end }
  if (occursWithin(first, window)) yield first

  let generated = 1
  if (rule.count !== undefined && generated >= rule.count) return

  const anchorDay = baseStart.startOf('day')
  const firstIndex =
    rule.count === undefined ? firstUsefulPeriod(rule, anchorDay, window.from, durationMs, zone) : 0

  for (let index = firstIndex; index < firstIndex + MAX_PERIODS; index++) {
    const period = periodStart(rule, anchorDay, index)
    // Past the range luxon can represent
    if (!period.isValid) return
    if (period.toMillis() >= toMs) return
    if (until && period.toMillis() > until.getTime()) return

    for (const day of candidateDays(rule, period, anchorDay)) {
      const start = atTimeOfDay(day, baseStart)
      const startMs = start.toMillis()
      if (startMs <= base.start.getTime()) continue
      if (until && startMs > until.getTime()) return
      if (startMs >= toMs) return

      generated++
      const occurrence = makeOccurrence(start)
      if (occursWithin(occurrence, window)) yield occurrence
      if (rule.count !== undefined && generated >= rule.count) return
    }
  }
}

/**
 * True when the series generates an occurrence starting exactly at `instant`.
 */
export function isOccurrence(base: SeriesBase, rule: RecurrenceRule, instant: Date): boolean {
  const window = { from: instant, to: new Date(instant.getTime() + 1) }
  for (const occurrence of expandOccurrences(base, rule, window)) {
    if (occurrence.start.getTime() === instant.getTime()) return true
  }
  return false
}

/**
 * Number of occurrences that start strictly before `instant`.
 */
export function countOccurrencesBefore(
  base: SeriesBase,
  rule: RecurrenceRule,
  instant: Date,
): number {
  let count = 0
  for (const occurrence of expandOccurrences(base, rule, { from: base.start, to: instant })) {
    if (occurrence.start.getTime() < instant.getTime()) count++
  }
  return count
}

/**
 * Copy of `rule` that ends just before `splitAt`.
 * COUNT is replaced by an UNTIL; all-day series get a date UNTIL.
 */
export function truncateRuleBefore(
  rule: RecurrenceRule,
  base: SeriesBase,
  splitAt: Date,
): RecurrenceRule {
  const truncated: RecurrenceRule = { ...rule }
  delete truncated.count
  if (base.allDay) {
    const lastDay = DateTime.fromJSDate(splitAt, { zone: base.timezone }).minus({ days: 1 })
    truncated.until = { kind: 'date', date: lastDay.toISODate() ?? '' }
  } else {
    truncated.until = { kind: 'datetime', instant: new Date(splitAt.getTime() - 1000) }
  }
  return truncated
}

/**
 * Occurrences left from `splitAt` onward for a COUNT rule, or undefined.
 */
export function remainingCount(
  rule: RecurrenceRule,
  base: SeriesBase,
  splitAt: Date,
): number | undefined {
  if (rule.count === undefined) return undefined
  return rule.count - countOccurrencesBefore(base, rule, splitAt)
}
