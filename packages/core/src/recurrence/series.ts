/**
 * Series Expansion with Exceptions
 *
 * A detached exception replaces the generated occurrence whose start equals its
 * `originalStart`; a cancelled exception suppresses it. Exceptions whose
 * original slot is no longer generated by the rule (for example after the
 * series was moved) are orphaned and ignored.
 */

import { expandOccurrences, isOccurrence, occursWithin } from './expander.js'
import type {
  RecurrenceRule,
  SeriesBase,
  SeriesException,
  SeriesOccurrence,
  TimeWindow,
} from './types.js'

/**
 * Occurrences of a series in `window`, sorted by start. On equal starts a
 * generated occurrence comes first, then exceptions by id.
 */
export function expandSeries(
  base: SeriesBase,
  rule: RecurrenceRule,
  exceptions: SeriesException[],
  window: TimeWindow,
): SeriesOccurrence[] {
  const replaced = new Set(exceptions.map((e) => e.originalStart.getTime()))
  const result: SeriesOccurrence[] = []

  for (const occurrence of expandOccurrences(base, rule, window)) {
    if (replaced.has(occurrence.start.getTime())) continue
    result.push({ kind: 'generated', start: occurrence.start, end: occurrence.end })
  }

  for (const exception of exceptions) {
    if (exception.cancelled) continue
    if (!occursWithin(exception, window)) continue
    if (!isOccurrence(base, rule, exception.originalStart)) continue
    result.push({
      kind: 'exception',
      exceptionId: exception.id,
      originalStart: exception.originalStart,
      start: exception.start,
      end: exception.end,
    })
  }

  return result.sort((a, b) => {
    const diff = a.start.getTime() - b.start.getTime()
    if (diff !== 0) return diff
    if (a.kind === 'exception' && b.kind === 'exception') {
      return a.exceptionId < b.exceptionId ? -1 : a.exceptionId > b.exceptionId ? 1 : 0
    }
    if (a.kind === b.kind) return 0
    return a.kind === 'generated' ? -1 : 1
  })
}
