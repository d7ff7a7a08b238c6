/**
 * Recurrence System
 *
 * RRULE subset parsing plus lazy, window-bounded occurrence expansion.
 */

export type {
  Frequency,
  Weekday,
  WeekdaySpec,
  RuleUntil,
  RecurrenceRule,
  SeriesBase,
  TimeWindow,
  Occurrence,
  SeriesException,
  SeriesOccurrence,
  RecurringEditMode,
} from './types.js'

export {
  WEEKDAYS,
  RecurrenceRuleError,
  parseRecurrenceRule,
  formatRecurrenceRule,
  validateRecurrenceRule,
  untilInstant,
  weekdayNumber,
} from './rule.js'
export {
  expandOccurrences,
  occursWithin,
  isOccurrence,
  countOccurrencesBefore,
  truncateRuleBefore,
  remainingCount,
} from './expander.js'
export { expandSeries } from './series.js'
