/**
 * Recurrence Tests
 *
 * Rule parsing/formatting and window-bounded expansion:
 * - WEEKLY/DAILY/MONTHLY generation, COUNT and UNTIL
 * - wall-clock preservation across DST
 * - exceptions (moved, cancelled, orphaned)
 * - series splitting helpers
 */

import { describe, it, expect } from 'vitest'

import {
  RecurrenceRuleError,
  parseRecurrenceRule,
  formatRecurrenceRule,
  validateRecurrenceRule,
} from '../src/recurrence/rule.js'
import {
  expandOccurrences,
  isOccurrence,
  countOccurrencesBefore,
  truncateRuleBefore,
  remainingCount,
} from '../src/recurrence/expander.js'
import { expandSeries } from '../src/recurrence/series.js'
import type { RecurrenceRule, SeriesBase, TimeWindow } from '../src/recurrence/types.js'
import { ValidationError } from '../src/errors.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

function utc(iso: string): Date {
  return new Date(iso)
}

function base(start: string, end: string, timezone = 'UTC', allDay = false): SeriesBase {
  return { start: utc(start), end: utc(end), allDay, timezone }
}

function window(from: string, to: string): TimeWindow {
  return { from: utc(from), to: utc(to) }
}

function starts(series: SeriesBase, rule: string, w: TimeWindow): string[] {
  return [...expandOccurrences(series, parseRecurrenceRule(rule), w)].map((o) => o.start.toISOString())
}

// -------------------------------------------------------------------
// Parsing
// -------------------------------------------------------------------

describe('parseRecurrenceRule', () => {
  it('parses keys case-insensitively with an optional RRULE: prefix', () => {
    expect(parseRecurrenceRule('RRULE:freq=weekly;byday=mo,we,fr')).toEqual({
      freq: 'WEEKLY',
      interval: 1,
      weekStart: 'MO',
      byDay: [{ weekday: 'MO' }, { weekday: 'WE' }, { weekday: 'FR' }],
    })
  })

  it('parses monthly ordinals and month days', () => {
    const rule = parseRecurrenceRule('FREQ=MONTHLY;INTERVAL=2;BYDAY=-1FR,2MO;COUNT=6')
    expect(rule.interval).toBe(2)
    expect(rule.count).toBe(6)
    expect(rule.byDay).toEqual([
      { weekday: 'FR', ordinal: -1 },
      { weekday: 'MO', ordinal: 2 },
    ])
    expect(parseRecurrenceRule('FREQ=MONTHLY;BYMONTHDAY=1,-1').byMonthDay).toEqual([1, -1])
  })

  it('parses both UNTIL forms', () => {
    expect(parseRecurrenceRule('FREQ=DAILY;UNTIL=20251231').until).toEqual({ kind: 'date', date: '2025-12-31' })
    expect(parseRecurrenceRule('FREQ=DAILY;UNTIL=20251231T235959Z').until).toEqual({
      kind: 'datetime',
      instant: utc('2025-12-31T23:59:59Z'),
    })
  })

  it.each([
    ['FREQ=YEARLY'],
    ['FREQ=HOURLY'],
    ['INTERVAL=2'],
    [''],
    ['FREQ=DAILY;FOO=1'],
    ['FREQ=DAILY;BYSETPOS=1'],
    ['FREQ=DAILY;FREQ=WEEKLY'],
    ['FREQ=WEEKLY;COUNT=3;UNTIL=20250101'],
    ['FREQ=WEEKLY;BYDAY=1MO'],
    ['FREQ=DAILY;BYMONTHDAY=5'],
    ['FREQ=MONTHLY;BYDAY=6MO'],
    ['FREQ=MONTHLY;BYMONTHDAY=32'],
    ['FREQ=WEEKLY;BYDAY=XX'],
    ['FREQ=DAILY;COUNT=0'],
    ['FREQ=DAILY;INTERVAL=-2'],
    ['FREQ=DAILY;UNTIL=2025-01-01'],
    ['FREQ=DAILY;UNTIL=20250230'],
    ['FREQ=WEEKLY;WKST=XX'],
  ])('rejects %s', (text) => {
    expect(() => parseRecurrenceRule(text)).toThrow(RecurrenceRuleError)
  })

  it('caps INTERVAL and COUNT', () => {
    expect(() => parseRecurrenceRule('FREQ=WEEKLY;INTERVAL=99999999999999999999')).toThrow(
      'Invalid recurrence rule: INTERVAL must be at most 1000',
    )
    expect(() => parseRecurrenceRule('FREQ=DAILY;COUNT=100001')).toThrow(
      'Invalid recurrence rule: COUNT must be at most 100000',
    )
    expect(parseRecurrenceRule('FREQ=DAILY;INTERVAL=1000;COUNT=100000')).toMatchObject({
      interval: 1000,
      count: 100000,
    })
  })

  it('reports failures as a 422 on recurrence_rule', () => {
    try {
      parseRecurrenceRule('FREQ=YEARLY')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError)
      const error = err instanceof ValidationError ? err : null
      expect(error?.statusCode).toBe(422)
      expect(error?.message).toBe("Invalid recurrence rule: unsupported FREQ 'YEARLY'")
      expect(error?.details).toEqual({ recurrence_rule: ["unsupported FREQ 'YEARLY'"] })
    }
  })
})

describe('formatRecurrenceRule', () => {
  it('writes parts in canonical order and omits defaults', () => {
    expect(formatRecurrenceRule(parseRecurrenceRule('count=6;byday=-1fr;freq=monthly'))).toBe(
      'FREQ=MONTHLY;BYDAY=-1FR;COUNT=6',
    )
    expect(formatRecurrenceRule(parseRecurrenceRule('FREQ=WEEKLY;WKST=SU;INTERVAL=2'))).toBe(
      'FREQ=WEEKLY;INTERVAL=2;WKST=SU',
    )
    expect(formatRecurrenceRule(parseRecurrenceRule('FREQ=DAILY;UNTIL=20250110T120000Z'))).toBe(
      'FREQ=DAILY;UNTIL=20250110T120000Z',
    )
    expect(formatRecurrenceRule(parseRecurrenceRule('FREQ=DAILY;UNTIL=20250110'))).toBe('FREQ=DAILY;UNTIL=20250110')
  })
})

describe('validateRecurrenceRule', () => {
  it('rejects an UNTIL before the series start', () => {
    const series = base('2025-03-01T10:00:00Z', '2025-03-01T11:00:00Z')
    expect(() => validateRecurrenceRule(parseRecurrenceRule('FREQ=DAILY;UNTIL=20250201'), series)).toThrow(
      'UNTIL is before the event start',
    )
    expect(() => validateRecurrenceRule(parseRecurrenceRule('FREQ=DAILY;UNTIL=20250301'), series)).not.toThrow()
  })
})

// -------------------------------------------------------------------
// Expansion
// -------------------------------------------------------------------

describe('expandOccurrences', () => {
  const monday = base('2025-01-06T15:00:00Z', '2025-01-06T16:00:00Z')
  const year = window('2025-01-01T00:00:00Z', '2026-01-01T00:00:00Z')

  it('emits the base start as occurrence zero even when BYDAY does not match', () => {
    const saturday = base('2025-11-15T10:00:00Z', '2025-11-15T11:00:00Z')
    expect(
      starts(saturday, 'FREQ=WEEKLY;BYDAY=MO,WE,FR', window('2025-11-15T00:00:00Z', '2025-11-22T00:00:00Z')),
    ).toEqual([
      '2025-11-15T10:00:00.000Z',
      '2025-11-17T10:00:00.000Z',
      '2025-11-19T10:00:00.000Z',
      '2025-11-21T10:00:00.000Z',
    ])
  })

  it('gives exactly COUNT weekly occurrences spaced by the interval', () => {
    expect(starts(monday, 'FREQ=WEEKLY;COUNT=5', year)).toEqual([
      '2025-01-06T15:00:00.000Z',
      '2025-01-13T15:00:00.000Z',
      '2025-01-20T15:00:00.000Z',
      '2025-01-27T15:00:00.000Z',
      '2025-02-03T15:00:00.000Z',
    ])
    expect(starts(monday, 'FREQ=WEEKLY;INTERVAL=2;COUNT=4', year)).toEqual([
      '2025-01-06T15:00:00.000Z',
      '2025-01-20T15:00:00.000Z',
      '2025-02-03T15:00:00.000Z',
      '2025-02-17T15:00:00.000Z',
    ])
  })

  it('treats a date UNTIL as inclusive through that day', () => {
    const result = starts(monday, 'FREQ=DAILY;UNTIL=20250110', year)
    expect(result).toHaveLength(5)
    expect(result[4]).toBe('2025-01-10T15:00:00.000Z')
  })

  it('never emits a start after a date-time UNTIL', () => {
    const rule = parseRecurrenceRule('FREQ=DAILY;UNTIL=20250110T150000Z')
    const until = utc('2025-01-10T15:00:00Z').getTime()
    const occurrences = [...expandOccurrences(monday, rule, year)]
    expect(occurrences).toHaveLength(5)
    expect(occurrences.every((o) => o.start.getTime() <= until)).toBe(true)
  })

  it('keeps wall-clock time across a DST change', () => {
    const chicago = base('2025-03-07T15:00:00Z', '2025-03-07T16:00:00Z', 'America/Chicago')
    expect(starts(chicago, 'FREQ=DAILY;COUNT=4', year)).toEqual([
      '2025-03-07T15:00:00.000Z',
      '2025-03-08T15:00:00.000Z',
      '2025-03-09T14:00:00.000Z',
      '2025-03-10T14:00:00.000Z',
    ])
  })

  it('preserves duration in absolute time', () => {
    const [, second] = [...expandOccurrences(monday, parseRecurrenceRule('FREQ=DAILY;COUNT=2'), year)]
    expect(second.end.getTime() - second.start.getTime()).toBe(60 * 60 * 1000)
  })

  it('skips days a month does not have', () => {
    const lastDay = base('2025-01-31T10:00:00Z', '2025-01-31T11:00:00Z')
    expect(starts(lastDay, 'FREQ=MONTHLY;COUNT=4', year)).toEqual([
      '2025-01-31T10:00:00.000Z',
      '2025-03-31T10:00:00.000Z',
      '2025-05-31T10:00:00.000Z',
      '2025-07-31T10:00:00.000Z',
    ])
  })

  it('counts month days from the end of the month', () => {
    const lastDay = base('2025-01-31T10:00:00Z', '2025-01-31T11:00:00Z')
    expect(starts(lastDay, 'FREQ=MONTHLY;BYMONTHDAY=-1;COUNT=3', year)).toEqual([
      '2025-01-31T10:00:00.000Z',
      '2025-02-28T10:00:00.000Z',
      '2025-03-31T10:00:00.000Z',
    ])
  })

  it('picks the nth weekday of the month', () => {
    const lastFriday = base('2025-01-31T10:00:00Z', '2025-01-31T11:00:00Z')
    expect(starts(lastFriday, 'FREQ=MONTHLY;BYDAY=-1FR;COUNT=3', year)).toEqual([
      '2025-01-31T10:00:00.000Z',
      '2025-02-28T10:00:00.000Z',
      '2025-03-28T10:00:00.000Z',
    ])
  })

  it('keeps only days matching both BYDAY and BYMONTHDAY', () => {
    const fridayThe13th = base('2025-06-13T10:00:00Z', '2025-06-13T11:00:00Z')
    expect(
      starts(fridayThe13th, 'FREQ=MONTHLY;BYDAY=FR;BYMONTHDAY=13;COUNT=3', window('2025-06-01T00:00:00Z', '2026-06-01T00:00:00Z')),
    ).toEqual(['2025-06-13T10:00:00.000Z', '2026-02-13T10:00:00.000Z', '2026-03-13T10:00:00.000Z'])
  })

  it('groups BYDAY into weeks that begin on WKST', () => {
    const tuesday = base('2025-08-05T09:00:00Z', '2025-08-05T10:00:00Z')
    const range = window('2025-08-01T00:00:00Z', '2025-10-01T00:00:00Z')
    expect(starts(tuesday, 'FREQ=WEEKLY;INTERVAL=2;COUNT=4;BYDAY=TU,SU;WKST=MO', range)).toEqual([
      '2025-08-05T09:00:00.000Z',
      '2025-08-10T09:00:00.000Z',
      '2025-08-19T09:00:00.000Z',
      '2025-08-24T09:00:00.000Z',
    ])
    expect(starts(tuesday, 'FREQ=WEEKLY;INTERVAL=2;COUNT=4;BYDAY=TU,SU;WKST=SU', range)).toEqual([
      '2025-08-05T09:00:00.000Z',
      '2025-08-17T09:00:00.000Z',
      '2025-08-19T09:00:00.000Z',
      '2025-08-31T09:00:00.000Z',
    ])
  })

  it('stops when the next period is out of range', () => {
    const huge: RecurrenceRule = { freq: 'WEEKLY', interval: 1e20, weekStart: 'MO' }
    const result = [...expandOccurrences(monday, huge, year)].map((o) => o.start.toISOString())
    expect(result).toEqual(['2025-01-06T15:00:00.000Z'])
  })

  it('filters daily rules by BYDAY', () => {
    expect(starts(monday, 'FREQ=DAILY;BYDAY=TU,TH;COUNT=3', year)).toEqual([
      '2025-01-06T15:00:00.000Z',
      '2025-01-07T15:00:00.000Z',
      '2025-01-09T15:00:00.000Z',
    ])
  })

  it('terminates for rules that rarely or never match', () => {
    const february = base('2025-02-10T10:00:00Z', '2025-02-10T11:00:00Z')
    expect(
      starts(february, 'FREQ=MONTHLY;BYMONTHDAY=31;INTERVAL=12', window('2025-01-01T00:00:00Z', '2030-01-01T00:00:00Z')),
    ).toEqual(['2025-02-10T10:00:00.000Z'])
  })

  it('jumps ahead to windows far after the base start', () => {
    const old = base('2020-01-01T10:00:00Z', '2020-01-01T11:00:00Z')
    expect(starts(old, 'FREQ=DAILY', window('2025-06-01T00:00:00Z', '2025-06-02T00:00:00Z'))).toEqual([
      '2025-06-01T10:00:00.000Z',
    ])
  })

  it('includes zero-length occurrences only when from <= start < to', () => {
    const instant = base('2025-01-06T10:00:00Z', '2025-01-06T10:00:00Z')
    expect(starts(instant, 'FREQ=DAILY', window('2025-01-08T10:00:00Z', '2025-01-09T10:00:00Z'))).toEqual([
      '2025-01-08T10:00:00.000Z',
    ])
  })

  it('includes occurrences that overlap the window start', () => {
    expect(starts(monday, 'FREQ=DAILY', window('2025-01-07T15:30:00Z', '2025-01-08T00:00:00Z'))).toEqual([
      '2025-01-07T15:00:00.000Z',
    ])
  })

  it('yields nothing for an empty window', () => {
    expect(starts(monday, 'FREQ=DAILY', window('2025-01-10T00:00:00Z', '2025-01-10T00:00:00Z'))).toEqual([])
  })

  it('is idempotent and a sub-window is a subset of its superset', () => {
    const rule = 'FREQ=WEEKLY;BYDAY=TU,TH'
    const wide = window('2025-01-01T00:00:00Z', '2025-03-01T00:00:00Z')
    const narrow = window('2025-01-15T00:00:00Z', '2025-02-01T00:00:00Z')

    const first = starts(monday, rule, wide)
    expect(starts(monday, rule, wide)).toEqual(first)

    const sub = starts(monday, rule, narrow)
    expect(sub.length).toBeGreaterThan(0)
    expect(sub.every((s) => first.includes(s))).toBe(true)
    expect(sub).toEqual(
      first.filter((s) => s >= '2025-01-15T00:00:00.000Z' && s < '2025-02-01T00:00:00.000Z'),
    )
  })

  it('keeps all-day durations in days', () => {
    const allDay = base('2025-01-06T00:00:00Z', '2025-01-07T00:00:00Z', 'UTC', true)
    const [, second] = [...expandOccurrences(allDay, parseRecurrenceRule('FREQ=WEEKLY;COUNT=2'), year)]
    expect(second.start.toISOString()).toBe('2025-01-13T00:00:00.000Z')
    expect(second.end.toISOString()).toBe('2025-01-14T00:00:00.000Z')
  })
})

// -------------------------------------------------------------------
// Series helpers
// -------------------------------------------------------------------

describe('series helpers', () => {
  const monday = base('2025-01-06T15:00:00Z', '2025-01-06T16:00:00Z')
  const weekly = parseRecurrenceRule('FREQ=WEEKLY;COUNT=10')

  it('recognises generated starts', () => {
    expect(isOccurrence(monday, weekly, utc('2025-01-13T15:00:00Z'))).toBe(true)
    expect(isOccurrence(monday, weekly, utc('2025-01-13T16:00:00Z'))).toBe(false)
    expect(isOccurrence(monday, weekly, utc('2025-01-06T15:00:00Z'))).toBe(true)
  })

  it('truncates a COUNT rule into an UNTIL before the split', () => {
    const split = utc('2025-01-20T15:00:00Z')
    const truncated = truncateRuleBefore(weekly, monday, split)
    expect(truncated.count).toBeUndefined()
    expect(truncated.until).toEqual({ kind: 'datetime', instant: utc('2025-01-20T14:59:59Z') })
    expect(
      [...expandOccurrences(monday, truncated, window('2025-01-01T00:00:00Z', '2026-01-01T00:00:00Z'))].map((o) =>
        o.start.toISOString(),
      ),
    ).toEqual(['2025-01-06T15:00:00.000Z', '2025-01-13T15:00:00.000Z'])
    expect(countOccurrencesBefore(monday, weekly, split)).toBe(2)
    expect(remainingCount(weekly, monday, split)).toBe(8)
    expect(remainingCount(parseRecurrenceRule('FREQ=WEEKLY'), monday, split)).toBeUndefined()
  })

  it('truncates all-day series with a date UNTIL', () => {
    const allDay = base('2025-01-06T00:00:00Z', '2025-01-07T00:00:00Z', 'UTC', true)
    const truncated = truncateRuleBefore(parseRecurrenceRule('FREQ=DAILY'), allDay, utc('2025-01-09T00:00:00Z'))
    expect(truncated.until).toEqual({ kind: 'date', date: '2025-01-08' })
    expect(
      [...expandOccurrences(allDay, truncated, window('2025-01-01T00:00:00Z', '2025-02-01T00:00:00Z'))],
    ).toHaveLength(3)
  })
})

describe('expandSeries', () => {
  const monday = base('2025-01-06T15:00:00Z', '2025-01-06T16:00:00Z')
  const rule = parseRecurrenceRule('FREQ=WEEKLY;COUNT=4')

  it('replaces moved occurrences, drops cancelled ones and ignores orphans', () => {
    const result = expandSeries(
      monday,
      rule,
      [
        {
          id: 'evt-moved',
          originalStart: utc('2025-01-13T15:00:00Z'),
          start: utc('2025-01-14T18:00:00Z'),
          end: utc('2025-01-14T19:00:00Z'),
          cancelled: false,
        },
        {
          id: 'evt-cancelled',
          originalStart: utc('2025-01-20T15:00:00Z'),
          start: utc('2025-01-20T15:00:00Z'),
          end: utc('2025-01-20T16:00:00Z'),
          cancelled: true,
        },
        {
          id: 'evt-orphan',
          originalStart: utc('2025-01-15T15:00:00Z'),
          start: utc('2025-01-16T15:00:00Z'),
          end: utc('2025-01-16T16:00:00Z'),
          cancelled: false,
        },
      ],
      window('2025-01-01T00:00:00Z', '2025-02-01T00:00:00Z'),
    )

    expect(result.map((o) => [o.kind, o.start.toISOString()])).toEqual([
      ['generated', '2025-01-06T15:00:00.000Z'],
      ['exception', '2025-01-14T18:00:00.000Z'],
      ['generated', '2025-01-27T15:00:00.000Z'],
    ])
  })

  it('emits a moved exception at its new time even when its original slot is outside the window', () => {
    const result = expandSeries(
      monday,
      rule,
      [
        {
          id: 'evt-moved',
          originalStart: utc('2025-01-13T15:00:00Z'),
          start: utc('2025-01-21T10:00:00Z'),
          end: utc('2025-01-21T11:00:00Z'),
          cancelled: false,
        },
      ],
      window('2025-01-21T00:00:00Z', '2025-01-22T00:00:00Z'),
    )
    expect(result).toEqual([
      {
        kind: 'exception',
        exceptionId: 'evt-moved',
        originalStart: utc('2025-01-13T15:00:00Z'),
        start: utc('2025-01-21T10:00:00Z'),
        end: utc('2025-01-21T11:00:00Z'),
      },
    ])
  })

  it('orders equal starts generated first, then exceptions by id', () => {
    const result = expandSeries(
      monday,
      rule,
      [
        {
          id: 'evt-b',
          originalStart: utc('2025-01-13T15:00:00Z'),
          start: utc('2025-01-20T15:00:00Z'),
          end: utc('2025-01-20T16:00:00Z'),
          cancelled: false,
        },
        {
          id: 'evt-a',
          originalStart: utc('2025-01-27T15:00:00Z'),
          start: utc('2025-01-20T15:00:00Z'),
          end: utc('2025-01-20T16:00:00Z'),
          cancelled: false,
        },
      ],
      window('2025-01-20T00:00:00Z', '2025-01-21T00:00:00Z'),
    )
    expect(result.map((o) => (o.kind === 'exception' ? o.exceptionId : o.kind))).toEqual([
      'generated',
      'evt-a',
      'evt-b',
    ])
  })
})
