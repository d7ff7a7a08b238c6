/**
 * Calendar Events
 *
 * Single events, recurring series and their exceptions. A series stores its
 * rule on the base row; occurrences are expanded on read and never persisted.
 * An exception is its own row pointing at the series through
 * `parent_event_id` + `original_start_time`; a cancelled exception hides its
 * slot.
 */

import { DateTime } from "luxon";
import { ulid } from "ulid";
import {
  NotFoundError,
  ValidationError,
  buildPageMeta,
  expandSeries,
  formatRecurrenceRule,
  isOccurrence,
  pageOffset,
  parseRecurrenceRule,
  remainingCount,
  truncateRuleBefore,
  validateRecurrenceRule,
  type CreateEventInput,
  type ListEventsQuery,
  type Page,
  type RecurrenceRule,
  type RecurringEditMode,
  type SeriesBase,
  type SeriesException,
  type TimeWindow,
  type UpdateEventInput,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { assertOwned, nowIso } from "../db/helpers.js";

export interface CalendarEvent {
  id: string;
  teacherId: string;
  title: string;
  description: string | null;
  location: string | null;
  eventTypeId: string | null;
  subjectId: string | null;
  startTime: Date;
  endTime: Date;
  allDay: boolean;
  timezone: string;
  recurrenceRule: string | null;
  parentEventId: string | null;
  originalStartTime: Date | null;
  isCancelled: boolean;
  studentIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface EventOccurrence {
  eventId: string;
  seriesId: string | null;
  title: string;
  description: string | null;
  location: string | null;
  eventTypeId: string | null;
  subjectId: string | null;
  start: Date;
  end: Date;
  allDay: boolean;
  timezone: string;
  isException: boolean;
  recurrenceRule: string | null;
  studentIds: string[];
}

export interface EventFilters {
  studentId?: string;
  eventTypeId?: string;
  subjectId?: string;
}

interface EventRow {
  id: string;
  teacher_id: string;
  title: string;
  description: string | null;
  location: string | null;
  event_type_id: string | null;
  subject_id: string | null;
  start_time: string;
  end_time: string;
  all_day: number;
  timezone: string;
  recurrence_rule: string | null;
  parent_event_id: string | null;
  original_start_time: string | null;
  is_cancelled: number;
  created_at: string;
  updated_at: string;
}

/** Column values of an event row that edits can change */
interface EventFields {
  title: string;
  description: string | null;
  location: string | null;
  eventTypeId: string | null;
  subjectId: string | null;
  startTime: Date;
  endTime: Date;
  allDay: boolean;
  timezone: string;
  recurrenceRule: string | null;
  studentIds: string[];
}

/** Calendar date of `instant` in `zone`, as attendance records it */
export function localDate(instant: Date, zone: string): string {
  return DateTime.fromJSDate(instant, { zone }).toISODate() ?? "";
}

function seriesBase(event: Pick<CalendarEvent, "startTime" | "endTime" | "allDay" | "timezone">): SeriesBase {
  return { start: event.startTime, end: event.endTime, allDay: event.allDay, timezone: event.timezone };
}

function filterClauses(filters: EventFilters): { where: string[]; params: unknown[] } {
  const where: string[] = [];
  const params: unknown[] = [];
  if (filters.studentId) {
    where.push("id IN (SELECT event_id FROM event_students WHERE student_id = ?)");
    params.push(filters.studentId);
  }
  if (filters.eventTypeId) {
    where.push("event_type_id = ?");
    params.push(filters.eventTypeId);
  }
  if (filters.subjectId) {
    where.push("subject_id = ?");
    params.push(filters.subjectId);
  }
  return { where, params };
}

function matchesFilters(
  event: Pick<CalendarEvent, "studentIds" | "eventTypeId" | "subjectId">,
  filters: EventFilters,
): boolean {
  if (filters.studentId && !event.studentIds.includes(filters.studentId)) return false;
  if (filters.eventTypeId && event.eventTypeId !== filters.eventTypeId) return false;
  if (filters.subjectId && event.subjectId !== filters.subjectId) return false;
  return true;
}

function compareOccurrences(a: EventOccurrence, b: EventOccurrence): number {
  const diff = a.start.getTime() - b.start.getTime();
  if (diff !== 0) return diff;
  return a.eventId < b.eventId ? -1 : a.eventId > b.eventId ? 1 : 0;
}

export class EventManager {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  // ─────────────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────────────

  findById(teacherId: string, id: string): CalendarEvent | null {
    const row = this.db
      .prepare<[string, string], EventRow>("SELECT * FROM events WHERE id = ? AND teacher_id = ?")
      .get(id, teacherId);
    return row ? this.rowToEvent(row) : null;
  }

  get(teacherId: string, id: string): CalendarEvent {
    const event = this.findById(teacherId, id);
    if (!event) throw new NotFoundError("Event");
    return event;
  }

  /**
   * Base rows (single events and series, not exceptions), paginated by start
   */
  listBase(teacherId: string, query: ListEventsQuery): Page<CalendarEvent> {
    const filters = filterClauses({
      studentId: query.student_id,
      eventTypeId: query.event_type_id,
      subjectId: query.subject_id,
    });
    const where = ["teacher_id = ?", "parent_event_id IS NULL", ...filters.where];
    const params: unknown[] = [teacherId, ...filters.params];
    if (query.from) {
      where.push("(recurrence_rule IS NOT NULL OR end_time >= ?)");
      params.push(query.from.toISOString());
    }
    if (query.to) {
      where.push("start_time < ?");
      params.push(query.to.toISOString());
    }
    const whereSql = where.join(" AND ");
    const total =
      this.db.prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM events WHERE ${whereSql}`).get(...params)
        ?.n ?? 0;
    const rows = this.db
      .prepare<unknown[], EventRow>(
        `SELECT * FROM events WHERE ${whereSql} ORDER BY start_time, id LIMIT ? OFFSET ?`,
      )
      .all(...params, query.limit, pageOffset(query));
    return { items: rows.map((row) => this.rowToEvent(row)), meta: buildPageMeta(query, total) };
  }

  /**
   * Every occurrence in `window`: single events, expanded series and their
   * live exceptions, ordered by start then event id. Filters apply to each
   * occurrence as edited, so an exception can match when its series does not.
   */
  expandWindow(teacherId: string, window: TimeWindow, filters: EventFilters = {}): EventOccurrence[] {
    const clauses = filterClauses(filters);
    const extra = clauses.where.length > 0 ? ` AND ${clauses.where.join(" AND ")}` : "";
    const fromIso = window.from.toISOString();
    const toIso = window.to.toISOString();

    const singles = this.db
      .prepare<unknown[], EventRow>(
        `SELECT * FROM events
         WHERE teacher_id = ? AND parent_event_id IS NULL AND recurrence_rule IS NULL
           AND start_time < ?
           AND (end_time > ? OR (end_time = start_time AND start_time >= ?))${extra}`,
      )
      .all(teacherId, toIso, fromIso, fromIso, ...clauses.params)
      .map((row) => this.rowToEvent(row));

    // A series starting after the window can still have an exception moved into it
    const series = this.db
      .prepare<unknown[], EventRow>(
        `SELECT * FROM events
         WHERE teacher_id = ? AND parent_event_id IS NULL AND recurrence_rule IS NOT NULL
           AND (start_time < ? OR id IN (
             SELECT parent_event_id FROM events
             WHERE teacher_id = ? AND parent_event_id IS NOT NULL AND is_cancelled = 0
               AND start_time < ? AND (end_time > ? OR (end_time = start_time AND start_time >= ?))
           ))`,
      )
      .all(teacherId, toIso, teacherId, toIso, fromIso, fromIso)
      .map((row) => this.rowToEvent(row));

    const result: EventOccurrence[] = singles.map((event) =>
      this.toOccurrence(event, event.startTime, event.endTime, null),
    );
    for (const s of series) {
      const occurrences = this.expandOne(s, this.exceptionsOf(s.id), window);
      result.push(...occurrences.filter((o) => matchesFilters(o, filters)));
    }
    return result.sort(compareOccurrences);
  }

  /**
   * Occurrences of one event inside `window`, capped at `limit`
   */
  occurrencesOf(teacherId: string, id: string, window: TimeWindow, limit: number): EventOccurrence[] {
    const event = this.get(teacherId, id);
    if (!event.recurrenceRule) {
      const inWindow =
        !event.isCancelled &&
        event.startTime.getTime() < window.to.getTime() &&
        (event.endTime.getTime() > window.from.getTime() ||
          (event.endTime.getTime() === event.startTime.getTime() && event.startTime.getTime() >= window.from.getTime()));
      return inWindow
        ? [this.toOccurrence(event, event.startTime, event.endTime, event.parentEventId ? event : null)]
        : [];
    }
    return this.expandOne(event, this.exceptionsOf(event.id), window).sort(compareOccurrences).slice(0, limit);
  }

  // ─────────────────────────────────────────────────────────────────
  // Writes
  // ─────────────────────────────────────────────────────────────────

  create(teacherId: string, input: CreateEventInput, defaultTimezone: string): CalendarEvent {
    this.assertReferences(teacherId, input);
    const fields: EventFields = {
      title: input.title,
      description: input.description ?? null,
      location: input.location ?? null,
      eventTypeId: input.event_type_id ?? null,
      subjectId: input.subject_id ?? null,
      startTime: input.start_time,
      endTime: input.end_time,
      allDay: input.all_day,
      timezone: input.timezone ?? defaultTimezone,
      recurrenceRule: null,
      studentIds: input.student_ids,
    };
    fields.recurrenceRule = this.normalizeRule(input.recurrence_rule ?? null, fields);

    const insert = this.db.transaction(() => this.insertEvent(teacherId, fields, null, null));
    return this.get(teacherId, insert());
  }

  /**
   * Apply an edit. For a series, `scope` picks the occurrence, the rest of the
   * series from an occurrence, or the whole series. Returns the row that now
   * carries the edit (the exception or the new series for scoped edits).
   */
  update(
    teacherId: string,
    id: string,
    input: UpdateEventInput,
    scope: RecurringEditMode,
    occurrenceStart?: Date,
  ): CalendarEvent {
    const event = this.get(teacherId, id);
    this.assertReferences(teacherId, input);

    if (!event.recurrenceRule || scope === "all") {
      return this.updateRow(event, input);
    }

    const occurrence = this.requireOccurrence(event, occurrenceStart);
    if (scope === "this") {
      if (input.recurrence_rule !== undefined) {
        throw ValidationError.field("recurrence_rule", "A single occurrence cannot have its own recurrence rule");
      }
      return this.upsertException(event, occurrence, input, false);
    }

    if (occurrence.getTime() === event.startTime.getTime()) {
      return this.updateRow(event, input);
    }
    return this.splitSeries(event, occurrence, input);
  }

  delete(teacherId: string, id: string, scope: RecurringEditMode, occurrenceStart?: Date): void {
    const event = this.get(teacherId, id);

    if (!event.recurrenceRule) {
      if (event.parentEventId) {
        const parent = this.findById(teacherId, event.parentEventId);
        const cancel = this.db.transaction(() => {
          this.db
            .prepare("UPDATE events SET is_cancelled = 1, updated_at = ? WHERE id = ?")
            .run(nowIso(), event.id);
          this.db.prepare("DELETE FROM attendance WHERE event_id = ?").run(event.id);
          if (parent) this.dropAttendance(parent, event.startTime, false);
        });
        cancel();
      } else {
        this.db.prepare("DELETE FROM events WHERE id = ?").run(event.id);
      }
      return;
    }

    if (scope === "all") {
      this.db.prepare("DELETE FROM events WHERE id = ?").run(event.id);
      return;
    }

    const occurrence = this.requireOccurrence(event, occurrenceStart);
    if (scope === "this") {
      const existing = this.exceptionAt(event.id, occurrence);
      const cancel = this.db.transaction(() => {
        this.upsertException(event, occurrence, {}, true);
        this.dropAttendance(event, existing?.startTime ?? occurrence, false);
        if (existing) {
          this.db.prepare("DELETE FROM attendance WHERE event_id = ?").run(existing.id);
        }
      });
      cancel();
      return;
    }

    if (occurrence.getTime() === event.startTime.getTime()) {
      this.db.prepare("DELETE FROM events WHERE id = ?").run(event.id);
      return;
    }
    const truncate = this.db.transaction(() => {
      const rule = this.parseStoredRule(event);
      const truncated = truncateRuleBefore(rule, seriesBase(event), occurrence);
      this.db
        .prepare("UPDATE events SET recurrence_rule = ?, updated_at = ? WHERE id = ?")
        .run(formatRecurrenceRule(truncated), nowIso(), event.id);
      this.db
        .prepare("DELETE FROM events WHERE parent_event_id = ? AND original_start_time >= ?")
        .run(event.id, occurrence.toISOString());
      this.dropAttendance(event, occurrence, true);
    });
    truncate();
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private updateRow(event: CalendarEvent, input: UpdateEventInput): CalendarEvent {
    const fields = this.mergeFields(event, input);
    if (event.parentEventId) {
      if (input.recurrence_rule) {
        throw ValidationError.field("recurrence_rule", "A single occurrence cannot have its own recurrence rule");
      }
      fields.recurrenceRule = null;
    } else {
      const rule = input.recurrence_rule !== undefined ? input.recurrence_rule : event.recurrenceRule;
      fields.recurrenceRule = this.normalizeRule(rule, fields);
    }
    const write = this.db.transaction(() => this.writeFields(event.id, fields));
    write();
    return this.get(event.teacherId, event.id);
  }

  private upsertException(
    series: CalendarEvent,
    occurrence: Date,
    input: UpdateEventInput,
    cancelled: boolean,
  ): CalendarEvent {
    const existing = this.exceptionAt(series.id, occurrence);
    const durationMs = series.endTime.getTime() - series.startTime.getTime();

    const run = this.db.transaction((): string => {
      if (existing) {
        const fields = this.mergeFields(existing, input);
        fields.recurrenceRule = null;
        this.writeFields(existing.id, fields);
        this.db
          .prepare("UPDATE events SET is_cancelled = ? WHERE id = ?")
          .run(cancelled ? 1 : 0, existing.id);
        return existing.id;
      }

      const fields = this.mergeFields(
        { ...series, startTime: occurrence, endTime: new Date(occurrence.getTime() + durationMs) },
        input,
      );
      fields.recurrenceRule = null;
      const id = this.insertEvent(series.teacherId, fields, series.id, occurrence);
      if (cancelled) {
        this.db.prepare("UPDATE events SET is_cancelled = 1 WHERE id = ?").run(id);
      }
      return id;
    });
    return this.get(series.teacherId, run());
  }

  private splitSeries(series: CalendarEvent, occurrence: Date, input: UpdateEventInput): CalendarEvent {
    const rule = this.parseStoredRule(series);
    const base = seriesBase(series);
    const truncated = truncateRuleBefore(rule, base, occurrence);
    const remaining = remainingCount(rule, base, occurrence);
    const durationMs = series.endTime.getTime() - series.startTime.getTime();

    const fields = this.mergeFields(
      { ...series, startTime: occurrence, endTime: new Date(occurrence.getTime() + durationMs) },
      input,
    );
    let nextRule: string | null;
    if (input.recurrence_rule !== undefined) {
      nextRule = input.recurrence_rule;
    } else {
      const continued: RecurrenceRule = remaining !== undefined ? { ...rule, count: remaining } : rule;
      nextRule = formatRecurrenceRule(continued);
    }
    fields.recurrenceRule = this.normalizeRule(nextRule, fields);

    const run = this.db.transaction((): string => {
      this.db
        .prepare("UPDATE events SET recurrence_rule = ?, updated_at = ? WHERE id = ?")
        .run(formatRecurrenceRule(truncated), nowIso(), series.id);
      const id = this.insertEvent(series.teacherId, fields, null, null);
      if (fields.recurrenceRule) {
        this.db
          .prepare("UPDATE events SET parent_event_id = ? WHERE parent_event_id = ? AND original_start_time >= ?")
          .run(id, series.id, occurrence.toISOString());
        this.db
          .prepare("UPDATE attendance SET event_id = ? WHERE event_id = ? AND occurrence_date >= ?")
          .run(id, series.id, localDate(occurrence, series.timezone));
      } else {
        this.db
          .prepare("DELETE FROM events WHERE parent_event_id = ? AND original_start_time >= ?")
          .run(series.id, occurrence.toISOString());
        this.dropAttendance(series, occurrence, true);
      }
      return id;
    });
    return this.get(series.teacherId, run());
  }

  private requireOccurrence(series: CalendarEvent, occurrenceStart: Date | undefined): Date {
    if (!occurrenceStart) {
      throw ValidationError.field("occurrence_start", "Required for this scope");
    }
    if (!isOccurrence(seriesBase(series), this.parseStoredRule(series), occurrenceStart)) {
      throw ValidationError.field("occurrence_start", "Not an occurrence of this series");
    }
    return occurrenceStart;
  }

  /**
   * Parse, validate against the series start and canonicalize a rule
   */
  private normalizeRule(text: string | null, fields: EventFields): string | null {
    if (text === null || text.trim() === "") return null;
    const rule = parseRecurrenceRule(text);
    validateRecurrenceRule(rule, seriesBase(fields));
    return formatRecurrenceRule(rule);
  }

  private parseStoredRule(event: CalendarEvent): RecurrenceRule {
    if (!event.recurrenceRule) {
      throw new Error(`Event ${event.id} has no recurrence rule`);
    }
    return parseRecurrenceRule(event.recurrenceRule);
  }

  private mergeFields(event: CalendarEvent, input: UpdateEventInput): EventFields {
    const fields: EventFields = {
      title: input.title ?? event.title,
      description: input.description !== undefined ? input.description : event.description,
      location: input.location !== undefined ? input.location : event.location,
      eventTypeId: input.event_type_id !== undefined ? input.event_type_id : event.eventTypeId,
      subjectId: input.subject_id !== undefined ? input.subject_id : event.subjectId,
      startTime: input.start_time ?? event.startTime,
      endTime: input.end_time ?? event.endTime,
      allDay: input.all_day ?? event.allDay,
      timezone: input.timezone ?? event.timezone,
      recurrenceRule: event.recurrenceRule,
      studentIds: input.student_ids ?? event.studentIds,
    };
    if (fields.endTime.getTime() < fields.startTime.getTime()) {
      throw ValidationError.field("end_time", "End time must not be before start time");
    }
    return fields;
  }

  private assertReferences(teacherId: string, input: UpdateEventInput): void {
    assertOwned(this.db, "event_types", teacherId, input.event_type_id, "event_type_id", "Event type");
    assertOwned(this.db, "subjects", teacherId, input.subject_id, "subject_id", "Subject");
    input.student_ids?.forEach((studentId, index) =>
      assertOwned(this.db, "students", teacherId, studentId, `student_ids.${index}`, "Student"),
    );
  }

  private insertEvent(
    teacherId: string,
    fields: EventFields,
    parentEventId: string | null,
    originalStart: Date | null,
  ): string {
    const id = `evt-${ulid()}`;
    const now = nowIso();
    this.db
      .prepare(
        `INSERT INTO events (
          id, teacher_id, title, description, location, event_type_id, subject_id,
          start_time, end_time, all_day, timezone, recurrence_rule,
          parent_event_id, original_start_time, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        teacherId,
        fields.title,
        fields.description,
        fields.location,
        fields.eventTypeId,
        fields.subjectId,
        fields.startTime.toISOString(),
        fields.endTime.toISOString(),
        fields.allDay ? 1 : 0,
        fields.timezone,
        fields.recurrenceRule,
        parentEventId,
        originalStart?.toISOString() ?? null,
        now,
        now,
      );
    this.writeStudents(id, fields.studentIds);
    return id;
  }

  private writeFields(id: string, fields: EventFields): void {
    this.db
      .prepare(
        `UPDATE events SET
          title = ?, description = ?, location = ?, event_type_id = ?, subject_id = ?,
          start_time = ?, end_time = ?, all_day = ?, timezone = ?, recurrence_rule = ?,
          updated_at = ?
         WHERE id = ?`,
      )
      .run(
        fields.title,
        fields.description,
        fields.location,
        fields.eventTypeId,
        fields.subjectId,
        fields.startTime.toISOString(),
        fields.endTime.toISOString(),
        fields.allDay ? 1 : 0,
        fields.timezone,
        fields.recurrenceRule,
        nowIso(),
        id,
      );
    this.writeStudents(id, fields.studentIds);
  }

  private writeStudents(eventId: string, studentIds: string[]): void {
    this.db.prepare("DELETE FROM event_students WHERE event_id = ?").run(eventId);
    const insert = this.db.prepare("INSERT OR IGNORE INTO event_students (event_id, student_id) VALUES (?, ?)");
    for (const studentId of studentIds) {
      insert.run(eventId, studentId);
    }
  }

  private exceptionAt(seriesId: string, originalStart: Date): CalendarEvent | null {
    const row = this.db
      .prepare<[string, string], EventRow>(
        "SELECT * FROM events WHERE parent_event_id = ? AND original_start_time = ?",
      )
      .get(seriesId, originalStart.toISOString());
    return row ? this.rowToEvent(row) : null;
  }

  /**
   * Remove attendance taken on the local day of `start`, or on every day from
   * it when `onward`.
   */
  private dropAttendance(event: CalendarEvent, start: Date, onward: boolean): void {
    const operator = onward ? ">=" : "=";
    this.db
      .prepare(`DELETE FROM attendance WHERE event_id = ? AND occurrence_date ${operator} ?`)
      .run(event.id, localDate(start, event.timezone));
  }

  private exceptionsOf(seriesId: string): CalendarEvent[] {
    return this.db
      .prepare<[string], EventRow>("SELECT * FROM events WHERE parent_event_id = ? ORDER BY original_start_time")
      .all(seriesId)
      .map((row) => this.rowToEvent(row));
  }

  private expandOne(series: CalendarEvent, exceptions: CalendarEvent[], window: TimeWindow): EventOccurrence[] {
    const byId = new Map(exceptions.map((e) => [e.id, e]));
    const seriesExceptions: SeriesException[] = [];
    for (const e of exceptions) {
      if (!e.originalStartTime) continue;
      seriesExceptions.push({
        id: e.id,
        originalStart: e.originalStartTime,
        start: e.startTime,
        end: e.endTime,
        cancelled: e.isCancelled,
      });
    }

    return expandSeries(seriesBase(series), this.parseStoredRule(series), seriesExceptions, window).map(
      (occurrence) => {
        if (occurrence.kind === "generated") {
          return this.toOccurrence(series, occurrence.start, occurrence.end, series);
        }
        const exception = byId.get(occurrence.exceptionId) ?? series;
        return this.toOccurrence(exception, occurrence.start, occurrence.end, series);
      },
    );
  }

  private toOccurrence(
    event: CalendarEvent,
    start: Date,
    end: Date,
    series: CalendarEvent | null,
  ): EventOccurrence {
    const isException = event.parentEventId !== null;
    return {
      eventId: event.id,
      seriesId: isException ? event.parentEventId : series ? series.id : null,
      title: event.title,
      description: event.description,
      location: event.location,
      eventTypeId: event.eventTypeId,
      subjectId: event.subjectId,
      start,
      end,
      allDay: event.allDay,
      timezone: event.timezone,
      isException,
      recurrenceRule: isException ? null : event.recurrenceRule,
      studentIds: event.studentIds,
    };
  }

  private studentIdsOf(eventId: string): string[] {
    return this.db
      .prepare<[string], { student_id: string }>(
        "SELECT student_id FROM event_students WHERE event_id = ? ORDER BY student_id",
      )
      .all(eventId)
      .map((row) => row.student_id);
  }

  private rowToEvent(row: EventRow): CalendarEvent {
    return {
      id: row.id,
      teacherId: row.teacher_id,
      title: row.title,
      description: row.description,
      location: row.location,
      eventTypeId: row.event_type_id,
      subjectId: row.subject_id,
      startTime: new Date(row.start_time),
      endTime: new Date(row.end_time),
      allDay: row.all_day === 1,
      timezone: row.timezone,
      recurrenceRule: row.recurrence_rule,
      parentEventId: row.parent_event_id,
      originalStartTime: row.original_start_time ? new Date(row.original_start_time) : null,
      isCancelled: row.is_cancelled === 1,
      studentIds: this.studentIdsOf(row.id),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
