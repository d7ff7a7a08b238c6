/**
 * Attendance per event occurrence.
 *
 * Records are keyed by (event, student, occurrence_date). For a series the
 * date must be a day the series actually occurs on in the event's zone.
 */

import { DateTime } from "luxon";
import { ulid } from "ulid";
import {
  ValidationError,
  expandSeries,
  parseRecurrenceRule,
  type AttendanceStatus,
  type RecordAttendanceInput,
  type SeriesException,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { assertOwned, nowIso } from "../db/helpers.js";
import { localDate, type CalendarEvent, type EventManager } from "./event-manager.js";

export interface AttendanceRecord {
  id: string;
  eventId: string;
  studentId: string;
  studentName: string;
  occurrenceDate: string;
  status: AttendanceStatus;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface StudentAttendanceRecord extends AttendanceRecord {
  eventTitle: string;
}

export type AttendanceSummary = Record<AttendanceStatus, number> & { total: number };

interface AttendanceRow {
  id: string;
  event_id: string;
  student_id: string;
  first_name: string;
  last_name: string;
  occurrence_date: string;
  status: AttendanceStatus;
  notes: string | null;
  created_at: string;
  updated_at: string;
}

interface StudentAttendanceRow extends AttendanceRow {
  event_title: string;
}

function rowToRecord(row: AttendanceRow): AttendanceRecord {
  return {
    id: row.id,
    eventId: row.event_id,
    studentId: row.student_id,
    studentName: `${row.first_name} ${row.last_name}`,
    occurrenceDate: row.occurrence_date,
    status: row.status,
    notes: row.notes,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export class AttendanceManager {
  private db: Db;
  private events: EventManager;

  constructor(db: Db, events: EventManager) {
    this.db = db;
    this.events = events;
  }

  /**
   * Upsert records for one occurrence and return every record of that day
   */
  record(teacherId: string, eventId: string, input: RecordAttendanceInput): AttendanceRecord[] {
    const event = this.events.get(teacherId, eventId);
    const occurrenceDate = this.resolveOccurrenceDate(event, input.occurrence_date);
    input.records.forEach((record, index) =>
      assertOwned(this.db, "students", teacherId, record.student_id, `records.${index}.student_id`, "Student"),
    );

    const upsert = this.db.prepare(
      `INSERT INTO attendance (id, teacher_id, event_id, student_id, occurrence_date, status, notes, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (event_id, student_id, occurrence_date)
       DO UPDATE SET status = excluded.status, notes = excluded.notes, updated_at = excluded.updated_at`,
    );
    const write = this.db.transaction(() => {
      const now = nowIso();
      for (const record of input.records) {
        upsert.run(
          `atd-${ulid()}`,
          teacherId,
          event.id,
          record.student_id,
          occurrenceDate,
          record.status,
          record.notes ?? null,
          now,
          now,
        );
      }
    });
    write();
    return this.list(teacherId, event.id, occurrenceDate);
  }

  list(teacherId: string, eventId: string, occurrenceDate?: string): AttendanceRecord[] {
    const event = this.events.get(teacherId, eventId);
    const where = ["a.event_id = ?"];
    const params: unknown[] = [event.id];
    if (occurrenceDate) {
      where.push("a.occurrence_date = ?");
      params.push(occurrenceDate);
    }
    return this.db
      .prepare<unknown[], AttendanceRow>(
        `SELECT a.*, s.first_name, s.last_name
         FROM attendance a JOIN students s ON s.id = a.student_id
         WHERE ${where.join(" AND ")}
         ORDER BY a.occurrence_date, s.last_name COLLATE NOCASE, s.first_name COLLATE NOCASE`,
      )
      .all(...params)
      .map(rowToRecord);
  }

  /**
   * A student's history with per-status counts; `from`/`to` are inclusive dates
   */
  forStudent(
    teacherId: string,
    studentId: string,
    range: { from?: string; to?: string },
  ): { records: StudentAttendanceRecord[]; summary: AttendanceSummary } {
    const where = ["a.teacher_id = ?", "a.student_id = ?"];
    const params: unknown[] = [teacherId, studentId];
    if (range.from) {
      where.push("a.occurrence_date >= ?");
      params.push(range.from);
    }
    if (range.to) {
      where.push("a.occurrence_date <= ?");
      params.push(range.to);
    }
    const records = this.db
      .prepare<unknown[], StudentAttendanceRow>(
        `SELECT a.*, s.first_name, s.last_name, e.title AS event_title
         FROM attendance a
         JOIN students s ON s.id = a.student_id
         JOIN events e ON e.id = a.event_id
         WHERE ${where.join(" AND ")}
         ORDER BY a.occurrence_date, e.start_time`,
      )
      .all(...params)
      .map((row) => ({ ...rowToRecord(row), eventTitle: row.event_title }));

    const summary: AttendanceSummary = { present: 0, absent: 0, excused: 0, late: 0, total: records.length };
    for (const record of records) {
      summary[record.status]++;
    }
    return { records, summary };
  }

  /**
   * Distinct days present (present or late) and absent within [from, to]
   */
  countDays(studentId: string, from: string, to: string): { present: number; absent: number } {
    const count = (statuses: AttendanceStatus[]): number => {
      const placeholders = statuses.map(() => "?").join(", ");
      return (
        this.db
          .prepare<unknown[], { n: number }>(
            `SELECT COUNT(DISTINCT occurrence_date) AS n FROM attendance
             WHERE student_id = ? AND occurrence_date >= ? AND occurrence_date <= ?
               AND status IN (${placeholders})`,
          )
          .get(studentId, from, to, ...statuses)?.n ?? 0
      );
    };
    return { present: count(["present", "late"]), absent: count(["absent"]) };
  }

  private resolveOccurrenceDate(event: CalendarEvent, requested: string | undefined): string {
    if (!event.recurrenceRule) {
      const first = localDate(event.startTime, event.timezone);
      const last = localDate(event.endTime, event.timezone);
      if (requested === undefined) return first;
      if (requested < first || requested > last) {
        throw ValidationError.field("occurrence_date", "Event does not take place on this date");
      }
      return requested;
    }

    if (requested === undefined) {
      throw ValidationError.field("occurrence_date", "Required for a recurring event");
    }
    const day = DateTime.fromISO(requested, { zone: event.timezone });
    const window = { from: day.startOf("day").toJSDate(), to: day.plus({ days: 1 }).startOf("day").toJSDate() };
    const exceptions: SeriesException[] = this.db
      .prepare<[string], { id: string; original_start_time: string; start_time: string; end_time: string; is_cancelled: number }>(
        "SELECT id, original_start_time, start_time, end_time, is_cancelled FROM events WHERE parent_event_id = ?",
      )
      .all(event.id)
      .map((row) => ({
        id: row.id,
        originalStart: new Date(row.original_start_time),
        start: new Date(row.start_time),
        end: new Date(row.end_time),
        cancelled: row.is_cancelled === 1,
      }));
    const base = { start: event.startTime, end: event.endTime, allDay: event.allDay, timezone: event.timezone };
    const occurrences = expandSeries(base, parseRecurrenceRule(event.recurrenceRule), exceptions, window);
    if (!occurrences.some((o) => localDate(o.start, event.timezone) === requested)) {
      throw ValidationError.field("occurrence_date", "The series has no occurrence on this date");
    }
    return requested;
  }
}
