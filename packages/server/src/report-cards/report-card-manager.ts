/**
 * Report Cards
 *
 * A card holds per-subject entries; the average and overall grade are
 * computed on read. A final card is read-only until it is moved back to
 * draft.
 */

import { ulid } from "ulid";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  averageScore,
  buildPageMeta,
  letterGrade,
  pageOffset,
  type CreateEntryInput,
  type CreateReportCardInput,
  type ListReportCardsQuery,
  type Page,
  type ReportCardStatus,
  type UpdateEntryInput,
  type UpdateReportCardInput,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { assertOwned, nowIso, updateSet } from "../db/helpers.js";

export interface ReportCardEntry {
  id: string;
  reportCardId: string;
  subjectId: string | null;
  subjectName: string;
  score: number | null;
  grade: string | null;
  comments: string | null;
  sortOrder: number;
}

export interface ReportCard {
  id: string;
  teacherId: string;
  studentId: string;
  title: string;
  schoolYear: string;
  periodStart: string | null;
  periodEnd: string | null;
  status: ReportCardStatus;
  overallComments: string | null;
  daysPresent: number | null;
  daysAbsent: number | null;
  entries: ReportCardEntry[];
  averageScore: number | null;
  overallGrade: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Counts distinct attended and missed days for a student in a date range */
export type AttendanceCounter = (studentId: string, from: string, to: string) => { present: number; absent: number };

interface ReportCardRow {
  id: string;
  teacher_id: string;
  student_id: string;
  title: string;
  school_year: string;
  period_start: string | null;
  period_end: string | null;
  status: ReportCardStatus;
  overall_comments: string | null;
  days_present: number | null;
  days_absent: number | null;
  created_at: string;
  updated_at: string;
}

interface EntryRow {
  id: string;
  report_card_id: string;
  subject_id: string | null;
  subject_name: string;
  score: number | null;
  grade: string | null;
  comments: string | null;
  sort_order: number;
}

const CARD_COLUMNS = [
  "title",
  "school_year",
  "period_start",
  "period_end",
  "status",
  "overall_comments",
  "days_present",
  "days_absent",
] as const;

function rowToEntry(row: EntryRow): ReportCardEntry {
  return {
    id: row.id,
    reportCardId: row.report_card_id,
    subjectId: row.subject_id,
    subjectName: row.subject_name,
    score: row.score,
    grade: row.grade,
    comments: row.comments,
    sortOrder: row.sort_order,
  };
}

export class ReportCardManager {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  list(teacherId: string, query: ListReportCardsQuery): Page<ReportCard> {
    const where = ["teacher_id = ?"];
    const params: unknown[] = [teacherId];
    if (query.student_id) {
      where.push("student_id = ?");
      params.push(query.student_id);
    }
    if (query.school_year) {
      where.push("school_year = ?");
      params.push(query.school_year);
    }
    if (query.status) {
      where.push("status = ?");
      params.push(query.status);
    }
    const whereSql = where.join(" AND ");
    const total =
      this.db
        .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM report_cards WHERE ${whereSql}`)
        .get(...params)?.n ?? 0;
    const rows = this.db
      .prepare<unknown[], ReportCardRow>(
        `SELECT * FROM report_cards WHERE ${whereSql}
         ORDER BY school_year DESC, period_start IS NULL, period_start DESC, created_at DESC
         LIMIT ? OFFSET ?`,
      )
      .all(...params, query.limit, pageOffset(query));
    return { items: rows.map((row) => this.rowToCard(row)), meta: buildPageMeta(query, total) };
  }

  get(teacherId: string, id: string): ReportCard {
    const row = this.db
      .prepare<[string, string], ReportCardRow>("SELECT * FROM report_cards WHERE id = ? AND teacher_id = ?")
      .get(id, teacherId);
    if (!row) throw new NotFoundError("Report card");
    return this.rowToCard(row);
  }

  create(teacherId: string, input: CreateReportCardInput): ReportCard {
    assertOwned(this.db, "students", teacherId, input.student_id, "student_id", "Student");
    input.entries.forEach((entry, index) =>
      assertOwned(this.db, "subjects", teacherId, entry.subject_id, `entries.${index}.subject_id`, "Subject"),
    );

    const id = `rpc-${ulid()}`;
    const insert = this.db.transaction(() => {
      const now = nowIso();
      this.db
        .prepare(
          `INSERT INTO report_cards (
            id, teacher_id, student_id, title, school_year, period_start, period_end, status,
            overall_comments, days_present, days_absent, created_at, updated_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          id,
          teacherId,
          input.student_id,
          input.title,
          input.school_year,
          input.period_start ?? null,
          input.period_end ?? null,
          input.status,
          input.overall_comments ?? null,
          input.days_present ?? null,
          input.days_absent ?? null,
          now,
          now,
        );
      input.entries.forEach((entry, index) => this.insertEntry(teacherId, id, entry, index));
    });
    insert();
    return this.get(teacherId, id);
  }

  update(teacherId: string, id: string, input: UpdateReportCardInput): ReportCard {
    const card = this.get(teacherId, id);
    if (card.status === "final") {
      const keys = Object.keys(input).filter((key) => key !== "status");
      if (keys.length > 0 || input.status !== "draft") {
        throw new ConflictError("Report card is final; set status to draft before editing");
      }
    }

    const periodStart = input.period_start !== undefined ? input.period_start : card.periodStart;
    const periodEnd = input.period_end !== undefined ? input.period_end : card.periodEnd;
    if (periodStart && periodEnd && periodEnd < periodStart) {
      throw ValidationError.field("period_end", "Period end must not be before period start");
    }

    const { sets, values } = updateSet(input, CARD_COLUMNS);
    if (sets.length > 0) {
      this.db
        .prepare(`UPDATE report_cards SET ${sets.join(", ")}, updated_at = ? WHERE id = ? AND teacher_id = ?`)
        .run(...values, nowIso(), id, teacherId);
    }
    return this.get(teacherId, id);
  }

  delete(teacherId: string, id: string): void {
    const card = this.get(teacherId, id);
    this.db.prepare("DELETE FROM report_cards WHERE id = ?").run(card.id);
  }

  addEntry(teacherId: string, cardId: string, input: CreateEntryInput): ReportCard {
    const card = this.editable(teacherId, cardId);
    assertOwned(this.db, "subjects", teacherId, input.subject_id, "subject_id", "Subject");
    const add = this.db.transaction(() => {
      this.insertEntry(teacherId, card.id, input, card.entries.length);
      this.touch(card.id);
    });
    add();
    return this.get(teacherId, cardId);
  }

  updateEntry(teacherId: string, cardId: string, entryId: string, input: UpdateEntryInput): ReportCard {
    const card = this.editable(teacherId, cardId);
    const entry = card.entries.find((e) => e.id === entryId);
    if (!entry) throw new NotFoundError("Report card entry");
    assertOwned(this.db, "subjects", teacherId, input.subject_id, "subject_id", "Subject");

    const subjectId = input.subject_id !== undefined ? input.subject_id : entry.subjectId;
    let subjectName = input.subject_name ?? entry.subjectName;
    if (input.subject_name === undefined && input.subject_id) {
      subjectName = this.subjectName(teacherId, input.subject_id) ?? subjectName;
    }
    const score = input.score !== undefined ? input.score : entry.score;
    let grade = input.grade !== undefined ? input.grade : entry.grade;
    if (input.grade === undefined && input.score !== undefined) {
      grade = score !== null ? letterGrade(score) : null;
    }

    const write = this.db.transaction(() => {
      this.db
        .prepare(
          `UPDATE report_card_entries SET
            subject_id = ?, subject_name = ?, score = ?, grade = ?, comments = ?, sort_order = ?, updated_at = ?
           WHERE id = ?`,
        )
        .run(
          subjectId,
          subjectName,
          score,
          grade,
          input.comments !== undefined ? input.comments : entry.comments,
          input.sort_order ?? entry.sortOrder,
          nowIso(),
          entry.id,
        );
      this.touch(card.id);
    });
    write();
    return this.get(teacherId, cardId);
  }

  deleteEntry(teacherId: string, cardId: string, entryId: string): void {
    const card = this.editable(teacherId, cardId);
    if (!card.entries.some((e) => e.id === entryId)) throw new NotFoundError("Report card entry");
    this.db.prepare("DELETE FROM report_card_entries WHERE id = ?").run(entryId);
    this.touch(card.id);
  }

  /**
   * Fill days_present/days_absent from recorded attendance in the card's period
   */
  syncAttendance(teacherId: string, id: string, countDays: AttendanceCounter): ReportCard {
    const card = this.editable(teacherId, id);
    if (!card.periodStart || !card.periodEnd) {
      throw ValidationError.field("period_start", "Set period_start and period_end before syncing attendance");
    }
    const counts = countDays(card.studentId, card.periodStart, card.periodEnd);
    this.db
      .prepare("UPDATE report_cards SET days_present = ?, days_absent = ?, updated_at = ? WHERE id = ?")
      .run(counts.present, counts.absent, nowIso(), card.id);
    return this.get(teacherId, id);
  }

  private editable(teacherId: string, id: string): ReportCard {
    const card = this.get(teacherId, id);
    if (card.status === "final") {
      throw new ConflictError("Report card is final; set status to draft before editing");
    }
    return card;
  }

  private insertEntry(teacherId: string, cardId: string, entry: CreateEntryInput, index: number): void {
    const subjectName =
      entry.subject_name ?? (entry.subject_id ? this.subjectName(teacherId, entry.subject_id) : null);
    if (!subjectName) {
      throw ValidationError.field("subject_name", "Either subject_id or subject_name is required");
    }
    const score = entry.score ?? null;
    const now = nowIso();
    this.db
      .prepare(
        `INSERT INTO report_card_entries (
          id, report_card_id, subject_id, subject_name, score, grade, comments, sort_order, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        `rce-${ulid()}`,
        cardId,
        entry.subject_id ?? null,
        subjectName,
        score,
        entry.grade ?? (score !== null ? letterGrade(score) : null),
        entry.comments ?? null,
        entry.sort_order ?? index,
        now,
        now,
      );
  }

  private subjectName(teacherId: string, subjectId: string): string | null {
    return (
      this.db
        .prepare<[string, string], { name: string }>("SELECT name FROM subjects WHERE id = ? AND teacher_id = ?")
        .get(subjectId, teacherId)?.name ?? null
    );
  }

  private touch(cardId: string): void {
    this.db.prepare("UPDATE report_cards SET updated_at = ? WHERE id = ?").run(nowIso(), cardId);
  }

  private rowToCard(row: ReportCardRow): ReportCard {
    const entries = this.db
      .prepare<[string], EntryRow>(
        "SELECT * FROM report_card_entries WHERE report_card_id = ? ORDER BY sort_order, created_at, id",
      )
      .all(row.id)
      .map(rowToEntry);
    const average = averageScore(entries.map((e) => e.score));
    return {
      id: row.id,
      teacherId: row.teacher_id,
      studentId: row.student_id,
      title: row.title,
      schoolYear: row.school_year,
      periodStart: row.period_start,
      periodEnd: row.period_end,
      status: row.status,
      overallComments: row.overall_comments,
      daysPresent: row.days_present,
      daysAbsent: row.days_absent,
      entries,
      averageScore: average,
      overallGrade: average !== null ? letterGrade(average) : null,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
