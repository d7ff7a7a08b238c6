/**
 * Assignments given to students.
 *
 * Scoring an assignment without an explicit status grades it; submitting it
 * stamps completed_at.
 */

import { ulid } from "ulid";
import {
  NotFoundError,
  ValidationError,
  buildPageMeta,
  letterGrade,
  pageOffset,
  type AssignmentStatus,
  type CreateAssignmentInput,
  type ListAssignmentsQuery,
  type Page,
  type UpdateAssignmentInput,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { assertOwned, nowIso } from "../db/helpers.js";
import type { Attachment, AttachmentManager } from "../attachments/attachment-manager.js";

export interface Assignment {
  id: string;
  teacherId: string;
  studentId: string;
  subjectId: string | null;
  title: string;
  description: string | null;
  assignedDate: string;
  dueDate: string | null;
  status: AssignmentStatus;
  maxScore: number | null;
  score: number | null;
  grade: string | null;
  feedback: string | null;
  completedAt: Date | null;
  attachments: Attachment[];
  createdAt: Date;
  updatedAt: Date;
}

interface AssignmentRow {
  id: string;
  teacher_id: string;
  student_id: string;
  subject_id: string | null;
  title: string;
  description: string | null;
  assigned_date: string;
  due_date: string | null;
  status: AssignmentStatus;
  max_score: number | null;
  score: number | null;
  grade: string | null;
  feedback: string | null;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
}

const SORT_COLUMNS: Record<ListAssignmentsQuery["sort"], string> = {
  due_date: "due_date",
  assigned_date: "assigned_date",
  title: "title COLLATE NOCASE",
  created_at: "created_at",
};

/** Letter for a score, scaled to 100 when a max score is set */
function derivedGrade(score: number | null, maxScore: number | null): string | null {
  if (score === null) return null;
  return letterGrade(maxScore ? (score / maxScore) * 100 : score);
}

export class AssignmentManager {
  private db: Db;
  private attachments: AttachmentManager;

  constructor(db: Db, attachments: AttachmentManager) {
    this.db = db;
    this.attachments = attachments;
  }

  /**
   * `today` is the teacher's local date, used by the overdue filter
   */
  list(teacherId: string, query: ListAssignmentsQuery, today: string): Page<Assignment> {
    const where = ["teacher_id = ?"];
    const params: unknown[] = [teacherId];
    if (query.student_id) {
      where.push("student_id = ?");
      params.push(query.student_id);
    }
    if (query.subject_id) {
      where.push("subject_id = ?");
      params.push(query.subject_id);
    }
    if (query.status) {
      where.push("status = ?");
      params.push(query.status);
    }
    if (query.due_from) {
      where.push("due_date >= ?");
      params.push(query.due_from);
    }
    if (query.due_to) {
      where.push("due_date <= ?");
      params.push(query.due_to);
    }
    if (query.overdue === true) {
      where.push("due_date IS NOT NULL AND due_date < ? AND status NOT IN ('submitted', 'graded')");
      params.push(today);
    } else if (query.overdue === false) {
      where.push("NOT (due_date IS NOT NULL AND due_date < ? AND status NOT IN ('submitted', 'graded'))");
      params.push(today);
    }

    const whereSql = where.join(" AND ");
    const total =
      this.db
        .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM assignments WHERE ${whereSql}`)
        .get(...params)?.n ?? 0;
    const direction = query.order === "desc" ? "DESC" : "ASC";
    const rows = this.db
      .prepare<unknown[], AssignmentRow>(
        `SELECT * FROM assignments WHERE ${whereSql}
         ORDER BY ${SORT_COLUMNS[query.sort]} IS NULL, ${SORT_COLUMNS[query.sort]} ${direction}, id
         LIMIT ? OFFSET ?`,
      )
      .all(...params, query.limit, pageOffset(query));
    return { items: rows.map((row) => this.rowToAssignment(row)), meta: buildPageMeta(query, total) };
  }

  get(teacherId: string, id: string): Assignment {
    const row = this.db
      .prepare<[string, string], AssignmentRow>("SELECT * FROM assignments WHERE id = ? AND teacher_id = ?")
      .get(id, teacherId);
    if (!row) throw new NotFoundError("Assignment");
    return this.rowToAssignment(row);
  }

  create(teacherId: string, input: CreateAssignmentInput, today: string): Assignment {
    assertOwned(this.db, "students", teacherId, input.student_id, "student_id", "Student");
    assertOwned(this.db, "subjects", teacherId, input.subject_id, "subject_id", "Subject");

    const score = input.score ?? null;
    const maxScore = input.max_score ?? null;
    const status: AssignmentStatus = input.status ?? (score !== null ? "graded" : "assigned");
    const id = `asg-${ulid()}`;
    const now = nowIso();
    this.db
      .prepare(
        `INSERT INTO assignments (
          id, teacher_id, student_id, subject_id, title, description, assigned_date, due_date,
          status, max_score, score, grade, feedback, completed_at, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        teacherId,
        input.student_id,
        input.subject_id ?? null,
        input.title,
        input.description ?? null,
        input.assigned_date ?? today,
        input.due_date ?? null,
        status,
        maxScore,
        score,
        input.grade ?? derivedGrade(score, maxScore),
        input.feedback ?? null,
        status === "submitted" ? now : null,
        now,
        now,
      );
    return this.get(teacherId, id);
  }

  update(teacherId: string, id: string, input: UpdateAssignmentInput): Assignment {
    const current = this.get(teacherId, id);
    assertOwned(this.db, "subjects", teacherId, input.subject_id, "subject_id", "Subject");

    const score = input.score !== undefined ? input.score : current.score;
    const maxScore = input.max_score !== undefined ? input.max_score : current.maxScore;
    if (score !== null && maxScore !== null && score > maxScore) {
      throw ValidationError.field("score", "Score cannot exceed max score");
    }

    let status = input.status ?? current.status;
    if (input.status === undefined && input.score !== undefined && input.score !== null) {
      status = "graded";
    }

    let completedAt = current.completedAt?.toISOString() ?? null;
    if (status === "submitted" && current.status !== "submitted") {
      completedAt = nowIso();
    } else if (status === "assigned" || status === "in_progress") {
      completedAt = null;
    }

    let grade = input.grade !== undefined ? input.grade : current.grade;
    if (input.grade === undefined && (input.score !== undefined || input.max_score !== undefined)) {
      grade = derivedGrade(score, maxScore);
    }

    this.db
      .prepare(
        `UPDATE assignments SET
          subject_id = ?, title = ?, description = ?, assigned_date = ?, due_date = ?, status = ?,
          max_score = ?, score = ?, grade = ?, feedback = ?, completed_at = ?, updated_at = ?
         WHERE id = ? AND teacher_id = ?`,
      )
      .run(
        input.subject_id !== undefined ? input.subject_id : current.subjectId,
        input.title ?? current.title,
        input.description !== undefined ? input.description : current.description,
        input.assigned_date ?? current.assignedDate,
        input.due_date !== undefined ? input.due_date : current.dueDate,
        status,
        maxScore,
        score,
        grade,
        input.feedback !== undefined ? input.feedback : current.feedback,
        completedAt,
        nowIso(),
        id,
        teacherId,
      );
    return this.get(teacherId, id);
  }

  /**
   * Returns the stored attachment paths for the caller to remove
   */
  delete(teacherId: string, id: string): string[] {
    const assignment = this.get(teacherId, id);
    const files = assignment.attachments.map((a) => a.storagePath);
    this.db.prepare("DELETE FROM assignments WHERE id = ?").run(assignment.id);
    return files;
  }

  private rowToAssignment(row: AssignmentRow): Assignment {
    return {
      id: row.id,
      teacherId: row.teacher_id,
      studentId: row.student_id,
      subjectId: row.subject_id,
      title: row.title,
      description: row.description,
      assignedDate: row.assigned_date,
      dueDate: row.due_date,
      status: row.status,
      maxScore: row.max_score,
      score: row.score,
      grade: row.grade,
      feedback: row.feedback,
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
      attachments: this.attachments.list({ kind: "assignment", id: row.id }),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
