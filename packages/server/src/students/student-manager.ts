/**
 * Student roster
 */

import { ulid } from "ulid";
import {
  NotFoundError,
  buildPageMeta,
  pageOffset,
  type CreateStudentInput,
  type ListStudentsQuery,
  type Page,
  type UpdateStudentInput,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { containsPattern, nowIso, updateSet } from "../db/helpers.js";

export interface Student {
  id: string;
  teacherId: string;
  firstName: string;
  lastName: string;
  dateOfBirth: string | null;
  gradeLevel: string | null;
  email: string | null;
  notes: string | null;
  profileImagePath: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

interface StudentRow {
  id: string;
  teacher_id: string;
  first_name: string;
  last_name: string;
  date_of_birth: string | null;
  grade_level: string | null;
  email: string | null;
  notes: string | null;
  profile_image_path: string | null;
  is_active: number;
  created_at: string;
  updated_at: string;
}

const UPDATABLE_COLUMNS = [
  "first_name",
  "last_name",
  "date_of_birth",
  "grade_level",
  "email",
  "notes",
  "is_active",
] as const;

/** PK < K < 1 … 12 */
const GRADE_ORDER = "CASE grade_level WHEN 'PK' THEN -1 WHEN 'K' THEN 0 ELSE CAST(grade_level AS INTEGER) END";

const SORT_EXPRESSIONS: Record<ListStudentsQuery["sort"], string> = {
  first_name: "first_name COLLATE NOCASE",
  last_name: "last_name COLLATE NOCASE",
  grade_level: GRADE_ORDER,
  created_at: "created_at",
};

export class StudentManager {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  list(teacherId: string, query: ListStudentsQuery): Page<Student> {
    const where = ["teacher_id = ?", "is_active = ?"];
    const params: unknown[] = [teacherId, query.is_active ? 1 : 0];

    if (query.grade_level) {
      where.push("grade_level = ?");
      params.push(query.grade_level);
    }
    if (query.search) {
      const pattern = containsPattern(query.search);
      where.push("(first_name LIKE ? ESCAPE '\\' OR last_name LIKE ? ESCAPE '\\')");
      params.push(pattern, pattern);
    }

    const whereSql = where.join(" AND ");
    const total =
      this.db.prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM students WHERE ${whereSql}`).get(...params)
        ?.n ?? 0;

    const direction = query.order === "desc" ? "DESC" : "ASC";
    const rows = this.db
      .prepare<unknown[], StudentRow>(
        `SELECT * FROM students WHERE ${whereSql}
         ORDER BY ${SORT_EXPRESSIONS[query.sort]} ${direction}, id ${direction}
         LIMIT ? OFFSET ?`,
      )
      .all(...params, query.limit, pageOffset(query));

    return { items: rows.map((row) => this.rowToStudent(row)), meta: buildPageMeta(query, total) };
  }

  findById(teacherId: string, id: string): Student | null {
    const row = this.db
      .prepare<[string, string], StudentRow>("SELECT * FROM students WHERE id = ? AND teacher_id = ?")
      .get(id, teacherId);
    return row ? this.rowToStudent(row) : null;
  }

  get(teacherId: string, id: string): Student {
    const student = this.findById(teacherId, id);
    if (!student) throw new NotFoundError("Student");
    return student;
  }

  create(teacherId: string, input: CreateStudentInput): Student {
    const id = `stu-${ulid()}`;
    const now = nowIso();
    this.db
      .prepare(
        `INSERT INTO students (
          id, teacher_id, first_name, last_name, date_of_birth, grade_level, email, notes,
          created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        teacherId,
        input.first_name,
        input.last_name,
        input.date_of_birth ?? null,
        input.grade_level ?? null,
        input.email ?? null,
        input.notes ?? null,
        now,
        now,
      );
    return this.get(teacherId, id);
  }

  update(teacherId: string, id: string, input: UpdateStudentInput): Student {
    this.get(teacherId, id);
    const { sets, values } = updateSet(input, UPDATABLE_COLUMNS);
    if (sets.length > 0) {
      this.db
        .prepare(`UPDATE students SET ${sets.join(", ")}, updated_at = ? WHERE id = ? AND teacher_id = ?`)
        .run(...values, nowIso(), id, teacherId);
    }
    return this.get(teacherId, id);
  }

  deactivate(teacherId: string, id: string): Student {
    return this.update(teacherId, id, { is_active: false });
  }

  /**
   * Hard delete. Attendance, assignments and report cards cascade; expenses,
   * tasks and events keep their rows with the student reference cleared.
   * Returns the stored files that belonged to the removed rows.
   */
  deletePermanently(teacherId: string, id: string): string[] {
    const student = this.get(teacherId, id);
    const files = this.db
      .prepare<[string], { storage_path: string }>(
        `SELECT a.storage_path FROM attachments a
         JOIN assignments s ON s.id = a.assignment_id
         WHERE s.student_id = ?`,
      )
      .all(id)
      .map((row) => row.storage_path);
    if (student.profileImagePath) files.push(student.profileImagePath);

    this.db.prepare("DELETE FROM students WHERE id = ? AND teacher_id = ?").run(id, teacherId);
    return files;
  }

  setProfileImage(teacherId: string, id: string, relativePath: string): void {
    this.db
      .prepare("UPDATE students SET profile_image_path = ?, updated_at = ? WHERE id = ? AND teacher_id = ?")
      .run(relativePath, nowIso(), id, teacherId);
  }

  private rowToStudent(row: StudentRow): Student {
    return {
      id: row.id,
      teacherId: row.teacher_id,
      firstName: row.first_name,
      lastName: row.last_name,
      dateOfBirth: row.date_of_birth,
      gradeLevel: row.grade_level,
      email: row.email,
      notes: row.notes,
      profileImagePath: row.profile_image_path,
      isActive: row.is_active === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
