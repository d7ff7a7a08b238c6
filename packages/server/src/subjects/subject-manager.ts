/**
 * Subjects taught by a teacher
 */

import { ulid } from "ulid";
import {
  ConflictError,
  NotFoundError,
  buildPageMeta,
  pageOffset,
  type CreateSubjectInput,
  type ListSubjectsQuery,
  type Page,
  type UpdateSubjectInput,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { containsPattern, nowIso, updateSet } from "../db/helpers.js";

export interface Subject {
  id: string;
  teacherId: string;
  name: string;
  description: string | null;
  color: string | null;
  gradeLevel: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

interface SubjectRow {
  id: string;
  teacher_id: string;
  name: string;
  description: string | null;
  color: string | null;
  grade_level: string | null;
  is_active: number;
  created_at: string;
  updated_at: string;
}

const UPDATABLE_COLUMNS = ["name", "description", "color", "grade_level", "is_active"] as const;

export class SubjectManager {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  list(teacherId: string, query: ListSubjectsQuery): Page<Subject> {
    const where = ["teacher_id = ?", "is_active = ?"];
    const params: unknown[] = [teacherId, query.is_active ? 1 : 0];
    if (query.search) {
      where.push("name LIKE ? ESCAPE '\\'");
      params.push(containsPattern(query.search));
    }
    const whereSql = where.join(" AND ");
    const total =
      this.db.prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM subjects WHERE ${whereSql}`).get(...params)
        ?.n ?? 0;
    const rows = this.db
      .prepare<unknown[], SubjectRow>(
        `SELECT * FROM subjects WHERE ${whereSql} ORDER BY name COLLATE NOCASE, id LIMIT ? OFFSET ?`,
      )
      .all(...params, query.limit, pageOffset(query));
    return { items: rows.map((row) => this.rowToSubject(row)), meta: buildPageMeta(query, total) };
  }

  get(teacherId: string, id: string): Subject {
    const row = this.db
      .prepare<[string, string], SubjectRow>("SELECT * FROM subjects WHERE id = ? AND teacher_id = ?")
      .get(id, teacherId);
    if (!row) throw new NotFoundError("Subject");
    return this.rowToSubject(row);
  }

  create(teacherId: string, input: CreateSubjectInput): Subject {
    this.assertNameFree(teacherId, input.name);
    const id = `sub-${ulid()}`;
    const now = nowIso();
    this.db
      .prepare(
        `INSERT INTO subjects (id, teacher_id, name, description, color, grade_level, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, teacherId, input.name, input.description ?? null, input.color ?? null, input.grade_level ?? null, now, now);
    return this.get(teacherId, id);
  }

  update(teacherId: string, id: string, input: UpdateSubjectInput): Subject {
    const current = this.get(teacherId, id);
    const willBeActive = input.is_active ?? current.isActive;
    const name = input.name ?? current.name;
    if (willBeActive && (name.toLowerCase() !== current.name.toLowerCase() || !current.isActive)) {
      this.assertNameFree(teacherId, name, id);
    }
    const { sets, values } = updateSet(input, UPDATABLE_COLUMNS);
    if (sets.length > 0) {
      this.db
        .prepare(`UPDATE subjects SET ${sets.join(", ")}, updated_at = ? WHERE id = ? AND teacher_id = ?`)
        .run(...values, nowIso(), id, teacherId);
    }
    return this.get(teacherId, id);
  }

  deactivate(teacherId: string, id: string): Subject {
    return this.update(teacherId, id, { is_active: false });
  }

  /**
   * Hard delete. Events, assignments, expenses, lesson plans and report-card
   * entries keep their rows; entries keep their subject name snapshot.
   */
  deletePermanently(teacherId: string, id: string): void {
    this.get(teacherId, id);
    this.db.prepare("DELETE FROM subjects WHERE id = ? AND teacher_id = ?").run(id, teacherId);
  }

  private assertNameFree(teacherId: string, name: string, exceptId?: string): void {
    const row = this.db
      .prepare<[string, string], { id: string }>(
        "SELECT id FROM subjects WHERE teacher_id = ? AND name = ? AND is_active = 1",
      )
      .get(teacherId, name);
    if (row && row.id !== exceptId) {
      throw new ConflictError(`A subject named "${name}" already exists`);
    }
  }

  private rowToSubject(row: SubjectRow): Subject {
    return {
      id: row.id,
      teacherId: row.teacher_id,
      name: row.name,
      description: row.description,
      color: row.color,
      gradeLevel: row.grade_level,
      isActive: row.is_active === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
