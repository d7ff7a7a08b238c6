/**
 * Lesson Plans
 *
 * Own plans, the public library (full-text search over lesson_plans_fts) and
 * plans shared by email. A plan is visible to its owner, to everyone when
 * public, and to share recipients; anything else reads as not found.
 */

import { ulid } from "ulid";
import {
  ForbiddenError,
  NotFoundError,
  ValidationError,
  buildPageMeta,
  pageOffset,
  type CreateLessonPlanInput,
  type GradeLevel,
  type ListLessonPlansQuery,
  type Page,
  type PageRequest,
  type PublicLessonPlansQuery,
  type ShareLessonPlanInput,
  type UpdateLessonPlanInput,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { assertOwned, containsPattern, nowIso } from "../db/helpers.js";
import type { Attachment, AttachmentManager } from "../attachments/attachment-manager.js";

export interface LessonPlanAuthor {
  id: string;
  firstName: string;
  lastName: string;
}

export interface LessonPlan {
  id: string;
  teacherId: string;
  author: LessonPlanAuthor;
  title: string;
  description: string | null;
  subjectId: string | null;
  gradeLevel: GradeLevel | null;
  durationMinutes: number | null;
  objectives: string[];
  materials: string[];
  content: string | null;
  tags: string[];
  isPublic: boolean;
  copiedFromId: string | null;
  attachments: Attachment[];
  createdAt: Date;
  updatedAt: Date;
}

export interface LessonPlanShare {
  id: string;
  lessonPlanId: string;
  recipientEmail: string;
  message: string | null;
  createdAt: Date;
}

/** The teacher asking; email decides share visibility */
export interface Viewer {
  id: string;
  email: string;
}

interface LessonPlanRow {
  id: string;
  teacher_id: string;
  author_first_name: string;
  author_last_name: string;
  title: string;
  description: string | null;
  subject_id: string | null;
  grade_level: GradeLevel | null;
  duration_minutes: number | null;
  objectives: string;
  materials: string;
  content: string | null;
  tags: string;
  is_public: number;
  copied_from_id: string | null;
  created_at: string;
  updated_at: string;
}

interface ShareRow {
  id: string;
  lesson_plan_id: string;
  recipient_email: string;
  message: string | null;
  created_at: string;
}

const SELECT_PLAN = `
  SELECT lp.*, t.first_name AS author_first_name, t.last_name AS author_last_name
  FROM lesson_plans lp JOIN teachers t ON t.id = lp.teacher_id`;

const LIST_COLUMNS = ["objectives", "materials", "tags"] as const;

function parseList(text: string): string[] {
  const value: unknown = JSON.parse(text);
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

/**
 * FTS5 query from free text: every word must match, as a prefix.
 * Quoting keeps FTS operators in user input literal.
 */
export function ftsQuery(text: string): string | null {
  const terms = text
    .split(/[^\p{L}\p{N}_]+/u)
    .filter(Boolean)
    .map((term) => `"${term.replace(/"/g, '""')}"*`);
  return terms.length > 0 ? terms.join(" ") : null;
}

function rowToShare(row: ShareRow): LessonPlanShare {
  return {
    id: row.id,
    lessonPlanId: row.lesson_plan_id,
    recipientEmail: row.recipient_email,
    message: row.message,
    createdAt: new Date(row.created_at),
  };
}

export class LessonPlanManager {
  private db: Db;
  private attachments: AttachmentManager;

  constructor(db: Db, attachments: AttachmentManager) {
    this.db = db;
    this.attachments = attachments;
  }

  // ─────────────────────────────────────────────────────────────────
  // Lists
  // ─────────────────────────────────────────────────────────────────

  listOwn(teacherId: string, query: ListLessonPlansQuery): Page<LessonPlan> {
    const where = ["lp.teacher_id = ?"];
    const params: unknown[] = [teacherId];
    if (query.subject_id) {
      where.push("lp.subject_id = ?");
      params.push(query.subject_id);
    }
    if (query.grade_level) {
      where.push("lp.grade_level = ?");
      params.push(query.grade_level);
    }
    if (query.tag) {
      where.push("EXISTS (SELECT 1 FROM json_each(lp.tags) WHERE value = ?)");
      params.push(query.tag);
    }
    if (query.search) {
      where.push("(lp.title LIKE ? ESCAPE '\\' OR lp.description LIKE ? ESCAPE '\\')");
      const pattern = containsPattern(query.search);
      params.push(pattern, pattern);
    }
    return this.page(where, params, "lp.updated_at DESC, lp.id", query);
  }

  /**
   * Public plans of active teachers. With `q`, ranked by relevance.
   */
  listPublic(query: PublicLessonPlansQuery): Page<LessonPlan> {
    const where = ["lp.is_public = 1", "t.is_active = 1"];
    const params: unknown[] = [];
    if (query.grade_level) {
      where.push("lp.grade_level = ?");
      params.push(query.grade_level);
    }
    if (query.tag) {
      where.push("EXISTS (SELECT 1 FROM json_each(lp.tags) WHERE value = ?)");
      params.push(query.tag);
    }

    const match = query.q ? ftsQuery(query.q) : null;
    if (!match) {
      return this.page(where, params, "lp.updated_at DESC, lp.id", query);
    }

    const ranked = `
      ${SELECT_PLAN}
      JOIN (
        SELECT lesson_plan_id, bm25(lesson_plans_fts) AS score
        FROM lesson_plans_fts WHERE lesson_plans_fts MATCH ?
      ) m ON m.lesson_plan_id = lp.id
      WHERE ${where.join(" AND ")}`;
    const total =
      this.db
        .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM (${ranked})`)
        .get(match, ...params)?.n ?? 0;
    const rows = this.db
      .prepare<unknown[], LessonPlanRow>(`${ranked} ORDER BY m.score, lp.updated_at DESC LIMIT ? OFFSET ?`)
      .all(match, ...params, query.limit, pageOffset(query));
    return { items: rows.map((row) => this.rowToPlan(row)), meta: buildPageMeta(query, total) };
  }

  /** Plans other active teachers shared with the viewer's email */
  listShared(viewer: Viewer, request: PageRequest): Page<LessonPlan> {
    return this.page(
      [
        "t.is_active = 1",
        "lp.teacher_id != ?",
        "EXISTS (SELECT 1 FROM lesson_plan_shares s WHERE s.lesson_plan_id = lp.id AND s.recipient_email = ?)",
      ],
      [viewer.id, viewer.email],
      "lp.updated_at DESC, lp.id",
      request,
    );
  }

  // ─────────────────────────────────────────────────────────────────
  // Single plan
  // ─────────────────────────────────────────────────────────────────

  /**
   * Plan as seen by `viewer`; invisible plans are NOT_FOUND
   */
  getVisible(viewer: Viewer, id: string): LessonPlan {
    const plan = this.find(id);
    if (!plan || !this.canView(viewer, plan)) throw new NotFoundError("Lesson plan");
    return plan;
  }

  /**
   * Plan the viewer owns. Visible plans of others are FORBIDDEN.
   */
  getOwned(viewer: Viewer, id: string): LessonPlan {
    const plan = this.getVisible(viewer, id);
    if (plan.teacherId !== viewer.id) {
      throw new ForbiddenError("Only the owner can change this lesson plan");
    }
    return plan;
  }

  create(teacherId: string, input: CreateLessonPlanInput): LessonPlan {
    assertOwned(this.db, "subjects", teacherId, input.subject_id, "subject_id", "Subject");
    const id = this.insert(teacherId, input, null);
    return this.getOwned({ id: teacherId, email: "" }, id);
  }

  update(viewer: Viewer, id: string, input: UpdateLessonPlanInput): LessonPlan {
    this.getOwned(viewer, id);
    assertOwned(this.db, "subjects", viewer.id, input.subject_id, "subject_id", "Subject");

    const sets: string[] = [];
    const values: unknown[] = [];
    const scalar = {
      title: input.title,
      description: input.description,
      subject_id: input.subject_id,
      grade_level: input.grade_level,
      duration_minutes: input.duration_minutes,
      content: input.content,
      is_public: input.is_public === undefined ? undefined : input.is_public ? 1 : 0,
    };
    for (const [column, value] of Object.entries(scalar)) {
      if (value === undefined) continue;
      sets.push(`${column} = ?`);
      values.push(value);
    }
    for (const column of LIST_COLUMNS) {
      const value = input[column];
      if (value === undefined) continue;
      sets.push(`${column} = ?`);
      values.push(JSON.stringify(value));
    }
    if (sets.length > 0) {
      this.db
        .prepare(`UPDATE lesson_plans SET ${sets.join(", ")}, updated_at = ? WHERE id = ?`)
        .run(...values, nowIso(), id);
    }
    return this.getOwned(viewer, id);
  }

  /**
   * Returns stored attachment paths for the caller to remove
   */
  delete(viewer: Viewer, id: string): string[] {
    const plan = this.getOwned(viewer, id);
    const files = plan.attachments.map((a) => a.storagePath);
    this.db.prepare("DELETE FROM lesson_plans WHERE id = ?").run(plan.id);
    return files;
  }

  /**
   * Private copy for the viewer. Attachment files are duplicated through
   * `duplicateFile` before any row is written.
   */
  async copy(viewer: Viewer, id: string, duplicateFile: (storagePath: string) => Promise<string>): Promise<LessonPlan> {
    const source = this.getVisible(viewer, id);
    const copies: Attachment[] = [];
    for (const attachment of source.attachments) {
      copies.push({ ...attachment, storagePath: await duplicateFile(attachment.storagePath) });
    }

    const write = this.db.transaction((): string => {
      const copyId = this.insert(
        viewer.id,
        {
          title: source.title,
          description: source.description,
          subject_id: source.teacherId === viewer.id ? source.subjectId : null,
          grade_level: source.gradeLevel,
          duration_minutes: source.durationMinutes,
          objectives: source.objectives,
          materials: source.materials,
          content: source.content,
          tags: source.tags,
          is_public: false,
        },
        source.id,
      );
      for (const attachment of copies) {
        this.attachments.add(viewer.id, { kind: "lesson_plan", id: copyId }, attachment);
      }
      return copyId;
    });
    return this.getOwned(viewer, write());
  }

  // ─────────────────────────────────────────────────────────────────
  // Sharing
  // ─────────────────────────────────────────────────────────────────

  /**
   * Record a share; sharing again with the same email updates the message
   */
  share(viewer: Viewer, id: string, input: ShareLessonPlanInput): { share: LessonPlanShare; created: boolean } {
    const plan = this.getOwned(viewer, id);
    if (input.email === viewer.email.toLowerCase()) {
      throw ValidationError.field("email", "You cannot share a lesson plan with yourself");
    }

    const existing = this.db
      .prepare<[string, string], ShareRow>(
        "SELECT * FROM lesson_plan_shares WHERE lesson_plan_id = ? AND recipient_email = ?",
      )
      .get(plan.id, input.email);
    if (existing) {
      this.db.prepare("UPDATE lesson_plan_shares SET message = ? WHERE id = ?").run(input.message ?? null, existing.id);
      return { share: { ...rowToShare(existing), message: input.message ?? null }, created: false };
    }

    const shareId = `shr-${ulid()}`;
    this.db
      .prepare(
        `INSERT INTO lesson_plan_shares (id, lesson_plan_id, teacher_id, recipient_email, message, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(shareId, plan.id, viewer.id, input.email, input.message ?? null, nowIso());
    return { share: this.getShare(plan.id, shareId), created: true };
  }

  listShares(viewer: Viewer, id: string): LessonPlanShare[] {
    const plan = this.getOwned(viewer, id);
    return this.db
      .prepare<[string], ShareRow>("SELECT * FROM lesson_plan_shares WHERE lesson_plan_id = ? ORDER BY created_at, id")
      .all(plan.id)
      .map(rowToShare);
  }

  revokeShare(viewer: Viewer, id: string, shareId: string): void {
    const plan = this.getOwned(viewer, id);
    const share = this.getShare(plan.id, shareId);
    this.db.prepare("DELETE FROM lesson_plan_shares WHERE id = ?").run(share.id);
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private canView(viewer: Viewer, plan: LessonPlan): boolean {
    if (plan.teacherId === viewer.id) return true;
    if (!this.authorActive(plan.teacherId)) return false;
    if (plan.isPublic) return true;
    const share = this.db
      .prepare<[string, string], { id: string }>(
        "SELECT id FROM lesson_plan_shares WHERE lesson_plan_id = ? AND recipient_email = ?",
      )
      .get(plan.id, viewer.email);
    return share !== undefined;
  }

  private authorActive(teacherId: string): boolean {
    const row = this.db
      .prepare<[string], { is_active: number }>("SELECT is_active FROM teachers WHERE id = ?")
      .get(teacherId);
    return row?.is_active === 1;
  }

  private getShare(planId: string, shareId: string): LessonPlanShare {
    const row = this.db
      .prepare<[string, string], ShareRow>("SELECT * FROM lesson_plan_shares WHERE id = ? AND lesson_plan_id = ?")
      .get(shareId, planId);
    if (!row) throw new NotFoundError("Share");
    return rowToShare(row);
  }

  private find(id: string): LessonPlan | null {
    const row = this.db.prepare<[string], LessonPlanRow>(`${SELECT_PLAN} WHERE lp.id = ?`).get(id);
    return row ? this.rowToPlan(row) : null;
  }

  private page(where: string[], params: unknown[], orderBy: string, request: PageRequest): Page<LessonPlan> {
    const whereSql = where.join(" AND ");
    const total =
      this.db
        .prepare<unknown[], { n: number }>(
          `SELECT COUNT(*) AS n FROM lesson_plans lp JOIN teachers t ON t.id = lp.teacher_id WHERE ${whereSql}`,
        )
        .get(...params)?.n ?? 0;
    const rows = this.db
      .prepare<unknown[], LessonPlanRow>(`${SELECT_PLAN} WHERE ${whereSql} ORDER BY ${orderBy} LIMIT ? OFFSET ?`)
      .all(...params, request.limit, pageOffset(request));
    return { items: rows.map((row) => this.rowToPlan(row)), meta: buildPageMeta(request, total) };
  }

  private insert(teacherId: string, input: CreateLessonPlanInput, copiedFromId: string | null): string {
    const id = `lsp-${ulid()}`;
    const now = nowIso();
    this.db
      .prepare(
        `INSERT INTO lesson_plans (
          id, teacher_id, title, description, subject_id, grade_level, duration_minutes,
          objectives, materials, content, tags, is_public, copied_from_id, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        teacherId,
        input.title,
        input.description ?? null,
        input.subject_id ?? null,
        input.grade_level ?? null,
        input.duration_minutes ?? null,
        JSON.stringify(input.objectives),
        JSON.stringify(input.materials),
        input.content ?? null,
        JSON.stringify(input.tags),
        input.is_public ? 1 : 0,
        copiedFromId,
        now,
        now,
      );
    return id;
  }

  private rowToPlan(row: LessonPlanRow): LessonPlan {
    return {
      id: row.id,
      teacherId: row.teacher_id,
      author: { id: row.teacher_id, firstName: row.author_first_name, lastName: row.author_last_name },
      title: row.title,
      description: row.description,
      subjectId: row.subject_id,
      gradeLevel: row.grade_level,
      durationMinutes: row.duration_minutes,
      objectives: parseList(row.objectives),
      materials: parseList(row.materials),
      content: row.content,
      tags: parseList(row.tags),
      isPublic: row.is_public === 1,
      copiedFromId: row.copied_from_id,
      attachments: this.attachments.list({ kind: "lesson_plan", id: row.id }),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
