/**
 * Task Manager
 *
 * The teacher's to-do list. Completing a task stamps completed_at; moving it
 * back out of completed clears the stamp.
 */

import { ulid } from "ulid";
import {
  NotFoundError,
  buildPageMeta,
  pageOffset,
  type CreateTaskInput,
  type ListTasksQuery,
  type Page,
  type TaskPriority,
  type TaskStatus,
  type UpdateTaskInput,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { assertOwned, nowIso } from "../db/helpers.js";

export interface Task {
  id: string;
  teacherId: string;
  title: string;
  description: string | null;
  dueDate: string | null;
  priority: TaskPriority;
  status: TaskStatus;
  studentId: string | null;
  completedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

interface TaskRow {
  id: string;
  teacher_id: string;
  title: string;
  description: string | null;
  due_date: string | null;
  priority: TaskPriority;
  status: TaskStatus;
  student_id: string | null;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
}

/** high sorts before low when ascending */
const PRIORITY_RANK = "CASE priority WHEN 'high' THEN 0 WHEN 'medium' THEN 1 ELSE 2 END";

const SORT_COLUMNS: Record<ListTasksQuery["sort"], string> = {
  due_date: "due_date",
  priority: PRIORITY_RANK,
  created_at: "created_at",
};

/**
 * TaskManager - CRUD operations for tasks
 */
export class TaskManager {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  private generateTaskId(): string {
    return `tsk-${ulid()}`;
  }

  create(teacherId: string, input: CreateTaskInput): Task {
    assertOwned(this.db, "students", teacherId, input.student_id, "student_id", "Student");

    const id = this.generateTaskId();
    const now = nowIso();
    const stmt = this.db.prepare(`
      INSERT INTO tasks (
        id, teacher_id, title, description, due_date, priority, status,
        student_id, completed_at, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    stmt.run(
      id,
      teacherId,
      input.title,
      input.description ?? null,
      input.due_date ?? null,
      input.priority,
      input.status,
      input.student_id ?? null,
      input.status === "completed" ? now : null,
      now,
      now,
    );
    return this.get(teacherId, id);
  }

  findById(teacherId: string, id: string): Task | null {
    const row = this.db
      .prepare<[string, string], TaskRow>("SELECT * FROM tasks WHERE id = ? AND teacher_id = ?")
      .get(id, teacherId);
    return row ? this.rowToTask(row) : null;
  }

  get(teacherId: string, id: string): Task {
    const task = this.findById(teacherId, id);
    if (!task) throw new NotFoundError("Task");
    return task;
  }

  /**
   * List tasks with optional filtering. Tasks without a due date sort last.
   */
  list(teacherId: string, query: ListTasksQuery): Page<Task> {
    const conditions = ["teacher_id = ?"];
    const params: unknown[] = [teacherId];

    if (query.status) {
      conditions.push(`status IN (${query.status.map(() => "?").join(", ")})`);
      params.push(...query.status);
    }
    if (query.priority) {
      conditions.push("priority = ?");
      params.push(query.priority);
    }
    if (query.student_id) {
      conditions.push("student_id = ?");
      params.push(query.student_id);
    }
    if (query.due_before) {
      conditions.push("due_date IS NOT NULL AND due_date < ?");
      params.push(query.due_before);
    }

    const where = conditions.join(" AND ");
    const total =
      this.db.prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM tasks WHERE ${where}`).get(...params)
        ?.n ?? 0;
    const column = SORT_COLUMNS[query.sort];
    const direction = query.order === "desc" ? "DESC" : "ASC";
    const rows = this.db
      .prepare<unknown[], TaskRow>(
        `SELECT * FROM tasks WHERE ${where}
         ORDER BY ${column} IS NULL, ${column} ${direction}, created_at, id
         LIMIT ? OFFSET ?`,
      )
      .all(...params, query.limit, pageOffset(query));

    return { items: rows.map((row) => this.rowToTask(row)), meta: buildPageMeta(query, total) };
  }

  update(teacherId: string, id: string, changes: UpdateTaskInput): Task {
    const current = this.get(teacherId, id);
    assertOwned(this.db, "students", teacherId, changes.student_id, "student_id", "Student");

    const fields: string[] = [];
    const values: unknown[] = [];

    if (changes.title !== undefined) {
      fields.push("title = ?");
      values.push(changes.title);
    }
    if (changes.description !== undefined) {
      fields.push("description = ?");
      values.push(changes.description);
    }
    if (changes.due_date !== undefined) {
      fields.push("due_date = ?");
      values.push(changes.due_date);
    }
    if (changes.priority !== undefined) {
      fields.push("priority = ?");
      values.push(changes.priority);
    }
    if (changes.student_id !== undefined) {
      fields.push("student_id = ?");
      values.push(changes.student_id);
    }
    if (changes.status !== undefined && changes.status !== current.status) {
      fields.push("status = ?", "completed_at = ?");
      values.push(changes.status, changes.status === "completed" ? nowIso() : null);
    }

    if (fields.length === 0) {
      return current;
    }

    fields.push("updated_at = ?");
    values.push(nowIso(), id, teacherId);
    this.db.prepare(`UPDATE tasks SET ${fields.join(", ")} WHERE id = ? AND teacher_id = ?`).run(...values);
    return this.get(teacherId, id);
  }

  complete(teacherId: string, id: string): Task {
    return this.update(teacherId, id, { status: "completed" });
  }

  delete(teacherId: string, id: string): void {
    const task = this.get(teacherId, id);
    this.db.prepare("DELETE FROM tasks WHERE id = ?").run(task.id);
  }

  private rowToTask(row: TaskRow): Task {
    return {
      id: row.id,
      teacherId: row.teacher_id,
      title: row.title,
      description: row.description,
      dueDate: row.due_date,
      priority: row.priority,
      status: row.status,
      studentId: row.student_id,
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
