/**
 * Expense categories
 */

import { ulid } from "ulid";
import {
  ConflictError,
  NotFoundError,
  type CreateExpenseCategoryInput,
  type UpdateExpenseCategoryInput,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { nowIso, updateSet } from "../db/helpers.js";

export interface ExpenseCategory {
  id: string;
  teacherId: string;
  name: string;
  color: string | null;
  isDefault: boolean;
  createdAt: Date;
}

interface CategoryRow {
  id: string;
  teacher_id: string;
  name: string;
  color: string | null;
  is_default: number;
  created_at: string;
}

export const DEFAULT_EXPENSE_CATEGORIES = [
  "Curriculum",
  "Books",
  "Supplies",
  "Field Trips",
  "Technology",
  "Activities",
  "Other",
] as const;

const UPDATABLE_COLUMNS = ["name", "color"] as const;

export class ExpenseCategoryManager {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  createDefaults(teacherId: string): void {
    for (const name of DEFAULT_EXPENSE_CATEGORIES) {
      this.insert(teacherId, name, null, true);
    }
  }

  list(teacherId: string): ExpenseCategory[] {
    return this.db
      .prepare<[string], CategoryRow>(
        "SELECT * FROM expense_categories WHERE teacher_id = ? ORDER BY is_default DESC, created_at, id",
      )
      .all(teacherId)
      .map((row) => this.rowToCategory(row));
  }

  get(teacherId: string, id: string): ExpenseCategory {
    const row = this.db
      .prepare<[string, string], CategoryRow>("SELECT * FROM expense_categories WHERE id = ? AND teacher_id = ?")
      .get(id, teacherId);
    if (!row) throw new NotFoundError("Expense category");
    return this.rowToCategory(row);
  }

  create(teacherId: string, input: CreateExpenseCategoryInput): ExpenseCategory {
    return this.insert(teacherId, input.name, input.color ?? null, false);
  }

  update(teacherId: string, id: string, input: UpdateExpenseCategoryInput): ExpenseCategory {
    this.get(teacherId, id);
    if (input.name !== undefined) this.assertNameFree(teacherId, input.name, id);
    const { sets, values } = updateSet(input, UPDATABLE_COLUMNS);
    if (sets.length > 0) {
      this.db
        .prepare(`UPDATE expense_categories SET ${sets.join(", ")}, updated_at = ? WHERE id = ? AND teacher_id = ?`)
        .run(...values, nowIso(), id, teacherId);
    }
    return this.get(teacherId, id);
  }

  /** Expenses in the category move to no category */
  delete(teacherId: string, id: string): void {
    this.get(teacherId, id);
    this.db.prepare("DELETE FROM expense_categories WHERE id = ? AND teacher_id = ?").run(id, teacherId);
  }

  private insert(teacherId: string, name: string, color: string | null, isDefault: boolean): ExpenseCategory {
    this.assertNameFree(teacherId, name);
    const id = `exc-${ulid()}`;
    const now = nowIso();
    this.db
      .prepare(
        `INSERT INTO expense_categories (id, teacher_id, name, color, is_default, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, teacherId, name, color, isDefault ? 1 : 0, now, now);
    return this.get(teacherId, id);
  }

  private assertNameFree(teacherId: string, name: string, exceptId?: string): void {
    const row = this.db
      .prepare<[string, string], { id: string }>("SELECT id FROM expense_categories WHERE teacher_id = ? AND name = ?")
      .get(teacherId, name);
    if (row && row.id !== exceptId) {
      throw new ConflictError(`A category named "${name}" already exists`);
    }
  }

  private rowToCategory(row: CategoryRow): ExpenseCategory {
    return {
      id: row.id,
      teacherId: row.teacher_id,
      name: row.name,
      color: row.color,
      isDefault: row.is_default === 1,
      createdAt: new Date(row.created_at),
    };
  }
}
