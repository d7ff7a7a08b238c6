/**
 * Expenses
 *
 * Amounts are stored as integer cents and exposed as decimal amounts.
 */

import { DateTime } from "luxon";
import { ulid } from "ulid";
import {
  NotFoundError,
  buildPageMeta,
  pageOffset,
  type CreateExpenseInput,
  type ExpenseSummaryQuery,
  type ListExpensesQuery,
  type Page,
  type SummaryGroup,
  type UpdateExpenseInput,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { assertOwned, nowIso, updateSet } from "../db/helpers.js";

export type PaymentMethod = NonNullable<CreateExpenseInput["payment_method"]>;

export interface Receipt {
  path: string;
  fileName: string;
  mimeType: string;
}

export interface Expense {
  id: string;
  teacherId: string;
  amountCents: number;
  currency: string;
  description: string;
  expenseDate: string;
  categoryId: string | null;
  studentId: string | null;
  subjectId: string | null;
  vendor: string | null;
  paymentMethod: PaymentMethod | null;
  isTaxDeductible: boolean;
  notes: string | null;
  receipt: Receipt | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ExpenseSummaryGroup {
  key: string | null;
  label: string;
  totalCents: number;
  count: number;
}

export interface ExpenseSummary {
  totalCents: number;
  count: number;
  /** Shared currency of the summarized rows; null when they differ or there are none */
  currency: string | null;
  groups: ExpenseSummaryGroup[];
}

interface ExpenseRow {
  id: string;
  teacher_id: string;
  amount_cents: number;
  currency: string;
  description: string;
  expense_date: string;
  category_id: string | null;
  student_id: string | null;
  subject_id: string | null;
  vendor: string | null;
  payment_method: PaymentMethod | null;
  is_tax_deductible: number;
  notes: string | null;
  receipt_path: string | null;
  receipt_name: string | null;
  receipt_mime: string | null;
  created_at: string;
  updated_at: string;
}

interface GroupRow {
  key: string | null;
  label: string | null;
  total: number;
  count: number;
}

const UPDATABLE_COLUMNS = [
  "currency",
  "description",
  "expense_date",
  "category_id",
  "student_id",
  "subject_id",
  "vendor",
  "payment_method",
  "is_tax_deductible",
  "notes",
] as const;

const SORT_COLUMNS: Record<ListExpensesQuery["sort"], string> = {
  expense_date: "expense_date",
  amount: "amount_cents",
  created_at: "created_at",
};

const GROUP_SQL: Record<SummaryGroup, { key: string; label: string; join: string }> = {
  category: {
    key: "e.category_id",
    label: "c.name",
    join: "LEFT JOIN expense_categories c ON c.id = e.category_id",
  },
  student: {
    key: "e.student_id",
    label: "s.first_name || ' ' || s.last_name",
    join: "LEFT JOIN students s ON s.id = e.student_id",
  },
  subject: {
    key: "e.subject_id",
    label: "sj.name",
    join: "LEFT JOIN subjects sj ON sj.id = e.subject_id",
  },
  month: {
    key: "substr(e.expense_date, 1, 7)",
    label: "substr(e.expense_date, 1, 7)",
    join: "",
  },
};

const MISSING_LABEL: Record<SummaryGroup, string> = {
  category: "Uncategorized",
  student: "Unassigned",
  subject: "Unassigned",
  month: "Unknown",
};

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

function monthLabel(key: string): string {
  return DateTime.fromISO(`${key}-01`, { zone: "utc" }).toFormat("LLLL yyyy");
}

export class ExpenseManager {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  list(teacherId: string, query: ListExpensesQuery): Page<Expense> {
    const { where, params } = this.filters(teacherId, query);
    if (query.category_id) {
      where.push("category_id = ?");
      params.push(query.category_id);
    }
    if (query.student_id) {
      where.push("student_id = ?");
      params.push(query.student_id);
    }
    if (query.subject_id) {
      where.push("subject_id = ?");
      params.push(query.subject_id);
    }
    if (query.min_amount !== undefined) {
      where.push("amount_cents >= ?");
      params.push(toCents(query.min_amount));
    }
    if (query.max_amount !== undefined) {
      where.push("amount_cents <= ?");
      params.push(toCents(query.max_amount));
    }

    const whereSql = where.join(" AND ");
    const total =
      this.db
        .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM expenses WHERE ${whereSql}`)
        .get(...params)?.n ?? 0;
    const direction = query.order === "asc" ? "ASC" : "DESC";
    const rows = this.db
      .prepare<unknown[], ExpenseRow>(
        `SELECT * FROM expenses WHERE ${whereSql}
         ORDER BY ${SORT_COLUMNS[query.sort]} ${direction}, created_at ${direction}, id
         LIMIT ? OFFSET ?`,
      )
      .all(...params, query.limit, pageOffset(query));
    return { items: rows.map(rowToExpense), meta: buildPageMeta(query, total) };
  }

  get(teacherId: string, id: string): Expense {
    const row = this.db
      .prepare<[string, string], ExpenseRow>("SELECT * FROM expenses WHERE id = ? AND teacher_id = ?")
      .get(id, teacherId);
    if (!row) throw new NotFoundError("Expense");
    return rowToExpense(row);
  }

  create(teacherId: string, input: CreateExpenseInput): Expense {
    this.assertReferences(teacherId, input);
    const id = `exp-${ulid()}`;
    const now = nowIso();
    this.db
      .prepare(
        `INSERT INTO expenses (
          id, teacher_id, amount_cents, currency, description, expense_date, category_id, student_id,
          subject_id, vendor, payment_method, is_tax_deductible, notes, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        teacherId,
        toCents(input.amount),
        input.currency,
        input.description,
        input.expense_date,
        input.category_id ?? null,
        input.student_id ?? null,
        input.subject_id ?? null,
        input.vendor ?? null,
        input.payment_method ?? null,
        input.is_tax_deductible ? 1 : 0,
        input.notes ?? null,
        now,
        now,
      );
    return this.get(teacherId, id);
  }

  update(teacherId: string, id: string, input: UpdateExpenseInput): Expense {
    this.get(teacherId, id);
    this.assertReferences(teacherId, input);

    const { sets, values } = updateSet(input, UPDATABLE_COLUMNS);
    if (input.amount !== undefined) {
      sets.push("amount_cents = ?");
      values.push(toCents(input.amount));
    }
    if (sets.length > 0) {
      this.db
        .prepare(`UPDATE expenses SET ${sets.join(", ")}, updated_at = ? WHERE id = ? AND teacher_id = ?`)
        .run(...values, nowIso(), id, teacherId);
    }
    return this.get(teacherId, id);
  }

  /**
   * Returns the receipt path, if any, for the caller to remove
   */
  delete(teacherId: string, id: string): string | null {
    const expense = this.get(teacherId, id);
    this.db.prepare("DELETE FROM expenses WHERE id = ?").run(expense.id);
    return expense.receipt?.path ?? null;
  }

  /**
   * Attach a receipt, returning the path of the one it replaces
   */
  setReceipt(teacherId: string, id: string, receipt: Receipt): string | null {
    const expense = this.get(teacherId, id);
    this.db
      .prepare(
        "UPDATE expenses SET receipt_path = ?, receipt_name = ?, receipt_mime = ?, updated_at = ? WHERE id = ?",
      )
      .run(receipt.path, receipt.fileName, receipt.mimeType, nowIso(), expense.id);
    return expense.receipt?.path ?? null;
  }

  clearReceipt(teacherId: string, id: string): string {
    const expense = this.get(teacherId, id);
    if (!expense.receipt) throw new NotFoundError("Receipt");
    this.db
      .prepare(
        "UPDATE expenses SET receipt_path = NULL, receipt_name = NULL, receipt_mime = NULL, updated_at = ? WHERE id = ?",
      )
      .run(nowIso(), expense.id);
    return expense.receipt.path;
  }

  /**
   * Totals grouped by category, student, subject or month. Groups sort by
   * total descending, months chronologically.
   */
  summary(teacherId: string, query: ExpenseSummaryQuery): ExpenseSummary {
    const { where, params } = this.filters(teacherId, query, "e.");
    const whereSql = where.join(" AND ");
    const group = GROUP_SQL[query.group_by];

    const rows = this.db
      .prepare<unknown[], GroupRow>(
        `SELECT ${group.key} AS key, ${group.label} AS label, SUM(e.amount_cents) AS total, COUNT(*) AS count
         FROM expenses e ${group.join}
         WHERE ${whereSql}
         GROUP BY ${group.key}`,
      )
      .all(...params);
    const currencies = this.db
      .prepare<unknown[], { currency: string }>(`SELECT DISTINCT e.currency FROM expenses e WHERE ${whereSql}`)
      .all(...params);

    const groups: ExpenseSummaryGroup[] = rows.map((row) => ({
      key: row.key,
      label:
        row.key === null
          ? MISSING_LABEL[query.group_by]
          : query.group_by === "month"
            ? monthLabel(row.key)
            : (row.label ?? MISSING_LABEL[query.group_by]),
      totalCents: row.total,
      count: row.count,
    }));
    if (query.group_by === "month") {
      groups.sort((a, b) => (a.key ?? "").localeCompare(b.key ?? ""));
    } else {
      groups.sort((a, b) => b.totalCents - a.totalCents || a.label.localeCompare(b.label));
    }

    return {
      totalCents: groups.reduce((sum, g) => sum + g.totalCents, 0),
      count: groups.reduce((sum, g) => sum + g.count, 0),
      currency: currencies.length === 1 ? currencies[0].currency : null,
      groups,
    };
  }

  private filters(
    teacherId: string,
    range: { from?: string; to?: string },
    prefix = "",
  ): { where: string[]; params: unknown[] } {
    const where = [`${prefix}teacher_id = ?`];
    const params: unknown[] = [teacherId];
    if (range.from) {
      where.push(`${prefix}expense_date >= ?`);
      params.push(range.from);
    }
    if (range.to) {
      where.push(`${prefix}expense_date <= ?`);
      params.push(range.to);
    }
    return { where, params };
  }

  private assertReferences(teacherId: string, input: UpdateExpenseInput): void {
    assertOwned(this.db, "expense_categories", teacherId, input.category_id, "category_id", "Category");
    assertOwned(this.db, "students", teacherId, input.student_id, "student_id", "Student");
    assertOwned(this.db, "subjects", teacherId, input.subject_id, "subject_id", "Subject");
  }
}

function rowToExpense(row: ExpenseRow): Expense {
  return {
    id: row.id,
    teacherId: row.teacher_id,
    amountCents: row.amount_cents,
    currency: row.currency,
    description: row.description,
    expenseDate: row.expense_date,
    categoryId: row.category_id,
    studentId: row.student_id,
    subjectId: row.subject_id,
    vendor: row.vendor,
    paymentMethod: row.payment_method,
    isTaxDeductible: row.is_tax_deductible === 1,
    notes: row.notes,
    receipt:
      row.receipt_path && row.receipt_name && row.receipt_mime
        ? { path: row.receipt_path, fileName: row.receipt_name, mimeType: row.receipt_mime }
        : null,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
