import { ValidationError } from "@homeroom/core";
import type { Db } from "./database.js";

/** Tables whose rows belong to a teacher and can be referenced by id */
export type OwnedTable =
  | "students"
  | "subjects"
  | "event_types"
  | "events"
  | "expense_categories"
  | "lesson_plans";

/**
 * Build `col = ?` assignments for the columns present in `input`.
 * Booleans are stored as 0/1.
 */
export function updateSet<K extends string>(
  input: { [P in K]?: unknown },
  columns: readonly K[],
): { sets: string[]; values: unknown[] } {
  const sets: string[] = [];
  const values: unknown[] = [];
  for (const column of columns) {
    const value = input[column];
    if (value === undefined) continue;
    sets.push(`${column} = ?`);
    values.push(typeof value === "boolean" ? (value ? 1 : 0) : value);
  }
  return { sets, values };
}

/** LIKE pattern matching `term` anywhere; use with ESCAPE '\\' */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

/**
 * Reject a reference to a row the teacher does not own.
 * Surfaces as a 422 on `field`.
 */
export function assertOwned(
  db: Db,
  table: OwnedTable,
  teacherId: string,
  id: string | null | undefined,
  field: string,
  label: string,
): void {
  if (id === null || id === undefined) return;
  const row = db
    .prepare<[string, string], { id: string }>(`SELECT id FROM ${table} WHERE id = ? AND teacher_id = ?`)
    .get(id, teacherId);
  if (!row) {
    throw ValidationError.field(field, `${label} not found`);
  }
}

export function nowIso(): string {
  return new Date().toISOString();
}
