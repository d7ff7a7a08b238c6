/**
 * Event types (Lesson, Field Trip, …) used to color the calendar
 */

import { ulid } from "ulid";
import {
  ConflictError,
  NotFoundError,
  type CreateEventTypeInput,
  type UpdateEventTypeInput,
} from "@homeroom/core";
import type { Db } from "../db/database.js";
import { nowIso, updateSet } from "../db/helpers.js";

export interface EventType {
  id: string;
  teacherId: string;
  name: string;
  color: string;
  icon: string | null;
  createdAt: Date;
  updatedAt: Date;
}

interface EventTypeRow {
  id: string;
  teacher_id: string;
  name: string;
  color: string;
  icon: string | null;
  created_at: string;
  updated_at: string;
}

export const DEFAULT_EVENT_TYPES: ReadonlyArray<{ name: string; color: string; icon: string }> = [
  { name: "Lesson", color: "#4A90D9", icon: "book" },
  { name: "Field Trip", color: "#7ED321", icon: "bus" },
  { name: "Co-op", color: "#9013FE", icon: "users" },
  { name: "Test", color: "#D0021B", icon: "clipboard" },
  { name: "Holiday", color: "#F5A623", icon: "sun" },
];

const UPDATABLE_COLUMNS = ["name", "color", "icon"] as const;

export class EventTypeManager {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  createDefaults(teacherId: string): void {
    for (const type of DEFAULT_EVENT_TYPES) {
      this.create(teacherId, type);
    }
  }

  list(teacherId: string): EventType[] {
    return this.db
      .prepare<[string], EventTypeRow>("SELECT * FROM event_types WHERE teacher_id = ? ORDER BY created_at, id")
      .all(teacherId)
      .map((row) => this.rowToEventType(row));
  }

  get(teacherId: string, id: string): EventType {
    const row = this.db
      .prepare<[string, string], EventTypeRow>("SELECT * FROM event_types WHERE id = ? AND teacher_id = ?")
      .get(id, teacherId);
    if (!row) throw new NotFoundError("Event type");
    return this.rowToEventType(row);
  }

  create(teacherId: string, input: CreateEventTypeInput): EventType {
    this.assertNameFree(teacherId, input.name);
    const id = `ety-${ulid()}`;
    const now = nowIso();
    this.db
      .prepare(
        `INSERT INTO event_types (id, teacher_id, name, color, icon, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, teacherId, input.name, input.color, input.icon ?? null, now, now);
    return this.get(teacherId, id);
  }

  update(teacherId: string, id: string, input: UpdateEventTypeInput): EventType {
    this.get(teacherId, id);
    if (input.name !== undefined) this.assertNameFree(teacherId, input.name, id);
    const { sets, values } = updateSet(input, UPDATABLE_COLUMNS);
    if (sets.length > 0) {
      this.db
        .prepare(`UPDATE event_types SET ${sets.join(", ")}, updated_at = ? WHERE id = ? AND teacher_id = ?`)
        .run(...values, nowIso(), id, teacherId);
    }
    return this.get(teacherId, id);
  }

  /** Events of this type keep their rows with no type */
  delete(teacherId: string, id: string): void {
    this.get(teacherId, id);
    this.db.prepare("DELETE FROM event_types WHERE id = ? AND teacher_id = ?").run(id, teacherId);
  }

  private assertNameFree(teacherId: string, name: string, exceptId?: string): void {
    const row = this.db
      .prepare<[string, string], { id: string }>("SELECT id FROM event_types WHERE teacher_id = ? AND name = ?")
      .get(teacherId, name);
    if (row && row.id !== exceptId) {
      throw new ConflictError(`An event type named "${name}" already exists`);
    }
  }

  private rowToEventType(row: EventTypeRow): EventType {
    return {
      id: row.id,
      teacherId: row.teacher_id,
      name: row.name,
      color: row.color,
      icon: row.icon,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
