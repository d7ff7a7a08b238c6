/**
 * Teacher accounts
 */

import { ulid } from "ulid";
import { DuplicateEmailError, NotFoundError, type UpdateTeacherInput } from "@homeroom/core";
import type { Db } from "../db/database.js";

export interface Teacher {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  phone: string | null;
  timezone: string;
  bio: string | null;
  profileImagePath: string | null;
  emailVerified: boolean;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

interface TeacherRow {
  id: string;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  phone: string | null;
  timezone: string;
  bio: string | null;
  profile_image_path: string | null;
  email_verified: number;
  is_active: number;
  created_at: string;
  updated_at: string;
}

export interface CreateTeacherRecord {
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  timezone?: string;
}

const UPDATABLE_COLUMNS = ["email", "first_name", "last_name", "phone", "timezone", "bio"] as const;

export class TeacherManager {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  create(record: CreateTeacherRecord): Teacher {
    if (this.findByEmail(record.email)) {
      throw new DuplicateEmailError();
    }
    const id = `tch-${ulid()}`;
    const now = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO teachers (id, email, password_hash, first_name, last_name, timezone, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, record.email, record.passwordHash, record.firstName, record.lastName, record.timezone ?? "UTC", now, now);
    return this.get(id);
  }

  findById(id: string): Teacher | null {
    const row = this.db.prepare<[string], TeacherRow>("SELECT * FROM teachers WHERE id = ?").get(id);
    return row ? this.rowToTeacher(row) : null;
  }

  get(id: string): Teacher {
    const teacher = this.findById(id);
    if (!teacher) throw new NotFoundError("Teacher");
    return teacher;
  }

  findByEmail(email: string): Teacher | null {
    const row = this.db.prepare<[string], TeacherRow>("SELECT * FROM teachers WHERE email = ?").get(email);
    return row ? this.rowToTeacher(row) : null;
  }

  /** Stored hash for credential checks; never leaves the auth layer */
  getPasswordHash(id: string): string | null {
    const row = this.db
      .prepare<[string], { password_hash: string }>("SELECT password_hash FROM teachers WHERE id = ?")
      .get(id);
    return row?.password_hash ?? null;
  }

  isActive(id: string): boolean {
    const row = this.db.prepare<[string], { is_active: number }>("SELECT is_active FROM teachers WHERE id = ?").get(id);
    return row?.is_active === 1;
  }

  /**
   * Apply a profile update. A changed email resets verification; the caller
   * sends the new verification mail.
   */
  update(id: string, input: UpdateTeacherInput): { teacher: Teacher; emailChanged: boolean } {
    const current = this.get(id);
    const emailChanged = input.email !== undefined && input.email !== current.email;
    if (emailChanged && input.email !== undefined) {
      const owner = this.findByEmail(input.email);
      if (owner && owner.id !== id) throw new DuplicateEmailError();
    }

    const sets: string[] = [];
    const values: unknown[] = [];
    for (const column of UPDATABLE_COLUMNS) {
      const value = input[column];
      if (value !== undefined) {
        sets.push(`${column} = ?`);
        values.push(value);
      }
    }
    if (emailChanged) sets.push("email_verified = 0");
    if (sets.length > 0) {
      sets.push("updated_at = ?");
      values.push(new Date().toISOString(), id);
      this.db.prepare(`UPDATE teachers SET ${sets.join(", ")} WHERE id = ?`).run(...values);
    }
    return { teacher: this.get(id), emailChanged };
  }

  setPasswordHash(id: string, passwordHash: string): void {
    this.db
      .prepare("UPDATE teachers SET password_hash = ?, updated_at = ? WHERE id = ?")
      .run(passwordHash, new Date().toISOString(), id);
  }

  markEmailVerified(id: string): void {
    this.db
      .prepare("UPDATE teachers SET email_verified = 1, updated_at = ? WHERE id = ?")
      .run(new Date().toISOString(), id);
  }

  setProfileImage(id: string, relativePath: string | null): void {
    this.db
      .prepare("UPDATE teachers SET profile_image_path = ?, updated_at = ? WHERE id = ?")
      .run(relativePath, new Date().toISOString(), id);
  }

  deactivate(id: string): void {
    this.db
      .prepare("UPDATE teachers SET is_active = 0, updated_at = ? WHERE id = ?")
      .run(new Date().toISOString(), id);
  }

  /** Cascades to every owned row */
  deletePermanently(id: string): void {
    this.db.prepare("DELETE FROM teachers WHERE id = ?").run(id);
  }

  private rowToTeacher(row: TeacherRow): Teacher {
    return {
      id: row.id,
      email: row.email,
      firstName: row.first_name,
      lastName: row.last_name,
      phone: row.phone,
      timezone: row.timezone,
      bio: row.bio,
      profileImagePath: row.profile_image_path,
      emailVerified: row.email_verified === 1,
      isActive: row.is_active === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
