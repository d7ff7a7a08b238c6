/**
 * Database Layer
 *
 * Owns the SQLite connection and schema. Uses better-sqlite3 with WAL mode and
 * foreign keys on; owned rows cascade from teachers, optional references are
 * nulled when their target goes away.
 */

import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS teachers (
    id TEXT PRIMARY KEY,
    email TEXT NOT NULL UNIQUE COLLATE NOCASE,
    password_hash TEXT NOT NULL,
    first_name TEXT NOT NULL,
    last_name TEXT NOT NULL,
    phone TEXT,
    timezone TEXT NOT NULL DEFAULT 'UTC',
    bio TEXT,
    profile_image_path TEXT,
    email_verified INTEGER NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS refresh_tokens (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    token_hash TEXT NOT NULL UNIQUE,
    expires_at TEXT NOT NULL,
    revoked_at TEXT,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_refresh_tokens_teacher ON refresh_tokens(teacher_id);

  CREATE TABLE IF NOT EXISTS auth_tokens (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    purpose TEXT NOT NULL CHECK (purpose IN ('password_reset', 'email_verification')),
    token_hash TEXT NOT NULL UNIQUE,
    expires_at TEXT NOT NULL,
    used_at TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS students (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    first_name TEXT NOT NULL,
    last_name TEXT NOT NULL,
    date_of_birth TEXT,
    grade_level TEXT,
    email TEXT,
    notes TEXT,
    profile_image_path TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_students_teacher ON students(teacher_id, is_active);

  CREATE TABLE IF NOT EXISTS subjects (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    name TEXT NOT NULL COLLATE NOCASE,
    description TEXT,
    color TEXT,
    grade_level TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_subjects_active_name
    ON subjects(teacher_id, name) WHERE is_active = 1;

  CREATE TABLE IF NOT EXISTS event_types (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    name TEXT NOT NULL COLLATE NOCASE,
    color TEXT NOT NULL,
    icon TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (teacher_id, name)
  );

  CREATE TABLE IF NOT EXISTS events (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    description TEXT,
    location TEXT,
    event_type_id TEXT REFERENCES event_types(id) ON DELETE SET NULL,
    subject_id TEXT REFERENCES subjects(id) ON DELETE SET NULL,
    start_time TEXT NOT NULL,
    end_time TEXT NOT NULL,
    all_day INTEGER NOT NULL DEFAULT 0,
    timezone TEXT NOT NULL,
    recurrence_rule TEXT,
    parent_event_id TEXT REFERENCES events(id) ON DELETE CASCADE,
    original_start_time TEXT,
    is_cancelled INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_events_teacher_start ON events(teacher_id, start_time);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_events_exception_slot
    ON events(parent_event_id, original_start_time) WHERE parent_event_id IS NOT NULL;

  CREATE TABLE IF NOT EXISTS event_students (
    event_id TEXT NOT NULL REFERENCES events(id) ON DELETE CASCADE,
    student_id TEXT NOT NULL REFERENCES students(id) ON DELETE CASCADE,
    PRIMARY KEY (event_id, student_id)
  );

  CREATE TABLE IF NOT EXISTS attendance (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    event_id TEXT NOT NULL REFERENCES events(id) ON DELETE CASCADE,
    student_id TEXT NOT NULL REFERENCES students(id) ON DELETE CASCADE,
    occurrence_date TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('present', 'absent', 'excused', 'late')),
    notes TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (event_id, student_id, occurrence_date)
  );
  CREATE INDEX IF NOT EXISTS idx_attendance_student ON attendance(student_id, occurrence_date);

  CREATE TABLE IF NOT EXISTS assignments (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    student_id TEXT NOT NULL REFERENCES students(id) ON DELETE CASCADE,
    subject_id TEXT REFERENCES subjects(id) ON DELETE SET NULL,
    title TEXT NOT NULL,
    description TEXT,
    assigned_date TEXT NOT NULL,
    due_date TEXT,
    status TEXT NOT NULL DEFAULT 'assigned',
    max_score REAL,
    score REAL,
    grade TEXT,
    feedback TEXT,
    completed_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_assignments_teacher ON assignments(teacher_id, due_date);

  CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    description TEXT,
    due_date TEXT,
    priority TEXT NOT NULL DEFAULT 'medium',
    status TEXT NOT NULL DEFAULT 'pending',
    student_id TEXT REFERENCES students(id) ON DELETE SET NULL,
    completed_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS report_cards (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    student_id TEXT NOT NULL REFERENCES students(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    school_year TEXT NOT NULL,
    period_start TEXT,
    period_end TEXT,
    status TEXT NOT NULL DEFAULT 'draft',
    overall_comments TEXT,
    days_present INTEGER,
    days_absent INTEGER,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS report_card_entries (
    id TEXT PRIMARY KEY,
    report_card_id TEXT NOT NULL REFERENCES report_cards(id) ON DELETE CASCADE,
    subject_id TEXT REFERENCES subjects(id) ON DELETE SET NULL,
    subject_name TEXT NOT NULL,
    score REAL,
    grade TEXT,
    comments TEXT,
    sort_order INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS expense_categories (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    name TEXT NOT NULL COLLATE NOCASE,
    color TEXT,
    is_default INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (teacher_id, name)
  );

  CREATE TABLE IF NOT EXISTS expenses (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    amount_cents INTEGER NOT NULL,
    currency TEXT NOT NULL DEFAULT 'USD',
    description TEXT NOT NULL,
    expense_date TEXT NOT NULL,
    category_id TEXT REFERENCES expense_categories(id) ON DELETE SET NULL,
    student_id TEXT REFERENCES students(id) ON DELETE SET NULL,
    subject_id TEXT REFERENCES subjects(id) ON DELETE SET NULL,
    vendor TEXT,
    payment_method TEXT,
    is_tax_deductible INTEGER NOT NULL DEFAULT 0,
    notes TEXT,
    receipt_path TEXT,
    receipt_name TEXT,
    receipt_mime TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_expenses_teacher_date ON expenses(teacher_id, expense_date);

  CREATE TABLE IF NOT EXISTS lesson_plans (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    description TEXT,
    subject_id TEXT REFERENCES subjects(id) ON DELETE SET NULL,
    grade_level TEXT,
    duration_minutes INTEGER,
    objectives TEXT NOT NULL DEFAULT '[]',
    materials TEXT NOT NULL DEFAULT '[]',
    content TEXT,
    tags TEXT NOT NULL DEFAULT '[]',
    is_public INTEGER NOT NULL DEFAULT 0,
    copied_from_id TEXT REFERENCES lesson_plans(id) ON DELETE SET NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_lesson_plans_public ON lesson_plans(is_public);

  CREATE TABLE IF NOT EXISTS lesson_plan_shares (
    id TEXT PRIMARY KEY,
    lesson_plan_id TEXT NOT NULL REFERENCES lesson_plans(id) ON DELETE CASCADE,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    recipient_email TEXT NOT NULL COLLATE NOCASE,
    message TEXT,
    created_at TEXT NOT NULL,
    UNIQUE (lesson_plan_id, recipient_email)
  );

  CREATE VIRTUAL TABLE IF NOT EXISTS lesson_plans_fts USING fts5(
    title,
    description,
    content,
    tags,
    lesson_plan_id UNINDEXED
  );

  CREATE TRIGGER IF NOT EXISTS lesson_plans_fts_insert AFTER INSERT ON lesson_plans BEGIN
    INSERT INTO lesson_plans_fts (title, description, content, tags, lesson_plan_id)
    VALUES (new.title, coalesce(new.description, ''), coalesce(new.content, ''), new.tags, new.id);
  END;

  CREATE TRIGGER IF NOT EXISTS lesson_plans_fts_update AFTER UPDATE ON lesson_plans BEGIN
    DELETE FROM lesson_plans_fts WHERE lesson_plan_id = old.id;
    INSERT INTO lesson_plans_fts (title, description, content, tags, lesson_plan_id)
    VALUES (new.title, coalesce(new.description, ''), coalesce(new.content, ''), new.tags, new.id);
  END;

  CREATE TRIGGER IF NOT EXISTS lesson_plans_fts_delete AFTER DELETE ON lesson_plans BEGIN
    DELETE FROM lesson_plans_fts WHERE lesson_plan_id = old.id;
  END;

  CREATE TABLE IF NOT EXISTS attachments (
    id TEXT PRIMARY KEY,
    teacher_id TEXT NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
    assignment_id TEXT REFERENCES assignments(id) ON DELETE CASCADE,
    lesson_plan_id TEXT REFERENCES lesson_plans(id) ON DELETE CASCADE,
    file_name TEXT NOT NULL,
    mime_type TEXT NOT NULL,
    size_bytes INTEGER NOT NULL,
    storage_path TEXT NOT NULL,
    created_at TEXT NOT NULL,
    CHECK ((assignment_id IS NULL) != (lesson_plan_id IS NULL))
  );

  CREATE TABLE IF NOT EXISTS mail_outbox (
    id TEXT PRIMARY KEY,
    to_email TEXT NOT NULL,
    subject TEXT NOT NULL,
    template TEXT NOT NULL,
    body_text TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
`;

export type Db = Database.Database;

/**
 * SQLite database manager: connection, pragmas and schema
 */
export class HomeroomDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.initialize();
  }

  private initialize(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA);
  }

  getDb(): Database.Database {
    return this.db;
  }

  /**
   * Liveness probe for the health endpoint
   */
  ping(): boolean {
    const row = this.db.prepare<[], { ok: number }>("SELECT 1 AS ok").get();
    return row?.ok === 1;
  }

  close(): void {
    this.db.close();
  }
}
