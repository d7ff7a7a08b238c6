/**
 * File attachments on assignments and lesson plans.
 * Rows hold metadata only; bytes live in the FileStore.
 */

import { ulid } from "ulid";
import { NotFoundError } from "@homeroom/core";
import type { Db } from "../db/database.js";
import { nowIso } from "../db/helpers.js";

export type AttachmentOwner = { kind: "assignment"; id: string } | { kind: "lesson_plan"; id: string };

export interface Attachment {
  id: string;
  fileName: string;
  mimeType: string;
  sizeBytes: number;
  storagePath: string;
  createdAt: Date;
}

export interface NewAttachment {
  fileName: string;
  mimeType: string;
  sizeBytes: number;
  storagePath: string;
}

interface AttachmentRow {
  id: string;
  file_name: string;
  mime_type: string;
  size_bytes: number;
  storage_path: string;
  created_at: string;
}

function ownerColumn(owner: AttachmentOwner): "assignment_id" | "lesson_plan_id" {
  return owner.kind === "assignment" ? "assignment_id" : "lesson_plan_id";
}

function rowToAttachment(row: AttachmentRow): Attachment {
  return {
    id: row.id,
    fileName: row.file_name,
    mimeType: row.mime_type,
    sizeBytes: row.size_bytes,
    storagePath: row.storage_path,
    createdAt: new Date(row.created_at),
  };
}

export class AttachmentManager {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  list(owner: AttachmentOwner): Attachment[] {
    return this.db
      .prepare<[string], AttachmentRow>(
        `SELECT * FROM attachments WHERE ${ownerColumn(owner)} = ? ORDER BY created_at, id`,
      )
      .all(owner.id)
      .map(rowToAttachment);
  }

  get(owner: AttachmentOwner, attachmentId: string): Attachment {
    const row = this.db
      .prepare<[string, string], AttachmentRow>(
        `SELECT * FROM attachments WHERE id = ? AND ${ownerColumn(owner)} = ?`,
      )
      .get(attachmentId, owner.id);
    if (!row) throw new NotFoundError("Attachment");
    return rowToAttachment(row);
  }

  add(teacherId: string, owner: AttachmentOwner, file: NewAttachment): Attachment {
    const id = `fil-${ulid()}`;
    this.db
      .prepare(
        `INSERT INTO attachments (id, teacher_id, assignment_id, lesson_plan_id, file_name, mime_type, size_bytes, storage_path, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        teacherId,
        owner.kind === "assignment" ? owner.id : null,
        owner.kind === "lesson_plan" ? owner.id : null,
        file.fileName,
        file.mimeType,
        file.sizeBytes,
        file.storagePath,
        nowIso(),
      );
    return this.get(owner, id);
  }

  /**
   * Delete the row; returns the stored path for the caller to remove
   */
  remove(owner: AttachmentOwner, attachmentId: string): string {
    const attachment = this.get(owner, attachmentId);
    this.db.prepare("DELETE FROM attachments WHERE id = ?").run(attachment.id);
    return attachment.storagePath;
  }

  storagePaths(owner: AttachmentOwner): string[] {
    return this.list(owner).map((a) => a.storagePath);
  }
}
