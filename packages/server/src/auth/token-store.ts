/**
 * Persistence for refresh tokens and single-use auth tokens.
 * Only SHA-256 hashes of token secrets are stored.
 */

import { ulid } from "ulid";
import { generateOpaqueToken, hashToken } from "@homeroom/core";
import type { Db } from "../db/database.js";

export type AuthTokenPurpose = "password_reset" | "email_verification";

interface RefreshTokenRow {
  id: string;
  teacher_id: string;
  expires_at: string;
  revoked_at: string | null;
}

export type RefreshTokenState = "active" | "revoked" | "expired" | "unknown";

export class TokenStore {
  private db: Db;
  private now: () => number;

  constructor(db: Db, clock: () => number = Date.now) {
    this.db = db;
    this.now = clock;
  }

  /** Random jti for a new refresh token */
  newRefreshId(): string {
    return generateOpaqueToken();
  }

  saveRefreshToken(jti: string, teacherId: string, expiresAt: Date): void {
    this.db
      .prepare(
        `INSERT INTO refresh_tokens (id, teacher_id, token_hash, expires_at, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(`rtk-${ulid()}`, teacherId, hashToken(jti), expiresAt.toISOString(), new Date(this.now()).toISOString());
  }

  refreshTokenState(jti: string, teacherId: string): RefreshTokenState {
    const row = this.db
      .prepare<[string], RefreshTokenRow>(
        "SELECT id, teacher_id, expires_at, revoked_at FROM refresh_tokens WHERE token_hash = ?",
      )
      .get(hashToken(jti));
    if (!row || row.teacher_id !== teacherId) return "unknown";
    if (row.revoked_at) return "revoked";
    if (new Date(row.expires_at).getTime() <= this.now()) return "expired";
    return "active";
  }

  /** Returns false when the token was already revoked */
  revokeRefreshToken(jti: string): boolean {
    const result = this.db
      .prepare("UPDATE refresh_tokens SET revoked_at = ? WHERE token_hash = ? AND revoked_at IS NULL")
      .run(new Date(this.now()).toISOString(), hashToken(jti));
    return result.changes > 0;
  }

  revokeAllRefreshTokens(teacherId: string): number {
    const result = this.db
      .prepare("UPDATE refresh_tokens SET revoked_at = ? WHERE teacher_id = ? AND revoked_at IS NULL")
      .run(new Date(this.now()).toISOString(), teacherId);
    return result.changes;
  }

  /**
   * Store a single-use token. Earlier unused tokens for the same purpose are
   * invalidated so only the latest link works.
   */
  issueAuthToken(teacherId: string, purpose: AuthTokenPurpose, token: string, ttlSeconds: number): void {
    const now = this.now();
    const insert = this.db.transaction(() => {
      this.db
        .prepare("UPDATE auth_tokens SET used_at = ? WHERE teacher_id = ? AND purpose = ? AND used_at IS NULL")
        .run(new Date(now).toISOString(), teacherId, purpose);
      this.db
        .prepare(
          `INSERT INTO auth_tokens (id, teacher_id, purpose, token_hash, expires_at, created_at)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          `atk-${ulid()}`,
          teacherId,
          purpose,
          hashToken(token),
          new Date(now + ttlSeconds * 1000).toISOString(),
          new Date(now).toISOString(),
        );
    });
    insert();
  }

  /**
   * Mark a single-use token as used and return its teacher, or null when it is
   * unknown, used or expired.
   */
  consumeAuthToken(purpose: AuthTokenPurpose, token: string): string | null {
    const row = this.db
      .prepare<[string, AuthTokenPurpose], { id: string; teacher_id: string; expires_at: string; used_at: string | null }>(
        "SELECT id, teacher_id, expires_at, used_at FROM auth_tokens WHERE token_hash = ? AND purpose = ?",
      )
      .get(hashToken(token), purpose);
    if (!row || row.used_at || new Date(row.expires_at).getTime() <= this.now()) {
      return null;
    }
    this.db.prepare("UPDATE auth_tokens SET used_at = ? WHERE id = ?").run(new Date(this.now()).toISOString(), row.id);
    return row.teacher_id;
  }
}
