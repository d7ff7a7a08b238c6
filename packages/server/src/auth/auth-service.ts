/**
 * Auth Service
 *
 * Registration, login, refresh-token rotation, logout, password reset and
 * email verification. Refresh tokens rotate on every use; presenting a
 * revoked one is treated as theft and revokes the whole family.
 */

import {
  ConflictError,
  InvalidCredentialsError,
  InvalidTokenError,
  generateOpaqueToken,
  hashPassword,
  verifyPassword,
  type AuthConfig,
  type Logger,
  type RegisterInput,
  type TokenService,
} from "@homeroom/core";
import type { Mailer, MailTemplates } from "../mail/mailer.js";
import type { Teacher, TeacherManager } from "../teachers/teacher-manager.js";
import type { TokenStore } from "./token-store.js";

export interface AuthResult {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
  teacher: Teacher;
}

export interface AuthServiceDeps {
  teachers: TeacherManager;
  tokens: TokenService;
  store: TokenStore;
  mailer: Mailer;
  templates: MailTemplates;
  config: AuthConfig;
  log: Logger;
  /** Called once for each new account (default event types, categories) */
  seedDefaults: (teacherId: string) => void;
}

export class AuthService {
  private deps: AuthServiceDeps;

  constructor(deps: AuthServiceDeps) {
    this.deps = deps;
  }

  async register(input: RegisterInput): Promise<AuthResult> {
    const { teachers, seedDefaults } = this.deps;
    const passwordHash = await hashPassword(input.password);
    const teacher = teachers.create({
      email: input.email,
      passwordHash,
      firstName: input.first_name,
      lastName: input.last_name,
      timezone: input.timezone,
    });
    seedDefaults(teacher.id);
    this.deps.log.info({ teacherId: teacher.id }, "Teacher registered");

    await this.sendVerification(teacher);
    return this.issue(teacher);
  }

  async login(email: string, password: string): Promise<AuthResult> {
    const { teachers } = this.deps;
    const teacher = teachers.findByEmail(email);
    const hash = teacher ? teachers.getPasswordHash(teacher.id) : null;
    if (!teacher || !hash || !(await verifyPassword(password, hash)) || !teacher.isActive) {
      throw new InvalidCredentialsError();
    }
    return this.issue(teacher);
  }

  refresh(refreshToken: string): AuthResult {
    const { tokens, store, teachers } = this.deps;
    const verified = tokens.verifyRefreshToken(refreshToken);
    const state = store.refreshTokenState(verified.jti, verified.teacherId);

    if (state === "revoked") {
      const revoked = store.revokeAllRefreshTokens(verified.teacherId);
      this.deps.log.warn({ teacherId: verified.teacherId, revoked }, "Refresh token reuse detected");
      throw new InvalidTokenError();
    }
    if (state !== "active") {
      throw new InvalidTokenError();
    }

    const teacher = teachers.findById(verified.teacherId);
    if (!teacher || !teacher.isActive) {
      throw new InvalidTokenError();
    }
    store.revokeRefreshToken(verified.jti);
    return this.issue(teacher);
  }

  /**
   * Revoke one refresh token (only if it belongs to the caller) or all of them
   */
  logout(teacherId: string, refreshToken: string | undefined, allDevices: boolean): void {
    const { tokens, store } = this.deps;
    if (allDevices) {
      store.revokeAllRefreshTokens(teacherId);
      return;
    }
    if (!refreshToken) return;
    const verified = tokens.verifyRefreshToken(refreshToken);
    if (verified.teacherId !== teacherId) {
      throw new InvalidTokenError();
    }
    store.revokeRefreshToken(verified.jti);
  }

  /** Always succeeds so callers cannot probe for accounts */
  async forgotPassword(email: string): Promise<void> {
    const { teachers, store, mailer, templates, config } = this.deps;
    const teacher = teachers.findByEmail(email);
    if (!teacher || !teacher.isActive) return;

    const token = generateOpaqueToken();
    store.issueAuthToken(teacher.id, "password_reset", token, config.passwordResetTtlSeconds);
    await mailer.send(templates.passwordReset(teacher.email, teacher.firstName, token));
  }

  async resetPassword(token: string, password: string): Promise<void> {
    const { teachers, store } = this.deps;
    const teacherId = store.consumeAuthToken("password_reset", token);
    if (!teacherId) throw new InvalidTokenError();

    teachers.setPasswordHash(teacherId, await hashPassword(password));
    store.revokeAllRefreshTokens(teacherId);
    this.deps.log.info({ teacherId }, "Password reset");
  }

  async changePassword(teacherId: string, currentPassword: string, newPassword: string): Promise<void> {
    const { teachers, store } = this.deps;
    const hash = teachers.getPasswordHash(teacherId);
    if (!hash || !(await verifyPassword(currentPassword, hash))) {
      throw new InvalidCredentialsError();
    }
    teachers.setPasswordHash(teacherId, await hashPassword(newPassword));
    store.revokeAllRefreshTokens(teacherId);
  }

  verifyEmail(token: string): void {
    const { teachers, store } = this.deps;
    const teacherId = store.consumeAuthToken("email_verification", token);
    if (!teacherId) throw new InvalidTokenError();
    teachers.markEmailVerified(teacherId);
  }

  async resendVerification(teacherId: string): Promise<void> {
    const teacher = this.deps.teachers.get(teacherId);
    if (teacher.emailVerified) {
      throw new ConflictError("Email is already verified");
    }
    await this.sendVerification(teacher);
  }

  async sendVerification(teacher: Teacher): Promise<void> {
    const { store, mailer, templates, config } = this.deps;
    const token = generateOpaqueToken();
    store.issueAuthToken(teacher.id, "email_verification", token, config.emailVerificationTtlSeconds);
    await mailer.send(templates.emailVerification(teacher.email, teacher.firstName, token));
  }

  /** Soft delete: deactivate and sign out everywhere */
  deactivate(teacherId: string): void {
    this.deps.teachers.deactivate(teacherId);
    this.deps.store.revokeAllRefreshTokens(teacherId);
  }

  private issue(teacher: Teacher): AuthResult {
    const { tokens, store } = this.deps;
    const jti = store.newRefreshId();
    const refresh = tokens.signRefreshToken(teacher.id, jti);
    store.saveRefreshToken(jti, teacher.id, refresh.expiresAt);
    const access = tokens.signAccessToken(teacher.id);
    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      expiresIn: tokens.accessTokenTtlSeconds,
      teacher,
    };
  }
}
