/**
 * Outgoing mail
 *
 * Messages are handed to a Mailer. The default OutboxMailer logs each message
 * and appends it to the mail_outbox table for a delivery worker to pick up.
 */

import { ulid } from "ulid";
import type { Logger } from "@homeroom/core";
import type { Db } from "../db/database.js";

export type MailTemplate = "email-verification" | "password-reset" | "lesson-plan-shared";

export interface MailMessage {
  to: string;
  subject: string;
  template: MailTemplate;
  text: string;
}

export interface Mailer {
  send(message: MailMessage): Promise<void>;
}

export class OutboxMailer implements Mailer {
  private db: Db;
  private log: Logger;

  constructor(db: Db, log: Logger) {
    this.db = db;
    this.log = log;
  }

  async send(message: MailMessage): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO mail_outbox (id, to_email, subject, template, body_text, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(`mail-${ulid()}`, message.to, message.subject, message.template, message.text, new Date().toISOString());
    this.log.info({ to: message.to, template: message.template }, "Queued outgoing mail");
  }
}

/**
 * Builds the messages the API sends
 */
export class MailTemplates {
  private publicUrl: string;

  constructor(publicUrl: string) {
    this.publicUrl = publicUrl.replace(/\/+$/, "");
  }

  emailVerification(to: string, firstName: string, token: string): MailMessage {
    return {
      to,
      subject: "Verify your email address",
      template: "email-verification",
      text: [
        `Hi ${firstName},`,
        "",
        "Confirm your email address by opening this link:",
        `${this.publicUrl}/verify-email?token=${encodeURIComponent(token)}`,
        "",
        "The link expires in 24 hours.",
      ].join("\n"),
    };
  }

  passwordReset(to: string, firstName: string, token: string): MailMessage {
    return {
      to,
      subject: "Reset your password",
      template: "password-reset",
      text: [
        `Hi ${firstName},`,
        "",
        "Someone asked to reset the password for this account. If it was you, open:",
        `${this.publicUrl}/reset-password?token=${encodeURIComponent(token)}`,
        "",
        "The link expires in one hour. If you did not ask for this, ignore this email.",
      ].join("\n"),
    };
  }

  lessonPlanShared(to: string, senderName: string, planTitle: string, planId: string, note: string | null): MailMessage {
    const lines = [
      `${senderName} shared the lesson plan "${planTitle}" with you.`,
      "",
      `${this.publicUrl}/lesson-plans/${planId}`,
    ];
    if (note) lines.push("", "Message:", note);
    return {
      to,
      subject: `${senderName} shared a lesson plan with you`,
      template: "lesson-plan-shared",
      text: lines.join("\n"),
    };
  }
}
