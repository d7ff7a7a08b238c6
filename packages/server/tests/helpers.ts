/**
 * Shared fixtures for the API tests: a server on a temp data dir, a mailer
 * that keeps what it sends, and small request builders.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { FastifyInstance, LightMyRequestResponse } from "fastify";
import {
  DEFAULT_RATE_LIMITS,
  createLogger,
  loadConfig,
  type HomeroomConfig,
  type RateLimitBucket,
  type RateLimitRule,
} from "@homeroom/core";
import type { MailMessage, MailTemplate, Mailer } from "../src/mail/mailer.js";
import { createServer } from "../src/server.js";

export const PASSWORD = "password123";

export class CapturingMailer implements Mailer {
  sent: MailMessage[] = [];

  async send(message: MailMessage): Promise<void> {
    this.sent.push(message);
  }

  /** Token from the link in the latest `template` mail to `to` */
  tokenFor(template: MailTemplate, to: string): string {
    const message = [...this.sent].reverse().find((m) => m.template === template && m.to === to);
    const match = message ? /token=(\S+)/.exec(message.text) : null;
    if (!match) {
      throw new Error(`No ${template} mail to ${to}`);
    }
    return decodeURIComponent(match[1]);
  }
}

export interface TestApp {
  app: FastifyInstance;
  mailer: CapturingMailer;
  config: HomeroomConfig;
  close(): Promise<void>;
}

export interface TestAppOptions {
  rateLimits?: Partial<Record<RateLimitBucket, RateLimitRule>>;
}

export async function createTestApp(options: TestAppOptions = {}): Promise<TestApp> {
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "homeroom-test-"));
  const loaded = loadConfig({ dataDir, env: { HOMEROOM_JWT_SECRET: "test-secret" } });
  const config: HomeroomConfig = {
    ...loaded,
    // Every test registers from the same address
    rateLimits: {
      ...DEFAULT_RATE_LIMITS,
      auth: { max: 100, windowSeconds: 900 },
      passwordReset: { max: 100, windowSeconds: 3600 },
      ...options.rateLimits,
    },
  };
  const mailer = new CapturingMailer();
  const app = await createServer({
    config,
    mailer,
    logger: createLogger({ level: "silent", pretty: false }),
  });

  return {
    app,
    mailer,
    config,
    async close() {
      await app.close();
      fs.rmSync(dataDir, { recursive: true, force: true });
    },
  };
}

export interface SignedIn {
  teacherId: string;
  email: string;
  accessToken: string;
  refreshToken: string;
  headers: { authorization: string };
}

let counter = 0;

export async function registerTeacher(
  app: FastifyInstance,
  overrides: { email?: string; first_name?: string; last_name?: string; timezone?: string } = {},
): Promise<SignedIn> {
  counter++;
  const response = await app.inject({
    method: "POST",
    url: "/api/v1/auth/register",
    payload: {
      email: overrides.email ?? `teacher${counter}@example.com`,
      password: PASSWORD,
      first_name: overrides.first_name ?? "Test",
      last_name: overrides.last_name ?? `Teacher${counter}`,
      ...(overrides.timezone ? { timezone: overrides.timezone } : {}),
    },
  });
  if (response.statusCode !== 201) {
    throw new Error(`Registration failed: ${response.statusCode} ${response.body}`);
  }
  const { data } = response.json();
  return {
    teacherId: data.teacher.id,
    email: data.teacher.email,
    accessToken: data.access_token,
    refreshToken: data.refresh_token,
    headers: { authorization: `Bearer ${data.access_token}` },
  };
}

/** Single-file multipart/form-data body */
export function multipart(
  fileName: string,
  mimeType: string,
  content: string | Buffer,
  field = "file",
): { payload: Buffer; headers: Record<string, string> } {
  const boundary = "----homeroom-test-boundary";
  const payload = Buffer.concat([
    Buffer.from(
      `--${boundary}\r\n` +
        `Content-Disposition: form-data; name="${field}"; filename="${fileName}"\r\n` +
        `Content-Type: ${mimeType}\r\n\r\n`,
    ),
    typeof content === "string" ? Buffer.from(content) : content,
    Buffer.from(`\r\n--${boundary}--\r\n`),
  ]);
  return { payload, headers: { "content-type": `multipart/form-data; boundary=${boundary}` } };
}

/** Smallest valid PNG: one transparent pixel */
export const PNG_PIXEL = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==",
  "base64",
);

export function errorCode(response: LightMyRequestResponse): string {
  return response.json().error.code;
}
