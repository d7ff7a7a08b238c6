/**
 * Rate Limiting
 *
 * Fixed-window counters kept in process memory. Each route names its bucket in
 * `config.rateLimit`; the hook keys auth buckets by client IP and the others
 * by teacher (falling back to IP before authentication).
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { RateLimitBucket, RateLimitRule } from "@homeroom/core";
import { sendError } from "./errors.js";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Bucket for this route; false disables limiting. Defaults to "api". */
    rateLimit?: RateLimitBucket | false;
  }
}

interface WindowEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch milliseconds when the window resets */
  resetAt: number;
}

export class RateLimiter {
  private windows = new Map<string, WindowEntry>();
  private readonly rules: Record<RateLimitBucket, RateLimitRule>;
  private readonly now: () => number;

  constructor(rules: Record<RateLimitBucket, RateLimitRule>, clock: () => number = Date.now) {
    this.rules = rules;
    this.now = clock;
  }

  hit(bucket: RateLimitBucket, key: string): RateLimitResult {
    const rule = this.rules[bucket];
    const now = this.now();
    const storeKey = `${bucket}:${key}`;

    let entry = this.windows.get(storeKey);
    if (!entry || now >= entry.resetAt) {
      entry = { count: 0, resetAt: now + rule.windowSeconds * 1000 };
      this.windows.set(storeKey, entry);
    }

    if (entry.count >= rule.max) {
      return { allowed: false, limit: rule.max, remaining: 0, resetAt: entry.resetAt };
    }

    entry.count++;
    return {
      allowed: true,
      limit: rule.max,
      remaining: rule.max - entry.count,
      resetAt: entry.resetAt,
    };
  }

  /**
   * Drop expired windows so idle keys do not accumulate
   */
  sweep(): void {
    const now = this.now();
    for (const [key, entry] of this.windows) {
      if (now >= entry.resetAt) this.windows.delete(key);
    }
  }

  /** Whole seconds until `resetAt`, at least 1 */
  secondsUntil(resetAt: number): number {
    return Math.max(1, Math.ceil((resetAt - this.now()) / 1000));
  }

  reset(): void {
    this.windows.clear();
  }
}

function keyFor(bucket: RateLimitBucket, request: FastifyRequest): string {
  if (bucket === "auth" || bucket === "passwordReset") {
    return `ip:${request.ip}`;
  }
  return request.teacherId ? `teacher:${request.teacherId}` : `ip:${request.ip}`;
}

/**
 * Register the limiter as a preHandler on `fastify` and its children
 */
export function registerRateLimit(fastify: FastifyInstance, limiter: RateLimiter): void {
  fastify.addHook("preHandler", async (request: FastifyRequest, reply: FastifyReply) => {
    const bucket = request.routeOptions.config.rateLimit ?? "api";
    if (bucket === false) return;

    const result = limiter.hit(bucket, keyFor(bucket, request));
    const resetSeconds = Math.ceil(result.resetAt / 1000);
    reply.header("X-RateLimit-Limit", result.limit);
    reply.header("X-RateLimit-Remaining", result.remaining);
    reply.header("X-RateLimit-Reset", resetSeconds);

    if (!result.allowed) {
      reply.header("Retry-After", limiter.secondsUntil(result.resetAt));
      request.log.warn({ bucket, ip: request.ip }, "Rate limit exceeded");
      return sendError(reply, 429, {
        code: "RATE_LIMIT_EXCEEDED",
        message: "Too many requests, please try again later",
      });
    }
  });
}
