import type { FastifyInstance } from "fastify";
import { ServiceUnavailableError } from "@homeroom/core";
import { ok } from "../http/envelope.js";

export interface HealthOptions {
  version: string;
  startedAt: number;
}

/**
 * Liveness and database check. Public and never rate-limited.
 */
export async function registerHealthRoutes(fastify: FastifyInstance, options: HealthOptions): Promise<void> {
  fastify.get("/health", { config: { rateLimit: false } }, async (request) => {
    let databaseOk = false;
    try {
      databaseOk = fastify.database.ping();
    } catch (err) {
      request.log.error({ err }, "Database ping failed");
    }
    if (!databaseOk) {
      throw new ServiceUnavailableError("Database is unavailable");
    }

    return ok({
      status: "ok",
      version: options.version,
      uptime_seconds: Math.floor((Date.now() - options.startedAt) / 1000),
      database: "ok",
    });
  });
}
