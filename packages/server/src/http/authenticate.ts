import type { FastifyInstance, FastifyRequest } from "fastify";
import { UnauthorizedError, type TokenService } from "@homeroom/core";

declare module "fastify" {
  interface FastifyRequest {
    /** Authenticated teacher; empty on public routes */
    teacherId: string;
  }
}

export interface AuthenticationDeps {
  tokens: TokenService;
  isActiveTeacher: (teacherId: string) => boolean;
}

export function bearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) return null;
  const match = /^Bearer\s+(\S+)$/i.exec(header);
  return match ? match[1] : null;
}

/**
 * Require a valid access token on every route of `fastify`
 */
export function registerAuthentication(fastify: FastifyInstance, deps: AuthenticationDeps): void {
  fastify.addHook("onRequest", async (request: FastifyRequest) => {
    const token = bearerToken(request);
    if (!token) {
      throw new UnauthorizedError();
    }
    const teacherId = deps.tokens.verifyAccessToken(token);
    if (!deps.isActiveTeacher(teacherId)) {
      throw new UnauthorizedError("Account is not active");
    }
    request.teacherId = teacherId;
  });
}
