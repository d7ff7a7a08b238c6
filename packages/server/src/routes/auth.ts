/**
 * Auth API Routes
 *
 * Registration, login and token refresh are public and limited per client IP.
 * Logout, resending verification and `me` need an access token.
 */

import type { FastifyInstance } from "fastify";
import {
  forgotPasswordSchema,
  loginSchema,
  logoutSchema,
  parseWith,
  refreshSchema,
  registerSchema,
  resetPasswordSchema,
  verifyEmailSchema,
} from "@homeroom/core";
import type { AuthResult } from "../auth/auth-service.js";
import { ok } from "../http/envelope.js";
import { toTeacherResponse } from "./teachers.js";

function toTokenResponse(result: AuthResult) {
  return {
    access_token: result.accessToken,
    refresh_token: result.refreshToken,
    token_type: "Bearer",
    expires_in: result.expiresIn,
    teacher: toTeacherResponse(result.teacher),
  };
}

export async function registerPublicAuthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.post("/auth/register", { config: { rateLimit: "auth" } }, async (request, reply) => {
    const input = parseWith(registerSchema, request.body);
    const result = await fastify.authService.register(input);
    return reply.code(201).send(ok(toTokenResponse(result)));
  });

  fastify.post("/auth/login", { config: { rateLimit: "auth" } }, async (request) => {
    const input = parseWith(loginSchema, request.body);
    return ok(toTokenResponse(await fastify.authService.login(input.email, input.password)));
  });

  fastify.post("/auth/refresh", { config: { rateLimit: "auth" } }, async (request) => {
    const input = parseWith(refreshSchema, request.body);
    return ok(toTokenResponse(fastify.authService.refresh(input.refresh_token)));
  });

  fastify.post("/auth/password/forgot", { config: { rateLimit: "passwordReset" } }, async (request) => {
    const input = parseWith(forgotPasswordSchema, request.body);
    await fastify.authService.forgotPassword(input.email);
    // Same answer whether or not the account exists
    return ok({ message: "If the account exists, a reset link has been sent" });
  });

  fastify.post("/auth/password/reset", { config: { rateLimit: "passwordReset" } }, async (request) => {
    const input = parseWith(resetPasswordSchema, request.body);
    await fastify.authService.resetPassword(input.token, input.password);
    return ok({ message: "Password has been reset" });
  });

  fastify.post("/auth/email/verify", async (request) => {
    const input = parseWith(verifyEmailSchema, request.body);
    fastify.authService.verifyEmail(input.token);
    return ok({ email_verified: true });
  });
}

export async function registerAuthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.post("/auth/logout", async (request, reply) => {
    const input = parseWith(logoutSchema, request.body);
    fastify.authService.logout(request.teacherId, input.refresh_token, input.all_devices);
    return reply.code(204).send();
  });

  fastify.post("/auth/email/resend", async (request) => {
    await fastify.authService.resendVerification(request.teacherId);
    return ok({ message: "Verification email sent" });
  });

  fastify.get("/auth/me", async (request) => {
    return ok(toTeacherResponse(fastify.teacherManager.get(request.teacherId)));
  });
}
