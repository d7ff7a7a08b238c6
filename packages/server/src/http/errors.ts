/**
 * Error envelope
 *
 * Everything thrown by a route or hook ends up here. ApiErrors keep their
 * code and status; framework errors are mapped by status; anything else is an
 * opaque INTERNAL_ERROR.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { ApiError, internalErrorBody, type ErrorBody, type ErrorCode } from "@homeroom/core";

const FRAMEWORK_CODES: Record<number, ErrorCode> = {
  400: "VALIDATION_ERROR",
  401: "UNAUTHORIZED",
  403: "FORBIDDEN",
  404: "NOT_FOUND",
  409: "CONFLICT",
  413: "FILE_TOO_LARGE",
  415: "UNSUPPORTED_FILE_TYPE",
  429: "RATE_LIMIT_EXCEEDED",
};

function frameworkBody(error: FastifyError): { status: number; body: ErrorBody } | null {
  const status = error.statusCode;
  if (status === undefined || status >= 500) return null;
  const code = FRAMEWORK_CODES[status];
  if (!code) return null;
  const message =
    error.code === "FST_ERR_CTP_INVALID_JSON_BODY" || error instanceof SyntaxError
      ? "Malformed JSON body"
      : error.message;
  return { status, body: { code, message } };
}

export function sendError(reply: FastifyReply, status: number, body: ErrorBody): FastifyReply {
  return reply.code(status).send({ success: false, error: body });
}

export function registerErrorHandlers(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof ApiError) {
      return sendError(reply, error.statusCode, error.toBody());
    }

    const mapped = frameworkBody(error);
    if (mapped) {
      return sendError(reply, mapped.status, mapped.body);
    }

    request.log.error({ err: error }, "Unhandled error");
    return sendError(reply, 500, internalErrorBody());
  });

  fastify.setNotFoundHandler((request, reply) => {
    return sendError(reply, 404, {
      code: "NOT_FOUND",
      message: `Route ${request.method} ${request.url.split("?")[0]} not found`,
    });
  });
}
