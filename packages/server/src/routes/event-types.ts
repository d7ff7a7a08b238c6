import type { FastifyInstance } from "fastify";
import { eventTypeSchema, parseWith, updateEventTypeSchema } from "@homeroom/core";
import type { EventType } from "../calendar/event-type-manager.js";
import { ok } from "../http/envelope.js";

function toResponse(type: EventType) {
  return {
    id: type.id,
    name: type.name,
    color: type.color,
    icon: type.icon,
    created_at: type.createdAt.toISOString(),
    updated_at: type.updatedAt.toISOString(),
  };
}

export async function registerEventTypeRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/event-types", async (request) => {
    return ok(fastify.eventTypeManager.list(request.teacherId).map(toResponse));
  });

  fastify.post("/event-types", async (request, reply) => {
    const input = parseWith(eventTypeSchema, request.body);
    return reply.code(201).send(ok(toResponse(fastify.eventTypeManager.create(request.teacherId, input))));
  });

  fastify.get<{ Params: { id: string } }>("/event-types/:id", async (request) => {
    return ok(toResponse(fastify.eventTypeManager.get(request.teacherId, request.params.id)));
  });

  fastify.patch<{ Params: { id: string } }>("/event-types/:id", async (request) => {
    const input = parseWith(updateEventTypeSchema, request.body);
    return ok(toResponse(fastify.eventTypeManager.update(request.teacherId, request.params.id, input)));
  });

  fastify.delete<{ Params: { id: string } }>("/event-types/:id", async (request, reply) => {
    fastify.eventTypeManager.delete(request.teacherId, request.params.id);
    return reply.code(204).send();
  });
}
