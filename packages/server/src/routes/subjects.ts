import type { FastifyInstance } from "fastify";
import {
  createSubjectSchema,
  listSubjectsQuery,
  parseQuery,
  parseWith,
  permanentQuery,
  updateSubjectSchema,
} from "@homeroom/core";
import { ok } from "../http/envelope.js";
import type { Subject } from "../subjects/subject-manager.js";

function toResponse(subject: Subject) {
  return {
    id: subject.id,
    teacher_id: subject.teacherId,
    name: subject.name,
    description: subject.description,
    color: subject.color,
    grade_level: subject.gradeLevel,
    is_active: subject.isActive,
    created_at: subject.createdAt.toISOString(),
    updated_at: subject.updatedAt.toISOString(),
  };
}

export async function registerSubjectRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/subjects", async (request) => {
    const query = parseQuery(listSubjectsQuery, request.query);
    const page = fastify.subjectManager.list(request.teacherId, query);
    return ok(page.items.map(toResponse), page.meta);
  });

  fastify.post("/subjects", async (request, reply) => {
    const input = parseWith(createSubjectSchema, request.body);
    return reply.code(201).send(ok(toResponse(fastify.subjectManager.create(request.teacherId, input))));
  });

  fastify.get<{ Params: { id: string } }>("/subjects/:id", async (request) => {
    return ok(toResponse(fastify.subjectManager.get(request.teacherId, request.params.id)));
  });

  fastify.patch<{ Params: { id: string } }>("/subjects/:id", async (request) => {
    const input = parseWith(updateSubjectSchema, request.body);
    return ok(toResponse(fastify.subjectManager.update(request.teacherId, request.params.id, input)));
  });

  fastify.delete<{ Params: { id: string } }>("/subjects/:id", async (request, reply) => {
    const { permanent } = parseQuery(permanentQuery, request.query);
    if (!permanent) {
      return ok(toResponse(fastify.subjectManager.deactivate(request.teacherId, request.params.id)));
    }
    fastify.subjectManager.deletePermanently(request.teacherId, request.params.id);
    return reply.code(204).send();
  });
}
