import type { FastifyInstance } from "fastify";
import { DateTime } from "luxon";
import {
  createAssignmentSchema,
  listAssignmentsQuery,
  parseQuery,
  parseWith,
  updateAssignmentSchema,
} from "@homeroom/core";
import type { Assignment } from "../assignments/assignment-manager.js";
import { ok } from "../http/envelope.js";
import { registerAttachmentRoutes, toAttachmentResponse } from "./attachments.js";

function toResponse(assignment: Assignment) {
  return {
    id: assignment.id,
    student_id: assignment.studentId,
    subject_id: assignment.subjectId,
    title: assignment.title,
    description: assignment.description,
    assigned_date: assignment.assignedDate,
    due_date: assignment.dueDate,
    status: assignment.status,
    max_score: assignment.maxScore,
    score: assignment.score,
    grade: assignment.grade,
    feedback: assignment.feedback,
    completed_at: assignment.completedAt?.toISOString() ?? null,
    attachments: assignment.attachments.map((a) => toAttachmentResponse("/assignments", assignment.id, a)),
    created_at: assignment.createdAt.toISOString(),
    updated_at: assignment.updatedAt.toISOString(),
  };
}

export async function registerAssignmentRoutes(fastify: FastifyInstance): Promise<void> {
  // Due dates and the assigned_date default follow the teacher's calendar day
  const today = (teacherId: string): string => {
    const zone = fastify.teacherManager.get(teacherId).timezone;
    return DateTime.now().setZone(zone).toISODate() ?? DateTime.utc().toFormat("yyyy-MM-dd");
  };

  fastify.get("/assignments", async (request) => {
    const query = parseQuery(listAssignmentsQuery, request.query);
    const page = fastify.assignmentManager.list(request.teacherId, query, today(request.teacherId));
    return ok(page.items.map(toResponse), page.meta);
  });

  fastify.post("/assignments", async (request, reply) => {
    const input = parseWith(createAssignmentSchema, request.body);
    const assignment = fastify.assignmentManager.create(request.teacherId, input, today(request.teacherId));
    return reply.code(201).send(ok(toResponse(assignment)));
  });

  fastify.get<{ Params: { id: string } }>("/assignments/:id", async (request) => {
    return ok(toResponse(fastify.assignmentManager.get(request.teacherId, request.params.id)));
  });

  fastify.patch<{ Params: { id: string } }>("/assignments/:id", async (request) => {
    const input = parseWith(updateAssignmentSchema, request.body);
    return ok(toResponse(fastify.assignmentManager.update(request.teacherId, request.params.id, input)));
  });

  fastify.delete<{ Params: { id: string } }>("/assignments/:id", async (request, reply) => {
    const files = fastify.assignmentManager.delete(request.teacherId, request.params.id);
    await fastify.fileStore.removeAll(files);
    return reply.code(204).send();
  });

  await registerAttachmentRoutes(fastify, {
    collection: "/assignments",
    ownerFor: (request, id) => {
      const assignment = fastify.assignmentManager.get(request.teacherId, id);
      return { kind: "assignment", id: assignment.id };
    },
  });
}
