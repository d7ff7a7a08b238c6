/**
 * Task API Routes
 *
 * The teacher's to-do list. `status` filters take a comma list
 * (`?status=pending,in_progress`).
 */

import type { FastifyInstance } from "fastify";
import { createTaskSchema, listTasksQuery, parseQuery, parseWith, updateTaskSchema } from "@homeroom/core";
import { ok } from "../http/envelope.js";
import type { Task } from "../tasks/task-manager.js";

function toResponse(task: Task) {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    due_date: task.dueDate,
    priority: task.priority,
    status: task.status,
    student_id: task.studentId,
    completed_at: task.completedAt?.toISOString() ?? null,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString(),
  };
}

export async function registerTaskRoutes(fastify: FastifyInstance): Promise<void> {
  // ═══════════════════════════════════════════════════════════════════════════
  // Read Operations
  // ═══════════════════════════════════════════════════════════════════════════

  fastify.get("/tasks", async (request) => {
    const query = parseQuery(listTasksQuery, request.query);
    const page = fastify.taskManager.list(request.teacherId, query);
    return ok(page.items.map(toResponse), page.meta);
  });

  fastify.get<{ Params: { id: string } }>("/tasks/:id", async (request) => {
    return ok(toResponse(fastify.taskManager.get(request.teacherId, request.params.id)));
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Write Operations
  // ═══════════════════════════════════════════════════════════════════════════

  fastify.post("/tasks", async (request, reply) => {
    const input = parseWith(createTaskSchema, request.body);
    return reply.code(201).send(ok(toResponse(fastify.taskManager.create(request.teacherId, input))));
  });

  fastify.patch<{ Params: { id: string } }>("/tasks/:id", async (request) => {
    const input = parseWith(updateTaskSchema, request.body);
    return ok(toResponse(fastify.taskManager.update(request.teacherId, request.params.id, input)));
  });

  fastify.post<{ Params: { id: string } }>("/tasks/:id/complete", async (request) => {
    return ok(toResponse(fastify.taskManager.complete(request.teacherId, request.params.id)));
  });

  fastify.delete<{ Params: { id: string } }>("/tasks/:id", async (request, reply) => {
    fastify.taskManager.delete(request.teacherId, request.params.id);
    return reply.code(204).send();
  });
}
