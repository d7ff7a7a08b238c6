import type { FastifyInstance } from "fastify";
import { expenseCategorySchema, parseWith, updateExpenseCategorySchema } from "@homeroom/core";
import type { ExpenseCategory } from "../expenses/category-manager.js";
import { ok } from "../http/envelope.js";

function toResponse(category: ExpenseCategory) {
  return {
    id: category.id,
    name: category.name,
    color: category.color,
    is_default: category.isDefault,
    created_at: category.createdAt.toISOString(),
  };
}

export async function registerExpenseCategoryRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/expense-categories", async (request) => {
    return ok(fastify.expenseCategoryManager.list(request.teacherId).map(toResponse));
  });

  fastify.post("/expense-categories", async (request, reply) => {
    const input = parseWith(expenseCategorySchema, request.body);
    return reply.code(201).send(ok(toResponse(fastify.expenseCategoryManager.create(request.teacherId, input))));
  });

  fastify.get<{ Params: { id: string } }>("/expense-categories/:id", async (request) => {
    return ok(toResponse(fastify.expenseCategoryManager.get(request.teacherId, request.params.id)));
  });

  fastify.patch<{ Params: { id: string } }>("/expense-categories/:id", async (request) => {
    const input = parseWith(updateExpenseCategorySchema, request.body);
    return ok(toResponse(fastify.expenseCategoryManager.update(request.teacherId, request.params.id, input)));
  });

  // Expenses in the category keep their rows with no category
  fastify.delete<{ Params: { id: string } }>("/expense-categories/:id", async (request, reply) => {
    fastify.expenseCategoryManager.delete(request.teacherId, request.params.id);
    return reply.code(204).send();
  });
}
