import type { FastifyInstance } from "fastify";
import {
  NotFoundError,
  createExpenseSchema,
  expenseSummaryQuery,
  listExpensesQuery,
  parseQuery,
  parseWith,
  updateExpenseSchema,
} from "@homeroom/core";
import { type Expense, type ExpenseSummary, fromCents } from "../expenses/expense-manager.js";
import { ok } from "../http/envelope.js";
import { sendStoredFile } from "../http/files.js";
import { readUpload } from "../http/uploads.js";

function toResponse(expense: Expense) {
  return {
    id: expense.id,
    amount: fromCents(expense.amountCents),
    currency: expense.currency,
    description: expense.description,
    expense_date: expense.expenseDate,
    category_id: expense.categoryId,
    student_id: expense.studentId,
    subject_id: expense.subjectId,
    vendor: expense.vendor,
    payment_method: expense.paymentMethod,
    is_tax_deductible: expense.isTaxDeductible,
    notes: expense.notes,
    receipt_url: expense.receipt ? `/api/v1/expenses/${expense.id}/receipt` : null,
    receipt_file_name: expense.receipt?.fileName ?? null,
    created_at: expense.createdAt.toISOString(),
    updated_at: expense.updatedAt.toISOString(),
  };
}

function toSummaryResponse(summary: ExpenseSummary) {
  return {
    total: fromCents(summary.totalCents),
    count: summary.count,
    currency: summary.currency,
    groups: summary.groups.map((group) => ({
      key: group.key,
      label: group.label,
      total: fromCents(group.totalCents),
      count: group.count,
    })),
  };
}

export async function registerExpenseRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/expenses", async (request) => {
    const query = parseQuery(listExpensesQuery, request.query);
    const page = fastify.expenseManager.list(request.teacherId, query);
    return ok(page.items.map(toResponse), page.meta);
  });

  fastify.get("/expenses/summary", async (request) => {
    const query = parseQuery(expenseSummaryQuery, request.query);
    return ok(toSummaryResponse(fastify.expenseManager.summary(request.teacherId, query)));
  });

  fastify.post("/expenses", async (request, reply) => {
    const input = parseWith(createExpenseSchema, request.body);
    return reply.code(201).send(ok(toResponse(fastify.expenseManager.create(request.teacherId, input))));
  });

  fastify.get<{ Params: { id: string } }>("/expenses/:id", async (request) => {
    return ok(toResponse(fastify.expenseManager.get(request.teacherId, request.params.id)));
  });

  fastify.patch<{ Params: { id: string } }>("/expenses/:id", async (request) => {
    const input = parseWith(updateExpenseSchema, request.body);
    return ok(toResponse(fastify.expenseManager.update(request.teacherId, request.params.id, input)));
  });

  fastify.delete<{ Params: { id: string } }>("/expenses/:id", async (request, reply) => {
    const receiptPath = fastify.expenseManager.delete(request.teacherId, request.params.id);
    if (receiptPath) {
      await fastify.fileStore.remove(receiptPath);
    }
    return reply.code(204).send();
  });

  // ─── Receipt ───

  fastify.post<{ Params: { id: string } }>(
    "/expenses/:id/receipt",
    { config: { rateLimit: "uploads" } },
    async (request) => {
      const expense = fastify.expenseManager.get(request.teacherId, request.params.id);
      const upload = await readUpload(request, "receipts");
      const storedPath = await fastify.fileStore.save("receipts", request.teacherId, upload.extension, upload.buffer);
      const replaced = fastify.expenseManager.setReceipt(request.teacherId, expense.id, {
        path: storedPath,
        fileName: upload.fileName,
        mimeType: upload.mimeType,
      });
      if (replaced) {
        await fastify.fileStore.remove(replaced);
      }
      return ok(toResponse(fastify.expenseManager.get(request.teacherId, expense.id)));
    },
  );

  fastify.get<{ Params: { id: string } }>("/expenses/:id/receipt", async (request, reply) => {
    const expense = fastify.expenseManager.get(request.teacherId, request.params.id);
    if (!expense.receipt) {
      throw new NotFoundError("Receipt");
    }
    return sendStoredFile(reply, fastify.fileStore, expense.receipt);
  });

  fastify.delete<{ Params: { id: string } }>("/expenses/:id/receipt", async (request, reply) => {
    const removed = fastify.expenseManager.clearReceipt(request.teacherId, request.params.id);
    await fastify.fileStore.remove(removed);
    return reply.code(204).send();
  });
}
