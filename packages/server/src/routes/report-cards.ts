import type { FastifyInstance } from "fastify";
import {
  createEntrySchema,
  createReportCardSchema,
  listReportCardsQuery,
  parseQuery,
  parseWith,
  updateEntrySchema,
  updateReportCardSchema,
} from "@homeroom/core";
import { contentDisposition } from "../http/files.js";
import { ok } from "../http/envelope.js";
import { renderReportCardPdf, reportCardFileName } from "../report-cards/pdf.js";
import type { ReportCard, ReportCardEntry } from "../report-cards/report-card-manager.js";

function toEntryResponse(entry: ReportCardEntry) {
  return {
    id: entry.id,
    subject_id: entry.subjectId,
    subject_name: entry.subjectName,
    score: entry.score,
    grade: entry.grade,
    comments: entry.comments,
    sort_order: entry.sortOrder,
  };
}

function toResponse(card: ReportCard) {
  return {
    id: card.id,
    student_id: card.studentId,
    title: card.title,
    school_year: card.schoolYear,
    period_start: card.periodStart,
    period_end: card.periodEnd,
    status: card.status,
    overall_comments: card.overallComments,
    days_present: card.daysPresent,
    days_absent: card.daysAbsent,
    entries: card.entries.map(toEntryResponse),
    average_score: card.averageScore,
    overall_grade: card.overallGrade,
    created_at: card.createdAt.toISOString(),
    updated_at: card.updatedAt.toISOString(),
  };
}

export async function registerReportCardRoutes(fastify: FastifyInstance): Promise<void> {
  const cards = () => fastify.reportCardManager;

  fastify.get("/report-cards", async (request) => {
    const query = parseQuery(listReportCardsQuery, request.query);
    const page = cards().list(request.teacherId, query);
    return ok(page.items.map(toResponse), page.meta);
  });

  fastify.post("/report-cards", async (request, reply) => {
    const input = parseWith(createReportCardSchema, request.body);
    return reply.code(201).send(ok(toResponse(cards().create(request.teacherId, input))));
  });

  fastify.get<{ Params: { id: string } }>("/report-cards/:id", async (request) => {
    return ok(toResponse(cards().get(request.teacherId, request.params.id)));
  });

  fastify.patch<{ Params: { id: string } }>("/report-cards/:id", async (request) => {
    const input = parseWith(updateReportCardSchema, request.body);
    return ok(toResponse(cards().update(request.teacherId, request.params.id, input)));
  });

  fastify.delete<{ Params: { id: string } }>("/report-cards/:id", async (request, reply) => {
    cards().delete(request.teacherId, request.params.id);
    return reply.code(204).send();
  });

  // ─── Entries ───

  fastify.post<{ Params: { id: string } }>("/report-cards/:id/entries", async (request, reply) => {
    const input = parseWith(createEntrySchema, request.body);
    return reply.code(201).send(ok(toResponse(cards().addEntry(request.teacherId, request.params.id, input))));
  });

  fastify.patch<{ Params: { id: string; entryId: string } }>(
    "/report-cards/:id/entries/:entryId",
    async (request) => {
      const input = parseWith(updateEntrySchema, request.body);
      const card = cards().updateEntry(request.teacherId, request.params.id, request.params.entryId, input);
      return ok(toResponse(card));
    },
  );

  fastify.delete<{ Params: { id: string; entryId: string } }>(
    "/report-cards/:id/entries/:entryId",
    async (request, reply) => {
      cards().deleteEntry(request.teacherId, request.params.id, request.params.entryId);
      return reply.code(204).send();
    },
  );

  // ─── Attendance and PDF ───

  fastify.post<{ Params: { id: string } }>("/report-cards/:id/attendance/sync", async (request) => {
    const card = cards().syncAttendance(request.teacherId, request.params.id, (studentId, from, to) =>
      fastify.attendanceManager.countDays(studentId, from, to),
    );
    return ok(toResponse(card));
  });

  fastify.get<{ Params: { id: string } }>("/report-cards/:id/pdf", async (request, reply) => {
    const card = cards().get(request.teacherId, request.params.id);
    const student = fastify.studentManager.get(request.teacherId, card.studentId);
    const teacher = fastify.teacherManager.get(request.teacherId);
    const studentName = `${student.firstName} ${student.lastName}`;

    const pdf = renderReportCardPdf(card, {
      studentName,
      teacherName: `${teacher.firstName} ${teacher.lastName}`,
      generatedAt: new Date(),
    });
    return reply
      .type("application/pdf")
      .header("Content-Disposition", contentDisposition(reportCardFileName(studentName, card.title)))
      .send(pdf);
  });
}
