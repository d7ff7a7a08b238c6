/**
 * Lesson Plan API Routes
 *
 * Own plans, the public library, plans shared with the caller, copying and
 * sharing. Visibility decides 404 vs 403: a plan the caller cannot see does
 * not exist for them; one they can see but do not own is forbidden to change.
 */

import type { FastifyInstance, FastifyRequest } from "fastify";
import {
  createLessonPlanSchema,
  listLessonPlansQuery,
  pageOnlyQuery,
  parseQuery,
  parseWith,
  publicLessonPlansQuery,
  shareLessonPlanSchema,
  updateLessonPlanSchema,
} from "@homeroom/core";
import { ok } from "../http/envelope.js";
import type { LessonPlan, LessonPlanShare, Viewer } from "../lesson-plans/lesson-plan-manager.js";
import { registerAttachmentRoutes, toAttachmentResponse } from "./attachments.js";

function toResponse(plan: LessonPlan) {
  return {
    id: plan.id,
    teacher_id: plan.teacherId,
    author: {
      id: plan.author.id,
      first_name: plan.author.firstName,
      last_name: plan.author.lastName,
    },
    title: plan.title,
    description: plan.description,
    subject_id: plan.subjectId,
    grade_level: plan.gradeLevel,
    duration_minutes: plan.durationMinutes,
    objectives: plan.objectives,
    materials: plan.materials,
    content: plan.content,
    tags: plan.tags,
    is_public: plan.isPublic,
    copied_from_id: plan.copiedFromId,
    attachments: plan.attachments.map((a) => toAttachmentResponse("/lesson-plans", plan.id, a)),
    created_at: plan.createdAt.toISOString(),
    updated_at: plan.updatedAt.toISOString(),
  };
}

function toShareResponse(share: LessonPlanShare) {
  return {
    id: share.id,
    lesson_plan_id: share.lessonPlanId,
    email: share.recipientEmail,
    message: share.message,
    created_at: share.createdAt.toISOString(),
  };
}

export async function registerLessonPlanRoutes(fastify: FastifyInstance): Promise<void> {
  const plans = () => fastify.lessonPlanManager;

  const viewerOf = (request: FastifyRequest): Viewer => {
    const teacher = fastify.teacherManager.get(request.teacherId);
    return { id: teacher.id, email: teacher.email };
  };

  // ─── Lists ───

  fastify.get("/lesson-plans", async (request) => {
    const query = parseQuery(listLessonPlansQuery, request.query);
    const page = plans().listOwn(request.teacherId, query);
    return ok(page.items.map(toResponse), page.meta);
  });

  fastify.get("/lesson-plans/public", async (request) => {
    const query = parseQuery(publicLessonPlansQuery, request.query);
    const page = plans().listPublic(query);
    return ok(page.items.map(toResponse), page.meta);
  });

  fastify.get("/lesson-plans/shared", async (request) => {
    const query = parseQuery(pageOnlyQuery, request.query);
    const page = plans().listShared(viewerOf(request), query);
    return ok(page.items.map(toResponse), page.meta);
  });

  // ─── Single plan ───

  fastify.post("/lesson-plans", async (request, reply) => {
    const input = parseWith(createLessonPlanSchema, request.body);
    return reply.code(201).send(ok(toResponse(plans().create(request.teacherId, input))));
  });

  fastify.get<{ Params: { id: string } }>("/lesson-plans/:id", async (request) => {
    return ok(toResponse(plans().getVisible(viewerOf(request), request.params.id)));
  });

  fastify.patch<{ Params: { id: string } }>("/lesson-plans/:id", async (request) => {
    const input = parseWith(updateLessonPlanSchema, request.body);
    return ok(toResponse(plans().update(viewerOf(request), request.params.id, input)));
  });

  fastify.delete<{ Params: { id: string } }>("/lesson-plans/:id", async (request, reply) => {
    const files = plans().delete(viewerOf(request), request.params.id);
    await fastify.fileStore.removeAll(files);
    return reply.code(204).send();
  });

  fastify.post<{ Params: { id: string } }>("/lesson-plans/:id/copy", async (request, reply) => {
    const viewer = viewerOf(request);
    const copy = await plans().copy(viewer, request.params.id, (storagePath) =>
      fastify.fileStore.copy(storagePath, "attachments", viewer.id),
    );
    return reply.code(201).send(ok(toResponse(copy)));
  });

  // ─── Sharing ───

  fastify.post<{ Params: { id: string } }>("/lesson-plans/:id/share", async (request, reply) => {
    const input = parseWith(shareLessonPlanSchema, request.body);
    const sender = fastify.teacherManager.get(request.teacherId);
    const viewer = { id: sender.id, email: sender.email };
    const { share, created } = plans().share(viewer, request.params.id, input);
    const plan = plans().getOwned(viewer, request.params.id);

    await fastify.mailer.send(
      fastify.mailTemplates.lessonPlanShared(
        share.recipientEmail,
        `${sender.firstName} ${sender.lastName}`,
        plan.title,
        plan.id,
        share.message,
      ),
    );
    return reply.code(created ? 201 : 200).send(ok(toShareResponse(share)));
  });

  fastify.get<{ Params: { id: string } }>("/lesson-plans/:id/shares", async (request) => {
    return ok(plans().listShares(viewerOf(request), request.params.id).map(toShareResponse));
  });

  fastify.delete<{ Params: { id: string; shareId: string } }>(
    "/lesson-plans/:id/shares/:shareId",
    async (request, reply) => {
      plans().revokeShare(viewerOf(request), request.params.id, request.params.shareId);
      return reply.code(204).send();
    },
  );

  await registerAttachmentRoutes(fastify, {
    collection: "/lesson-plans",
    ownerFor: (request, id, access) => {
      const viewer = viewerOf(request);
      const plan = access === "write" ? plans().getOwned(viewer, id) : plans().getVisible(viewer, id);
      return { kind: "lesson_plan", id: plan.id };
    },
  });
}
