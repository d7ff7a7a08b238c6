/**
 * Teacher profile routes: the signed-in account only.
 */

import type { FastifyInstance } from "fastify";
import {
  NotFoundError,
  changePasswordSchema,
  parseQuery,
  parseWith,
  permanentQuery,
  updateTeacherSchema,
} from "@homeroom/core";
import { ok } from "../http/envelope.js";
import { profileImageFile, sendStoredFile } from "../http/files.js";
import { readUpload } from "../http/uploads.js";
import type { Teacher } from "../teachers/teacher-manager.js";

export function toTeacherResponse(teacher: Teacher) {
  return {
    id: teacher.id,
    email: teacher.email,
    first_name: teacher.firstName,
    last_name: teacher.lastName,
    phone: teacher.phone,
    timezone: teacher.timezone,
    bio: teacher.bio,
    profile_image_url: teacher.profileImagePath ? "/api/v1/teachers/me/profile-image" : null,
    email_verified: teacher.emailVerified,
    is_active: teacher.isActive,
    created_at: teacher.createdAt.toISOString(),
    updated_at: teacher.updatedAt.toISOString(),
  };
}

export async function registerTeacherRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/teachers/me", async (request) => {
    return ok(toTeacherResponse(fastify.teacherManager.get(request.teacherId)));
  });

  fastify.patch("/teachers/me", async (request) => {
    const input = parseWith(updateTeacherSchema, request.body);
    const { teacher, emailChanged } = fastify.teacherManager.update(request.teacherId, input);
    if (emailChanged) {
      await fastify.authService.sendVerification(teacher);
    }
    return ok(toTeacherResponse(teacher));
  });

  fastify.put("/teachers/me/password", async (request) => {
    const input = parseWith(changePasswordSchema, request.body);
    await fastify.authService.changePassword(request.teacherId, input.current_password, input.new_password);
    return ok({ message: "Password updated" });
  });

  fastify.delete("/teachers/me", async (request, reply) => {
    const { permanent } = parseQuery(permanentQuery, request.query);
    if (permanent) {
      fastify.teacherManager.deletePermanently(request.teacherId);
      await fastify.fileStore.removeTeacher(request.teacherId);
      request.log.info({ teacherId: request.teacherId }, "Account deleted permanently");
    } else {
      fastify.authService.deactivate(request.teacherId);
      request.log.info({ teacherId: request.teacherId }, "Account deactivated");
    }
    return reply.code(204).send();
  });

  fastify.post("/teachers/me/profile-image", { config: { rateLimit: "uploads" } }, async (request) => {
    const upload = await readUpload(request, "profile-images");
    const previous = fastify.teacherManager.get(request.teacherId).profileImagePath;
    const storedPath = await fastify.fileStore.save(
      "profile-images",
      request.teacherId,
      upload.extension,
      upload.buffer,
    );
    fastify.teacherManager.setProfileImage(request.teacherId, storedPath);
    if (previous) {
      await fastify.fileStore.remove(previous);
    }
    return ok(toTeacherResponse(fastify.teacherManager.get(request.teacherId)));
  });

  fastify.get("/teachers/me/profile-image", async (request, reply) => {
    const teacher = fastify.teacherManager.get(request.teacherId);
    if (!teacher.profileImagePath) {
      throw new NotFoundError("Profile image");
    }
    return sendStoredFile(reply, fastify.fileStore, profileImageFile(teacher.profileImagePath), "inline");
  });
}
