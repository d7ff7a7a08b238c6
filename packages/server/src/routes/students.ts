import type { FastifyInstance } from "fastify";
import {
  NotFoundError,
  createStudentSchema,
  listStudentsQuery,
  parseQuery,
  parseWith,
  permanentQuery,
  studentAttendanceQuery,
  updateStudentSchema,
} from "@homeroom/core";
import type { StudentAttendanceRecord } from "../calendar/attendance-manager.js";
import { ok } from "../http/envelope.js";
import { profileImageFile, sendStoredFile } from "../http/files.js";
import { readUpload } from "../http/uploads.js";
import type { Student } from "../students/student-manager.js";

function toResponse(student: Student) {
  return {
    id: student.id,
    teacher_id: student.teacherId,
    first_name: student.firstName,
    last_name: student.lastName,
    date_of_birth: student.dateOfBirth,
    grade_level: student.gradeLevel,
    email: student.email,
    notes: student.notes,
    profile_image_url: student.profileImagePath ? `/api/v1/students/${student.id}/profile-image` : null,
    is_active: student.isActive,
    created_at: student.createdAt.toISOString(),
    updated_at: student.updatedAt.toISOString(),
  };
}

function toAttendanceResponse(record: StudentAttendanceRecord) {
  return {
    id: record.id,
    event_id: record.eventId,
    event_title: record.eventTitle,
    occurrence_date: record.occurrenceDate,
    status: record.status,
    notes: record.notes,
  };
}

export async function registerStudentRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/students", async (request) => {
    const query = parseQuery(listStudentsQuery, request.query);
    const page = fastify.studentManager.list(request.teacherId, query);
    return ok(page.items.map(toResponse), page.meta);
  });

  fastify.post("/students", async (request, reply) => {
    const input = parseWith(createStudentSchema, request.body);
    const student = fastify.studentManager.create(request.teacherId, input);
    return reply.code(201).send(ok(toResponse(student)));
  });

  fastify.get<{ Params: { id: string } }>("/students/:id", async (request) => {
    return ok(toResponse(fastify.studentManager.get(request.teacherId, request.params.id)));
  });

  fastify.patch<{ Params: { id: string } }>("/students/:id", async (request) => {
    const input = parseWith(updateStudentSchema, request.body);
    return ok(toResponse(fastify.studentManager.update(request.teacherId, request.params.id, input)));
  });

  // Soft delete by default; ?permanent=true removes the student and cascades
  fastify.delete<{ Params: { id: string } }>("/students/:id", async (request, reply) => {
    const { permanent } = parseQuery(permanentQuery, request.query);
    if (!permanent) {
      return ok(toResponse(fastify.studentManager.deactivate(request.teacherId, request.params.id)));
    }
    const files = fastify.studentManager.deletePermanently(request.teacherId, request.params.id);
    await fastify.fileStore.removeAll(files);
    return reply.code(204).send();
  });

  fastify.get<{ Params: { id: string } }>("/students/:id/attendance", async (request) => {
    const student = fastify.studentManager.get(request.teacherId, request.params.id);
    const range = parseQuery(studentAttendanceQuery, request.query);
    const history = fastify.attendanceManager.forStudent(request.teacherId, student.id, range);
    return ok({
      student_id: student.id,
      records: history.records.map(toAttendanceResponse),
      summary: history.summary,
    });
  });

  fastify.post<{ Params: { id: string } }>(
    "/students/:id/profile-image",
    { config: { rateLimit: "uploads" } },
    async (request) => {
      const student = fastify.studentManager.get(request.teacherId, request.params.id);
      const upload = await readUpload(request, "profile-images");
      const storedPath = await fastify.fileStore.save(
        "profile-images",
        request.teacherId,
        upload.extension,
        upload.buffer,
      );
      fastify.studentManager.setProfileImage(request.teacherId, student.id, storedPath);
      if (student.profileImagePath) {
        await fastify.fileStore.remove(student.profileImagePath);
      }
      return ok(toResponse(fastify.studentManager.get(request.teacherId, student.id)));
    },
  );

  fastify.get<{ Params: { id: string } }>("/students/:id/profile-image", async (request, reply) => {
    const student = fastify.studentManager.get(request.teacherId, request.params.id);
    if (!student.profileImagePath) {
      throw new NotFoundError("Profile image");
    }
    return sendStoredFile(reply, fastify.fileStore, profileImageFile(student.profileImagePath), "inline");
  });
}
