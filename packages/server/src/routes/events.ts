/**
 * Calendar API Routes
 *
 * Events, recurring series with scoped edits, occurrence expansion and
 * attendance. Listing expands series into occurrences by default; with
 * `expand=false` the stored rows are paginated instead.
 */

import type { FastifyInstance } from "fastify";
import {
  ValidationError,
  attendanceQuery,
  createEventSchema,
  editScopeQuery,
  listEventsQuery,
  occurrencesQuery,
  parseQuery,
  parseWith,
  recordAttendanceSchema,
  updateEventSchema,
} from "@homeroom/core";
import type { AttendanceRecord } from "../calendar/attendance-manager.js";
import type { CalendarEvent, EventOccurrence } from "../calendar/event-manager.js";
import { ok } from "../http/envelope.js";

function toResponse(event: CalendarEvent) {
  return {
    id: event.id,
    title: event.title,
    description: event.description,
    location: event.location,
    event_type_id: event.eventTypeId,
    subject_id: event.subjectId,
    start_time: event.startTime.toISOString(),
    end_time: event.endTime.toISOString(),
    all_day: event.allDay,
    timezone: event.timezone,
    recurrence_rule: event.recurrenceRule,
    parent_event_id: event.parentEventId,
    original_start_time: event.originalStartTime?.toISOString() ?? null,
    is_cancelled: event.isCancelled,
    student_ids: event.studentIds,
    created_at: event.createdAt.toISOString(),
    updated_at: event.updatedAt.toISOString(),
  };
}

function toOccurrenceResponse(occurrence: EventOccurrence) {
  return {
    event_id: occurrence.eventId,
    series_id: occurrence.seriesId,
    title: occurrence.title,
    description: occurrence.description,
    location: occurrence.location,
    event_type_id: occurrence.eventTypeId,
    subject_id: occurrence.subjectId,
    start_time: occurrence.start.toISOString(),
    end_time: occurrence.end.toISOString(),
    all_day: occurrence.allDay,
    timezone: occurrence.timezone,
    is_exception: occurrence.isException,
    recurrence_rule: occurrence.recurrenceRule,
    student_ids: occurrence.studentIds,
  };
}

function toAttendanceResponse(record: AttendanceRecord) {
  return {
    id: record.id,
    event_id: record.eventId,
    student_id: record.studentId,
    student_name: record.studentName,
    occurrence_date: record.occurrenceDate,
    status: record.status,
    notes: record.notes,
    updated_at: record.updatedAt.toISOString(),
  };
}

export async function registerEventRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/events", async (request) => {
    const query = parseQuery(listEventsQuery, request.query);
    const filters = {
      studentId: query.student_id,
      eventTypeId: query.event_type_id,
      subjectId: query.subject_id,
    };

    if (!query.expand) {
      const page = fastify.eventManager.listBase(request.teacherId, query);
      return ok(page.items.map(toResponse), page.meta);
    }
    if (!query.from || !query.to) {
      throw ValidationError.field("from", "Required when expand is true", 400);
    }
    const occurrences = fastify.eventManager.expandWindow(
      request.teacherId,
      { from: query.from, to: query.to },
      filters,
    );
    return ok(occurrences.map(toOccurrenceResponse));
  });

  fastify.post("/events", async (request, reply) => {
    const input = parseWith(createEventSchema, request.body);
    const teacher = fastify.teacherManager.get(request.teacherId);
    const event = fastify.eventManager.create(request.teacherId, input, teacher.timezone);
    return reply.code(201).send(ok(toResponse(event)));
  });

  fastify.get<{ Params: { id: string } }>("/events/:id", async (request) => {
    return ok(toResponse(fastify.eventManager.get(request.teacherId, request.params.id)));
  });

  fastify.get<{ Params: { id: string } }>("/events/:id/occurrences", async (request) => {
    const query = parseQuery(occurrencesQuery, request.query);
    const occurrences = fastify.eventManager.occurrencesOf(
      request.teacherId,
      request.params.id,
      { from: query.from, to: query.to },
      query.limit,
    );
    return ok(occurrences.map(toOccurrenceResponse));
  });

  // PATCH /events/:id?scope=this|following|all&occurrence_start=...
  fastify.patch<{ Params: { id: string } }>("/events/:id", async (request) => {
    const { scope, occurrence_start } = parseQuery(editScopeQuery, request.query);
    const input = parseWith(updateEventSchema, request.body);
    const event = fastify.eventManager.update(request.teacherId, request.params.id, input, scope, occurrence_start);
    return ok(toResponse(event));
  });

  fastify.delete<{ Params: { id: string } }>("/events/:id", async (request, reply) => {
    const { scope, occurrence_start } = parseQuery(editScopeQuery, request.query);
    fastify.eventManager.delete(request.teacherId, request.params.id, scope, occurrence_start);
    return reply.code(204).send();
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Attendance
  // ═══════════════════════════════════════════════════════════════════════════

  fastify.get<{ Params: { id: string } }>("/events/:id/attendance", async (request) => {
    const { occurrence_date } = parseQuery(attendanceQuery, request.query);
    const records = fastify.attendanceManager.list(request.teacherId, request.params.id, occurrence_date);
    return ok(records.map(toAttendanceResponse));
  });

  fastify.put<{ Params: { id: string } }>("/events/:id/attendance", async (request) => {
    const input = parseWith(recordAttendanceSchema, request.body);
    const records = fastify.attendanceManager.record(request.teacherId, request.params.id, input);
    return ok(records.map(toAttendanceResponse));
  });
}
