import { z } from 'zod'
import { booleanQuery, dateTime, hexColor, id, isoDate, pageQuery, text, timezone } from './common.js'

export const eventTypeSchema = z.object({
  name: z.string().trim().min(1, 'Required').max(50),
  color: hexColor.default('#4A90D9'),
  icon: text(50),
})
export type CreateEventTypeInput = z.infer<typeof eventTypeSchema>

export const updateEventTypeSchema = z.object({
  name: z.string().trim().min(1, 'Required').max(50).optional(),
  color: hexColor.optional(),
  icon: text(50),
})
export type UpdateEventTypeInput = z.infer<typeof updateEventTypeSchema>

const eventFields = z.object({
  title: z.string().trim().min(1, 'Required').max(200),
  description: text(5000),
  location: text(200),
  event_type_id: id.nullable().optional(),
  subject_id: id.nullable().optional(),
  start_time: dateTime,
  end_time: dateTime,
  all_day: z.boolean().default(false),
  timezone: timezone.optional(),
  recurrence_rule: z.string().trim().max(500).nullable().optional(),
  student_ids: z.array(id).max(100).default([]),
})

function endNotBeforeStart(value: { start_time?: Date; end_time?: Date }, ctx: z.RefinementCtx): void {
  if (value.start_time && value.end_time && value.end_time.getTime() < value.start_time.getTime()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'End time must not be before start time',
      path: ['end_time'],
    })
  }
}

export const createEventSchema = eventFields.superRefine(endNotBeforeStart)
export type CreateEventInput = z.infer<typeof createEventSchema>

export const updateEventSchema = eventFields.partial().superRefine(endNotBeforeStart)
export type UpdateEventInput = z.infer<typeof updateEventSchema>

/** Largest window a single expansion query may cover */
export const MAX_WINDOW_DAYS = 366

export const listEventsQuery = z
  .object({
    ...pageQuery,
    from: dateTime.optional(),
    to: dateTime.optional(),
    student_id: id.optional(),
    event_type_id: id.optional(),
    subject_id: id.optional(),
    expand: booleanQuery.default('true'),
  })
  .superRefine((value, ctx) => {
    if (value.expand) {
      if (!value.from) ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Required when expand is true', path: ['from'] })
      if (!value.to) ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Required when expand is true', path: ['to'] })
    }
    if (value.from && value.to) {
      const span = value.to.getTime() - value.from.getTime()
      if (span <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be after from', path: ['to'] })
      } else if (span > MAX_WINDOW_DAYS * 86_400_000) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Window cannot exceed ${MAX_WINDOW_DAYS} days`,
          path: ['to'],
        })
      }
    }
  })
export type ListEventsQuery = z.infer<typeof listEventsQuery>

export const occurrencesQuery = z
  .object({
    from: dateTime,
    to: dateTime,
    limit: z.coerce.number().int().min(1).max(1000).default(100),
  })
  .refine((v) => v.to.getTime() > v.from.getTime(), { message: 'Must be after from', path: ['to'] })
  .refine((v) => v.to.getTime() - v.from.getTime() <= MAX_WINDOW_DAYS * 86_400_000, {
    message: `Window cannot exceed ${MAX_WINDOW_DAYS} days`,
    path: ['to'],
  })

export const editScopeQuery = z.object({
  scope: z.enum(['this', 'following', 'all']).default('all'),
  occurrence_start: dateTime.optional(),
})
export type EditScopeQuery = z.infer<typeof editScopeQuery>

export const ATTENDANCE_STATUSES = ['present', 'absent', 'excused', 'late'] as const
export type AttendanceStatus = (typeof ATTENDANCE_STATUSES)[number]

export const recordAttendanceSchema = z.object({
  occurrence_date: isoDate.optional(),
  records: z
    .array(
      z.object({
        student_id: id,
        status: z.enum(ATTENDANCE_STATUSES),
        notes: text(500),
      }),
    )
    .min(1, 'At least one record is required')
    .max(200),
})
export type RecordAttendanceInput = z.infer<typeof recordAttendanceSchema>

export const attendanceQuery = z.object({
  occurrence_date: isoDate.optional(),
})

export const studentAttendanceQuery = z.object({
  from: isoDate.optional(),
  to: isoDate.optional(),
})
