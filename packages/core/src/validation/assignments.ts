import { z } from 'zod'
import { booleanQuery, id, isoDate, order, pageQuery, text } from './common.js'

export const ASSIGNMENT_STATUSES = ['assigned', 'in_progress', 'submitted', 'graded', 'late'] as const
export type AssignmentStatus = (typeof ASSIGNMENT_STATUSES)[number]

const assignmentFields = z.object({
  student_id: id,
  subject_id: id.nullable().optional(),
  title: z.string().trim().min(1, 'Required').max(200),
  description: text(5000),
  assigned_date: isoDate.optional(),
  due_date: isoDate.nullable().optional(),
  status: z.enum(ASSIGNMENT_STATUSES).optional(),
  max_score: z.number().positive().max(10_000).nullable().optional(),
  score: z.number().min(0).max(10_000).nullable().optional(),
  grade: z.string().trim().max(5).nullable().optional(),
  feedback: text(5000),
})

function scoreWithinMax(value: { score?: number | null; max_score?: number | null }, ctx: z.RefinementCtx): void {
  if (typeof value.score === 'number' && typeof value.max_score === 'number' && value.score > value.max_score) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Score cannot exceed max score', path: ['score'] })
  }
}

export const createAssignmentSchema = assignmentFields.superRefine(scoreWithinMax)
export type CreateAssignmentInput = z.infer<typeof createAssignmentSchema>

export const updateAssignmentSchema = assignmentFields.omit({ student_id: true }).partial().superRefine(scoreWithinMax)
export type UpdateAssignmentInput = z.infer<typeof updateAssignmentSchema>

export const ASSIGNMENT_SORT_FIELDS = ['due_date', 'assigned_date', 'title', 'created_at'] as const

export const listAssignmentsQuery = z.object({
  ...pageQuery,
  student_id: id.optional(),
  subject_id: id.optional(),
  status: z.enum(ASSIGNMENT_STATUSES).optional(),
  due_from: isoDate.optional(),
  due_to: isoDate.optional(),
  overdue: booleanQuery.optional(),
  sort: z.enum(ASSIGNMENT_SORT_FIELDS).default('due_date'),
  order,
})
export type ListAssignmentsQuery = z.infer<typeof listAssignmentsQuery>
