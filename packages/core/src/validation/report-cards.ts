import { z } from 'zod'
import { id, isoDate, pageQuery, text } from './common.js'

export const REPORT_CARD_STATUSES = ['draft', 'final'] as const
export type ReportCardStatus = (typeof REPORT_CARD_STATUSES)[number]

const entryFields = z.object({
  subject_id: id.nullable().optional(),
  subject_name: z.string().trim().min(1).max(100).optional(),
  score: z.number().min(0).max(100).nullable().optional(),
  grade: z.string().trim().min(1).max(5).nullable().optional(),
  comments: text(1000),
  sort_order: z.number().int().min(0).optional(),
})

export const createEntrySchema = entryFields.refine(
  (v) => (v.subject_id !== undefined && v.subject_id !== null) || v.subject_name !== undefined,
  { message: 'Either subject_id or subject_name is required', path: ['subject_name'] },
)
export type CreateEntryInput = z.infer<typeof createEntrySchema>

export const updateEntrySchema = entryFields
export type UpdateEntryInput = z.infer<typeof updateEntrySchema>

const schoolYear = z
  .string()
  .regex(/^\d{4}-\d{4}$/, 'School year must look like 2025-2026')
  .refine((v) => Number(v.slice(5)) === Number(v.slice(0, 4)) + 1, 'Second year must follow the first')

const cardFields = z.object({
  student_id: id,
  title: z.string().trim().min(1, 'Required').max(100),
  school_year: schoolYear,
  period_start: isoDate.nullable().optional(),
  period_end: isoDate.nullable().optional(),
  status: z.enum(REPORT_CARD_STATUSES).default('draft'),
  overall_comments: text(5000),
  days_present: z.number().int().min(0).nullable().optional(),
  days_absent: z.number().int().min(0).nullable().optional(),
})

function periodOrdered(
  value: { period_start?: string | null; period_end?: string | null },
  ctx: z.RefinementCtx,
): void {
  if (value.period_start && value.period_end && value.period_end < value.period_start) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Period end must not be before period start',
      path: ['period_end'],
    })
  }
}

export const createReportCardSchema = cardFields
  .extend({ entries: z.array(createEntrySchema).max(50).default([]) })
  .superRefine(periodOrdered)
export type CreateReportCardInput = z.infer<typeof createReportCardSchema>

export const updateReportCardSchema = cardFields.omit({ student_id: true }).partial().superRefine(periodOrdered)
export type UpdateReportCardInput = z.infer<typeof updateReportCardSchema>

export const listReportCardsQuery = z.object({
  ...pageQuery,
  student_id: id.optional(),
  school_year: schoolYear.optional(),
  status: z.enum(REPORT_CARD_STATUSES).optional(),
})
export type ListReportCardsQuery = z.infer<typeof listReportCardsQuery>
