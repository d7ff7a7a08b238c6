import { z } from 'zod'
import { email, gradeLevel, id, pageQuery, text } from './common.js'

const lineList = z.array(z.string().trim().min(1).max(500)).max(50)

const lessonPlanFields = z.object({
  title: z.string().trim().min(1, 'Required').max(200),
  description: text(2000),
  subject_id: id.nullable().optional(),
  grade_level: gradeLevel.nullable().optional(),
  duration_minutes: z.number().int().min(1).max(1440).nullable().optional(),
  objectives: lineList.default([]),
  materials: lineList.default([]),
  content: text(50_000),
  tags: z
    .array(z.string().trim().toLowerCase().min(1).max(30, 'Tags can be at most 30 characters'))
    .max(20, 'At most 20 tags')
    .default([]),
  is_public: z.boolean().default(false),
})

export const createLessonPlanSchema = lessonPlanFields
export type CreateLessonPlanInput = z.infer<typeof createLessonPlanSchema>

export const updateLessonPlanSchema = lessonPlanFields.partial()
export type UpdateLessonPlanInput = z.infer<typeof updateLessonPlanSchema>

export const listLessonPlansQuery = z.object({
  ...pageQuery,
  subject_id: id.optional(),
  grade_level: gradeLevel.optional(),
  tag: z.string().trim().toLowerCase().min(1).max(30).optional(),
  search: z.string().trim().max(100).optional(),
})
export type ListLessonPlansQuery = z.infer<typeof listLessonPlansQuery>

export const publicLessonPlansQuery = z.object({
  ...pageQuery,
  q: z.string().trim().max(200).optional(),
  grade_level: gradeLevel.optional(),
  tag: z.string().trim().toLowerCase().min(1).max(30).optional(),
})
export type PublicLessonPlansQuery = z.infer<typeof publicLessonPlansQuery>

export const shareLessonPlanSchema = z.object({
  email,
  message: text(1000),
})
export type ShareLessonPlanInput = z.infer<typeof shareLessonPlanSchema>
