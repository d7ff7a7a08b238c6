import { z } from 'zod'
import { booleanQuery, gradeLevel, hexColor, pageQuery, text } from './common.js'

const subjectFields = z.object({
  name: z.string().trim().min(1, 'Required').max(100),
  description: text(1000),
  color: hexColor.nullable().optional(),
  grade_level: gradeLevel.nullable().optional(),
})

export const createSubjectSchema = subjectFields
export type CreateSubjectInput = z.infer<typeof createSubjectSchema>

export const updateSubjectSchema = subjectFields.partial().extend({
  is_active: z.boolean().optional(),
})
export type UpdateSubjectInput = z.infer<typeof updateSubjectSchema>

export const listSubjectsQuery = z.object({
  ...pageQuery,
  is_active: booleanQuery.default('true'),
  search: z.string().trim().max(100).optional(),
})
export type ListSubjectsQuery = z.infer<typeof listSubjectsQuery>
