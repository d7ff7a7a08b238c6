import { z } from 'zod'
import { booleanQuery, email, gradeLevel, order, pageQuery, pastOrTodayDate, personName, text } from './common.js'

const studentFields = z.object({
  first_name: personName,
  last_name: personName,
  date_of_birth: pastOrTodayDate.nullable().optional(),
  grade_level: gradeLevel.nullable().optional(),
  email: email.nullable().optional(),
  notes: text(2000),
})

export const createStudentSchema = studentFields
export type CreateStudentInput = z.infer<typeof createStudentSchema>

export const updateStudentSchema = studentFields.partial().extend({
  is_active: z.boolean().optional(),
})
export type UpdateStudentInput = z.infer<typeof updateStudentSchema>

export const STUDENT_SORT_FIELDS = ['first_name', 'last_name', 'grade_level', 'created_at'] as const

export const listStudentsQuery = z.object({
  ...pageQuery,
  grade_level: gradeLevel.optional(),
  is_active: booleanQuery.default('true'),
  search: z.string().trim().max(100).optional(),
  sort: z.enum(STUDENT_SORT_FIELDS).default('last_name'),
  order,
})
export type ListStudentsQuery = z.infer<typeof listStudentsQuery>
