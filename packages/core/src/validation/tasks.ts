import { z } from 'zod'
import { id, isoDate, order, pageQuery, text } from './common.js'

export const TASK_PRIORITIES = ['low', 'medium', 'high'] as const
export const TASK_STATUSES = ['pending', 'in_progress', 'completed'] as const
export type TaskPriority = (typeof TASK_PRIORITIES)[number]
export type TaskStatus = (typeof TASK_STATUSES)[number]

const taskFields = z.object({
  title: z.string().trim().min(1, 'Required').max(200),
  description: text(5000),
  due_date: isoDate.nullable().optional(),
  priority: z.enum(TASK_PRIORITIES).default('medium'),
  status: z.enum(TASK_STATUSES).default('pending'),
  student_id: id.nullable().optional(),
})

export const createTaskSchema = taskFields
export type CreateTaskInput = z.infer<typeof createTaskSchema>

export const updateTaskSchema = taskFields.partial()
export type UpdateTaskInput = z.infer<typeof updateTaskSchema>

const statusList = z
  .string()
  .transform((raw) => raw.split(',').map((s) => s.trim()).filter(Boolean))
  .pipe(z.array(z.enum(TASK_STATUSES)).min(1))

export const listTasksQuery = z.object({
  ...pageQuery,
  status: statusList.optional(),
  priority: z.enum(TASK_PRIORITIES).optional(),
  student_id: id.optional(),
  due_before: isoDate.optional(),
  sort: z.enum(['due_date', 'priority', 'created_at']).default('due_date'),
  order,
})
export type ListTasksQuery = z.infer<typeof listTasksQuery>
