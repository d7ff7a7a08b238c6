import { z } from 'zod'
import { hexColor, id, isoDate, order, pageQuery, pastOrTodayDate, text } from './common.js'

export const PAYMENT_METHODS = ['cash', 'card', 'check', 'transfer', 'other'] as const
export const SUMMARY_GROUPS = ['category', 'student', 'subject', 'month'] as const
export type SummaryGroup = (typeof SUMMARY_GROUPS)[number]

export const MAX_EXPENSE_AMOUNT = 1_000_000

/** Dollars with at most two decimals */
export const amount = z
  .number()
  .positive('Amount must be greater than zero')
  .max(MAX_EXPENSE_AMOUNT)
  .refine((v) => Math.abs(Math.round(v * 100) - v * 100) < 1e-6, 'Amount can have at most two decimals')

export const currency = z
  .string()
  .regex(/^[A-Za-z]{3}$/, 'Currency must be a 3-letter ISO code')
  .transform((v) => v.toUpperCase())

const expenseFields = z.object({
  amount,
  currency: currency.default('USD'),
  description: z.string().trim().min(1, 'Required').max(200),
  expense_date: pastOrTodayDate,
  category_id: id.nullable().optional(),
  student_id: id.nullable().optional(),
  subject_id: id.nullable().optional(),
  vendor: text(100),
  payment_method: z.enum(PAYMENT_METHODS).nullable().optional(),
  is_tax_deductible: z.boolean().default(false),
  notes: text(2000),
})

export const createExpenseSchema = expenseFields
export type CreateExpenseInput = z.infer<typeof createExpenseSchema>

export const updateExpenseSchema = expenseFields.partial()
export type UpdateExpenseInput = z.infer<typeof updateExpenseSchema>

export const listExpensesQuery = z.object({
  ...pageQuery,
  from: isoDate.optional(),
  to: isoDate.optional(),
  category_id: id.optional(),
  student_id: id.optional(),
  subject_id: id.optional(),
  min_amount: z.coerce.number().min(0).optional(),
  max_amount: z.coerce.number().min(0).optional(),
  sort: z.enum(['expense_date', 'amount', 'created_at']).default('expense_date'),
  order: order.default('desc'),
})
export type ListExpensesQuery = z.infer<typeof listExpensesQuery>

export const expenseSummaryQuery = z.object({
  from: isoDate.optional(),
  to: isoDate.optional(),
  group_by: z.enum(SUMMARY_GROUPS).default('category'),
})
export type ExpenseSummaryQuery = z.infer<typeof expenseSummaryQuery>

export const expenseCategorySchema = z.object({
  name: z.string().trim().min(1, 'Required').max(50),
  color: hexColor.nullable().optional(),
})
export type CreateExpenseCategoryInput = z.infer<typeof expenseCategorySchema>

export const updateExpenseCategorySchema = expenseCategorySchema.partial()
export type UpdateExpenseCategoryInput = z.infer<typeof updateExpenseCategorySchema>
