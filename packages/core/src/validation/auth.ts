import { z } from 'zod'
import { passwordProblems } from '../auth/passwords.js'
import { email, personName, timezone } from './common.js'

/** New password, checked against the strength rules */
export const newPassword = z.string().superRefine((value, ctx) => {
  for (const message of passwordProblems(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message })
  }
})

export const registerSchema = z.object({
  email,
  password: newPassword,
  first_name: personName,
  last_name: personName,
  timezone: timezone.optional(),
})
export type RegisterInput = z.infer<typeof registerSchema>

export const loginSchema = z.object({
  email,
  password: z.string().min(1, 'Required'),
})
export type LoginInput = z.infer<typeof loginSchema>

export const refreshSchema = z.object({
  refresh_token: z.string().min(1, 'Required'),
})

export const logoutSchema = z
  .object({
    refresh_token: z.string().min(1).optional(),
    all_devices: z.boolean().default(false),
  })
  .refine((v) => v.all_devices || v.refresh_token !== undefined, {
    message: 'Required unless all_devices is true',
    path: ['refresh_token'],
  })

export const forgotPasswordSchema = z.object({ email })

export const resetPasswordSchema = z.object({
  token: z.string().min(1, 'Required'),
  password: newPassword,
})

export const verifyEmailSchema = z.object({
  token: z.string().min(1, 'Required'),
})
