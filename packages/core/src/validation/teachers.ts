import { z } from 'zod'
import { newPassword } from './auth.js'
import { email, personName, text, timezone } from './common.js'

export const updateTeacherSchema = z.object({
  email: email.optional(),
  first_name: personName.optional(),
  last_name: personName.optional(),
  phone: z
    .string()
    .trim()
    .regex(/^[+\d][\d\s().-]{4,24}$/, 'Must be a valid phone number')
    .nullable()
    .optional(),
  timezone: timezone.optional(),
  bio: text(1000),
})
export type UpdateTeacherInput = z.infer<typeof updateTeacherSchema>

export const changePasswordSchema = z.object({
  current_password: z.string().min(1, 'Required'),
  new_password: newPassword,
})
