/**
 * Form Schemas
 *
 * zod schemas for every form the blog accepts. Field names match the
 * `name` attributes rendered by the form renderers. Uploaded files are not
 * part of these schemas; the post handler reads `image` separately.
 */

import { z } from 'zod'
import { parseDateTimeLocal } from './datetime.js'

export const MAX_LENGTH = 256
export const NAME_MAX_LENGTH = 150

export const REQUIRED_MESSAGE = 'This field is required.'
const CHOICE_MESSAGE = 'Select a valid choice.'

function maxMessage(max: number): string {
  return `Ensure this value has at most ${max} characters.`
}

function requiredText(max?: number) {
  const text = z
    .string({ required_error: REQUIRED_MESSAGE, invalid_type_error: REQUIRED_MESSAGE })
    .trim()
    .min(1, REQUIRED_MESSAGE)
  return max === undefined ? text : text.max(max, maxMessage(max))
}

function optionalText(max: number) {
  return z
    .string({ invalid_type_error: 'Enter text.' })
    .trim()
    .max(max, maxMessage(max))
    .optional()
    .transform((value) => value ?? '')
}

const checkbox = z
  .string()
  .optional()
  .transform((value) => value === 'on' || value === 'true' || value === '1')

const requiredChoice = z
  .string({ required_error: REQUIRED_MESSAGE, invalid_type_error: CHOICE_MESSAGE })
  .trim()
  .min(1, REQUIRED_MESSAGE)
  .regex(/^\d+$/, CHOICE_MESSAGE)
  .transform((value) => Number.parseInt(value, 10))

const optionalChoice = z
  .string({ invalid_type_error: CHOICE_MESSAGE })
  .trim()
  .optional()
  .refine((value) => value === undefined || value === '' || /^\d+$/.test(value), CHOICE_MESSAGE)
  .transform((value) => (value ? Number.parseInt(value, 10) : null))

const dateTime = requiredText().transform((value, ctx) => {
  const date = parseDateTimeLocal(value)
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Enter a valid date/time.' })
    return z.NEVER
  }
  return date
})

export const postFormSchema = z.object({
  title: requiredText(MAX_LENGTH),
  text: requiredText(),
  pub_date: dateTime,
  location: optionalChoice,
  category: requiredChoice,
  is_published: checkbox,
  'image-clear': checkbox,
})

export type PostFormData = z.output<typeof postFormSchema>

export const commentFormSchema = z.object({
  text: requiredText(),
})

export type CommentFormData = z.output<typeof commentFormSchema>

export const USERNAME_PATTERN = /^[\w.@+-]+$/

const EMAIL_MESSAGE = 'Enter a valid email address.'

// Usernames are case-insensitive and stored lowercase
const username = requiredText(NAME_MAX_LENGTH)
  .regex(
    USERNAME_PATTERN,
    'Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.'
  )
  .transform((value) => value.toLowerCase())

const email = z
  .string({ invalid_type_error: EMAIL_MESSAGE })
  .trim()
  .optional()
  .transform((value) => value ?? '')
  .refine((value) => value === '' || z.string().email().safeParse(value).success, EMAIL_MESSAGE)

const requiredEmail = requiredText().email(EMAIL_MESSAGE)

export const profileFormSchema = z.object({
  username,
  first_name: optionalText(NAME_MAX_LENGTH),
  last_name: optionalText(NAME_MAX_LENGTH),
  email,
})

export type ProfileFormData = z.output<typeof profileFormSchema>

export const loginFormSchema = z.object({
  username: requiredText(),
  password: z
    .string({ required_error: REQUIRED_MESSAGE, invalid_type_error: REQUIRED_MESSAGE })
    .min(1, REQUIRED_MESSAGE),
})

export type LoginFormData = z.output<typeof loginFormSchema>

export const MIN_PASSWORD_LENGTH = 8

const password = z
  .string({ required_error: REQUIRED_MESSAGE, invalid_type_error: REQUIRED_MESSAGE })
  .superRefine((value, ctx) => {
    if (value.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: REQUIRED_MESSAGE })
      return
    }
    if (value.length < MIN_PASSWORD_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `This password is too short. It must contain at least ${MIN_PASSWORD_LENGTH} characters.`,
      })
    }
    if (/^\d+$/.test(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'This password is entirely numeric.' })
    }
  })

export const registrationFormSchema = z
  .object({
    username,
    email: requiredEmail,
    first_name: optionalText(NAME_MAX_LENGTH),
    last_name: optionalText(NAME_MAX_LENGTH),
    password,
    password_confirmation: z
      .string({ required_error: REQUIRED_MESSAGE, invalid_type_error: REQUIRED_MESSAGE })
      .min(1, REQUIRED_MESSAGE),
  })
  .refine((data) => data.password === data.password_confirmation, {
    message: 'The two password fields didn’t match.',
    path: ['password_confirmation'],
  })

export type RegistrationFormData = z.output<typeof registrationFormSchema>
