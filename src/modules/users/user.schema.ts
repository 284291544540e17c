import { z, commonSchemas } from '../../lib/validation.js'
import { UserRole } from './user.entity.js'

const username = z.string().trim().min(3).max(50)
const email = z.string().email().max(255)
const password = z.string().min(6).max(72)

// Create user input
export const createUserSchema = z.object({
  username,
  email: email.nullish(),
  role: z.nativeEnum(UserRole),
  isActive: z.boolean().default(true),
  password,
})

export type CreateUserInput = z.input<typeof createUserSchema>

// Update user input: null or absent leaves a field unchanged
export const updateUserSchema = z.object({
  username: username.nullish(),
  email: email.nullish(),
  role: z.nativeEnum(UserRole).nullish(),
  isActive: z.boolean().nullish(),
  password: password.nullish(),
})

export type UpdateUserInput = z.infer<typeof updateUserSchema>

export const listUsersQuerySchema = commonSchemas.pagination

export const userIdParamSchema = commonSchemas.idParam
