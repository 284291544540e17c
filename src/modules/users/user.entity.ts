import { z } from 'zod'
import { defineEntity } from '../../db/entity.js'

export enum UserRole {
  ADMIN = 'admin',
  SALES = 'sales',
  MANAGEMENT = 'management',
}

export interface User {
  id: number
  username: string
  email: string | null
  hashedPassword: string
  role: UserRole
  isActive: boolean
  createdAt: Date
  updatedAt: Date | null
}

/**
 * User as returned by the API: never carries the password hash.
 */
export type PublicUser = Omit<User, 'hashedPassword'>

export const userEntity = defineEntity<User>({
  name: 'User',
  table: 'users',
  columns: {
    id: 'id',
    username: 'username',
    email: 'email',
    hashedPassword: 'hashed_password',
    role: 'role',
    isActive: 'is_active',
    createdAt: 'created_at',
    updatedAt: 'updated_at',
  },
  updatedAtColumn: 'updated_at',
  schema: z.object({
    id: z.number().int(),
    username: z.string(),
    email: z.string().nullable(),
    hashedPassword: z.string(),
    role: z.nativeEnum(UserRole),
    isActive: z.boolean(),
    createdAt: z.coerce.date(),
    updatedAt: z.coerce.date().nullable(),
  }),
})

export function toPublicUser(user: User): PublicUser {
  const { hashedPassword: _hashedPassword, ...rest } = user
  return rest
}
