import { z } from '../../lib/validation.js'

export const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
})
