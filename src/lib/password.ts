/**
 * Argon2id password hashing
 *
 * Output is a PHC string: $argon2id$v=19$m=65536,t=3,p=4$<salt>$<hash>
 */

import argon2 from 'argon2'
import { warn } from './logger.js'

const ARGON2_OPTIONS: argon2.Options = {
  type: argon2.argon2id,
  memoryCost: 65536, // 64 MiB
  timeCost: 3,
  parallelism: 4,
  hashLength: 32,
}

export function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, ARGON2_OPTIONS)
}

/**
 * Verify a password against a stored hash. A malformed hash verifies as false.
 */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  try {
    return await argon2.verify(hash, password)
  } catch (error) {
    warn('Password hash could not be verified', { event: 'PasswordVerifyError', metadata: { error } })
    return false
  }
}
