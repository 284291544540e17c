/**
 * Access tokens
 *
 * HS256 JWTs signed with JWT_SECRET. Verification happens in the auth middleware
 * (express-oauth2-jwt-bearer) against the same secret, issuer and audience.
 */

import * as jose from 'jose'
import { getEnv } from '../config/env.js'
import type { UserRole } from '../modules/users/user.entity.js'

export interface AccessTokenSubject {
  id: number
  role: UserRole
}

export interface AccessToken {
  access_token: string
  token_type: 'bearer'
}

export async function issueAccessToken(subject: AccessTokenSubject): Promise<AccessToken> {
  const env = getEnv()
  const secret = new TextEncoder().encode(env.JWT_SECRET)

  const token = await new jose.SignJWT({ role: subject.role })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(String(subject.id))
    .setIssuer(env.JWT_ISSUER)
    .setAudience(env.JWT_AUDIENCE)
    .setIssuedAt()
    .setExpirationTime(`${env.ACCESS_TOKEN_EXPIRE_MINUTES}m`)
    .sign(secret)

  return { access_token: token, token_type: 'bearer' }
}
