import { describe, it, expect } from 'vitest'
import * as jose from 'jose'
import { issueAccessToken } from '../../src/lib/tokens.js'
import { UserRole } from '../../src/modules/users/user.entity.js'

describe('Access tokens', () => {
  it('should sign an HS256 bearer token for the user', async () => {
    const token = await issueAccessToken({ id: 7, role: UserRole.ADMIN })

    expect(token.token_type).toBe('bearer')

    const { payload, protectedHeader } = await jose.jwtVerify(
      token.access_token,
      new TextEncoder().encode('test-secret-test-secret'),
      { issuer: 'mini-crm', audience: 'mini-crm-api' }
    )

    expect(protectedHeader.alg).toBe('HS256')
    expect(payload.sub).toBe('7')
    expect(payload.role).toBe('admin')
    const lifetime = (payload.exp ?? 0) - (payload.iat ?? 0)
    expect(lifetime).toBeGreaterThanOrEqual(1440 * 60)
    expect(lifetime).toBeLessThanOrEqual(1440 * 60 + 1)
  })

  it('should not verify with another secret', async () => {
    const token = await issueAccessToken({ id: 7, role: UserRole.SALES })

    await expect(
      jose.jwtVerify(token.access_token, new TextEncoder().encode('another-test-secret'))
    ).rejects.toThrow()
  })
})
