import type { Repository } from '../../db/database.js'
import { DEFAULT_LIST_LIMIT } from '../../db/repository.js'
import { AuditRecorder, ChangeTrackingMutator } from '../../lib/audit/index.js'
import { getServiceDeps, type Page, type ServiceDeps } from '../../lib/base-service.js'
import { badRequest } from '../../lib/errors.js'
import { info } from '../../lib/logger.js'
import { hashPassword, verifyPassword } from '../../lib/password.js'
import { type User, userEntity } from './user.entity.js'
import type { CreateUserInput, UpdateUserInput } from './user.schema.js'

export class UserService {
  private readonly mutator: ChangeTrackingMutator<User>

  constructor(private readonly deps: ServiceDeps) {
    const recorder = new AuditRecorder(deps.db, deps.actingUserId)
    this.mutator = new ChangeTrackingMutator(deps.db, userEntity, recorder)
  }

  private get users(): Repository<User> {
    return this.deps.db.repository(userEntity)
  }

  private async assertUsernameAvailable(username: string, exceptId?: number): Promise<void> {
    const existing = await this.users.getByField('username', username)
    if (existing && existing.id !== exceptId) {
      throw badRequest(`Username '${username}' already exists`)
    }
  }

  private async assertEmailAvailable(email: string, exceptId?: number): Promise<void> {
    const existing = await this.users.getByField('email', email)
    if (existing && existing.id !== exceptId) {
      throw badRequest(`Email '${email}' already exists`)
    }
  }

  /**
   * Create a user. Only the argon2id hash of the password is stored (and audited).
   *
   * @throws {ApiError} 400 when the username or email is taken
   */
  async createUser(input: CreateUserInput): Promise<User> {
    await this.assertUsernameAvailable(input.username)
    if (input.email) {
      await this.assertEmailAvailable(input.email)
    }

    const user = await this.mutator.create({
      username: input.username,
      email: input.email ?? null,
      hashedPassword: await hashPassword(input.password),
      role: input.role,
      isActive: input.isActive ?? true,
    })

    info('User created', { event: 'UserCreated', metadata: { userId: user.id, role: user.role } })
    return user
  }

  async updateUser(id: number, input: UpdateUserInput): Promise<User> {
    await this.users.getByIdOrFail(id)

    if (input.username) {
      await this.assertUsernameAvailable(input.username, id)
    }
    if (input.email) {
      await this.assertEmailAvailable(input.email, id)
    }

    return this.mutator.update(id, {
      username: input.username ?? undefined,
      email: input.email,
      role: input.role ?? undefined,
      isActive: input.isActive ?? undefined,
      hashedPassword: input.password ? await hashPassword(input.password) : undefined,
    })
  }

  /**
   * The user when the password matches its stored hash, otherwise null.
   */
  async authenticate(username: string, password: string): Promise<User | null> {
    const user = await this.users.getByField('username', username)
    if (!user) return null
    if (!(await verifyPassword(password, user.hashedPassword))) return null
    return user
  }

  getById(id: number): Promise<User | null> {
    return this.users.getById(id)
  }

  getByUsername(username: string): Promise<User | null> {
    return this.users.getByField('username', username)
  }

  async listUsers(skip = 0, limit = DEFAULT_LIST_LIMIT): Promise<Page<User>> {
    const [items, total] = await Promise.all([this.users.listAll(skip, limit), this.users.count()])
    return { items, total }
  }

  async deleteUser(id: number): Promise<void> {
    await this.mutator.delete(id)
    info('User deleted', { event: 'UserDeleted', metadata: { userId: id } })
  }
}

export function createUserService(): UserService {
  return new UserService(getServiceDeps())
}
