import type { Condition, FindOptions, Repository } from './database.js'
import type { Entity, EntityDefinition, FieldName, Insert, Scalar } from './entity.js'
import { entityNotFound } from '../lib/errors.js'

export const DEFAULT_LIST_LIMIT = 100

/**
 * Shared repository behaviour. Storage adapters implement the primitive reads and writes;
 * lookups by id or field are expressed as conditions on top of them.
 */
export abstract class BaseRepository<T extends Entity> implements Repository<T> {
  constructor(readonly definition: EntityDefinition<T>) {}

  abstract find(options?: FindOptions<T>): Promise<T[]>
  abstract count(where?: Condition<T>[]): Promise<number>
  abstract countBy(field: FieldName<T>): Promise<Record<string, number>>
  abstract create(values: Insert<T>): Promise<T>
  abstract update(entity: T, changes: Partial<T>): Promise<T>
  abstract delete(entity: T): Promise<void>

  async findOne(options: FindOptions<T> = {}): Promise<T | null> {
    const [first] = await this.find({ ...options, limit: 1 })
    return first ?? null
  }

  getById(id: number): Promise<T | null> {
    return this.getByField('id', id)
  }

  async getByIdOrFail(id: number): Promise<T> {
    const entity = await this.getById(id)
    if (!entity) {
      throw entityNotFound(this.definition.name, id)
    }
    return entity
  }

  async exists(id: number): Promise<boolean> {
    return (await this.getById(id)) !== null
  }

  getByField(field: FieldName<T>, value: Scalar): Promise<T | null> {
    return this.findOne({ where: [{ op: 'eq', field, value }] })
  }

  listByField(field: FieldName<T>, value: Scalar): Promise<T[]> {
    return this.find({
      where: [{ op: 'eq', field, value }],
      orderBy: [{ field: 'id', direction: 'asc' }],
    })
  }

  listAll(skip = 0, limit = DEFAULT_LIST_LIMIT): Promise<T[]> {
    return this.find({ orderBy: [{ field: 'id', direction: 'asc' }], skip, limit })
  }
}
