import type { Entity, EntityDefinition, FieldName, Insert, Scalar } from './entity.js'

export type Condition<T> =
  | { op: 'eq'; field: FieldName<T>; value: Scalar }
  /** Case-insensitive substring match */
  | { op: 'contains'; field: FieldName<T>; value: string }
  /** Case-insensitive equality */
  | { op: 'iequals'; field: FieldName<T>; value: string }
  | { op: 'gte' | 'lte'; field: FieldName<T>; value: Date | number }
  | { op: 'or'; conditions: Condition<T>[] }

export interface OrderBy<T> {
  field: FieldName<T>
  direction: 'asc' | 'desc'
}

export interface FindOptions<T> {
  where?: Condition<T>[]
  orderBy?: OrderBy<T>[]
  skip?: number
  limit?: number
}

/**
 * Row-level CRUD for one entity type.
 *
 * Repositories obtained from a transaction session share its connection; repositories
 * obtained from the Database run each statement on its own, so every single write is atomic.
 */
export interface Repository<T extends Entity> {
  readonly definition: EntityDefinition<T>

  getById(id: number): Promise<T | null>
  /** @throws {ApiError} 404 when the row does not exist */
  getByIdOrFail(id: number): Promise<T>
  exists(id: number): Promise<boolean>
  getByField(field: FieldName<T>, value: Scalar): Promise<T | null>
  listByField(field: FieldName<T>, value: Scalar): Promise<T[]>
  listAll(skip?: number, limit?: number): Promise<T[]>
  find(options?: FindOptions<T>): Promise<T[]>
  findOne(options?: FindOptions<T>): Promise<T | null>
  count(where?: Condition<T>[]): Promise<number>
  /** Row counts grouped by the value of one field */
  countBy(field: FieldName<T>): Promise<Record<string, number>>

  create(values: Insert<T>): Promise<T>
  /** Applies only the given fields and returns the refreshed row */
  update(entity: T, changes: Partial<T>): Promise<T>
  delete(entity: T): Promise<void>
}

export interface Session {
  repository<T extends Entity>(definition: EntityDefinition<T>): Repository<T>
}

export interface Database extends Session {
  /**
   * Run `work` inside one transaction. Commits when it resolves; rolls back and re-throws the
   * original error when it rejects. The connection is always released.
   */
  transaction<R>(work: (session: Session) => Promise<R>): Promise<R>
  healthCheck(): Promise<boolean>
  close(): Promise<void>
}
