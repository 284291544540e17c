/**
 * Generic pagination utilities for consistent pagination across all modules
 */

export interface PaginationMeta {
  page: number
  pageSize: number
  total: number
  totalPages: number
  hasNext: boolean
  hasPrev: boolean
}

export interface PaginatedResponse<T> {
  data: T[]
  pagination: PaginationMeta
}

/**
 * Creates a standardized paginated response
 *
 * @param data - Array of items for the current page
 * @param total - Total number of items across all pages
 * @param page - Current page number (1-indexed)
 * @param pageSize - Number of items per page
 *
 * @example
 * const { skip, limit } = getPaginationSkipLimit(1, 10)
 * const clients = await service.listClients(skip, limit)
 * return createPaginatedResponse(clients.items, clients.total, 1, 10)
 */
export function createPaginatedResponse<T>(
  data: T[],
  total: number,
  page: number,
  pageSize: number
): PaginatedResponse<T> {
  const totalPages = Math.ceil(total / pageSize)

  return {
    data,
    pagination: {
      page,
      pageSize,
      total,
      totalPages,
      hasNext: page < totalPages,
      hasPrev: page > 1,
    },
  }
}

/**
 * Calculates skip/limit values for repository pagination
 *
 * @example
 * getPaginationSkipLimit(2, 10) // { skip: 10, limit: 10 }
 */
export function getPaginationSkipLimit(page: number, pageSize: number) {
  return {
    skip: (page - 1) * pageSize,
    limit: pageSize,
  }
}
