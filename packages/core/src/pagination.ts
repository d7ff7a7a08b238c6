/**
 * Page/limit pagination shared by every list endpoint.
 */

export const DEFAULT_PAGE = 1
export const DEFAULT_LIMIT = 20
export const MAX_LIMIT = 100

export interface PageRequest {
  page: number
  limit: number
}

export interface PageMeta {
  page: number
  limit: number
  total: number
  total_pages: number
  has_next: boolean
  has_prev: boolean
}

export interface Page<T> {
  items: T[]
  meta: PageMeta
}

export function buildPageMeta(request: PageRequest, total: number): PageMeta {
  const totalPages = total === 0 ? 0 : Math.ceil(total / request.limit)
  return {
    page: request.page,
    limit: request.limit,
    total,
    total_pages: totalPages,
    has_next: request.page < totalPages,
    has_prev: request.page > 1,
  }
}

export function pageOffset(request: PageRequest): number {
  return (request.page - 1) * request.limit
}
