/**
 * Pagination shared by every store implementation
 */

export interface PageInfo {
  offset: number;
  has_next: boolean;
  has_prev: boolean;
}

export function computePageInfo(page: number, limit: number, total: number): PageInfo {
  const offset = (page - 1) * limit;
  return {
    offset,
    has_next: offset + limit < total,
    has_prev: page > 1,
  };
}
