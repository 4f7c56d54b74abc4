export const DEFAULT_PAGE_SIZE = 5;
export const MAX_PAGE_SIZE = 100;

export interface PageRequest {
  page: number;
  size: number;
  sortBy?: string;
  descending: boolean;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  size: number;
  pages: number;
}

export function offsetOf(request: Pick<PageRequest, "page" | "size">): number {
  return (request.page - 1) * request.size;
}

export function pageCount(total: number, size: number): number {
  if (size <= 0) return 0;
  return Math.ceil(total / size);
}

export function toPage<T>(items: T[], total: number, request: Pick<PageRequest, "page" | "size">): Page<T> {
  return {
    items,
    total,
    page: request.page,
    size: request.size,
    pages: pageCount(total, request.size),
  };
}
