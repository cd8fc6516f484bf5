export type PageSlice<T> = {
  items: T[];
  totalCount: number;
};

/**
 * Slice one page out of an ordered list. Out-of-range pages yield an empty
 * slice; clamping is the caller's job.
 */
export function paginate<T>(items: readonly T[], pageIndex: number, pageSize: number): PageSlice<T> {
  if (!Number.isInteger(pageIndex) || pageIndex < 0) {
    throw new RangeError(`pageIndex must be a non-negative integer, got ${pageIndex}`);
  }

  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  const start = pageIndex * pageSize;
  return {
    items: items.slice(start, start + pageSize),
    totalCount: items.length,
  };
}

export function totalPages(totalCount: number, pageSize: number): number {
  return Math.max(1, Math.ceil(totalCount / pageSize));
}

export function clampPage(pageIndex: number, pageCount: number): number {
  return Math.min(Math.max(0, pageIndex), Math.max(0, pageCount - 1));
}
