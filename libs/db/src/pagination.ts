import type { Page } from './store';

export const MAX_PAGE_SIZE = 100;

export function normalizePage(page: number, limit: number) {
  const safePage = Number.isInteger(page) && page > 0 ? page : 1;
  const safeLimit =
    Number.isInteger(limit) && limit > 0 ? Math.min(limit, MAX_PAGE_SIZE) : 20;
  return { page: safePage, limit: safeLimit };
}

/** Builds a page with the labels mongoose-paginate-v2 answers with. */
export function toPage<T>(
  docs: T[],
  totalDocs: number,
  page: number,
  limit: number,
): Page<T> {
  const totalPages = Math.max(1, Math.ceil(totalDocs / limit));
  return {
    docs,
    totalDocs,
    limit,
    page,
    totalPages,
    hasPrevPage: page > 1,
    hasNextPage: page < totalPages,
  };
}

export function paginateArray<T>(
  items: T[],
  page: number,
  limit: number,
): Page<T> {
  const window = normalizePage(page, limit);
  const skip = (window.page - 1) * window.limit;
  return toPage(
    items.slice(skip, skip + window.limit),
    items.length,
    window.page,
    window.limit,
  );
}
