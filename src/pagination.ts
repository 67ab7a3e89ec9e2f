import type { Pagination } from "./types";

export interface PageWindow {
  pagination: Pagination;
  /** Slice bounds into the full result list. */
  start: number;
  end: number;
}

/**
 * Ceiling-division page count with the requested page clamped into
 * [1, max(totalPages, 1)].
 */
export function paginate(totalResults: number, perPage: number, page: number): PageWindow {
  const totalPages = Math.ceil(totalResults / perPage);
  const current = Math.max(1, Math.min(page, totalPages > 0 ? totalPages : 1));
  const start = (current - 1) * perPage;
  return {
    pagination: {
      current_page: current,
      per_page: perPage,
      total_results: totalResults,
      total_pages: totalPages,
    },
    start,
    end: start + perPage,
  };
}
