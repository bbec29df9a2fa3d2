import type { PageInfo, PageRequest } from "./types";

/**
 * Compute the window of a page over a result of `totalCount` rows.
 * A page past the end is a valid, empty window.
 */
export function paginate(request: PageRequest, totalCount: number): PageInfo {
  const pageSize = Math.max(1, request.pageSize);
  const page = Math.max(1, request.page);
  const totalPages = Math.max(1, Math.ceil(totalCount / pageSize));
  return {
    page,
    pageSize,
    totalCount,
    totalPages,
    hasNext: page < totalPages,
    hasPrevious: page > 1,
    offset: (page - 1) * pageSize,
  };
}

/**
 * Build the URL of another page of the same listing, keeping every other
 * query parameter.
 */
export function pageUrl(currentUrl: string | URL, page: number): string {
  const url = new URL(currentUrl);
  url.searchParams.set("page", page.toString());
  return url.href;
}
