/**
 * Listing criteria type definitions.
 *
 * A {@link ListCriteria} is the typed form of the listing query
 * parameters.  The composer turns it into a single SQL condition and
 * ordering; the pagination slicer turns {@link PageRequest} into a window
 * over the ordered result.
 */

import type { Uuid } from "../uuid";

/**
 * Which fields a free-text query is matched against.
 * - `all`: title, content, author name, and tag names
 * - `title` / `content` / `author`: that single field
 * - `tags`: tag names
 */
export const SEARCH_MODES = ["all", "title", "content", "tags", "author"] as const;

export type SearchMode = (typeof SEARCH_MODES)[number];

/**
 * Result orderings.  `newest` is the default.
 */
export const SORT_KEYS = ["newest", "oldest", "title_asc", "title_desc"] as const;

export type SortKey = (typeof SORT_KEYS)[number];

export interface YearRange {
  exact?: number;
  min?: number;
  max?: number;
}

export interface ListCriteria {
  /** Free-text search value; empty means no text search. */
  query: string;
  mode: SearchMode;
  /** Every listed tag must be present on a post (AND semantics). */
  tags: string[];
  sort: SortKey;
  authorId?: Uuid;
  authorName?: string;
  year: YearRange;
}

export interface PageRequest {
  /** 1-indexed. */
  page: number;
  pageSize: number;
}

export interface PageInfo extends PageRequest {
  totalCount: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
  offset: number;
}

export interface Page<T> {
  items: T[];
  info: PageInfo;
}
