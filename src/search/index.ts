/**
 * Post listing: criteria parsing, predicate building, query composition,
 * and pagination.
 *
 * @example
 * ```typescript
 * import { listPosts, parseListingParams } from "./search";
 *
 * const { criteria, page, errors } = parseListingParams(c.req.query(), 10);
 * const { items, info } = await listPosts(db, criteria, page);
 * ```
 *
 * ## Listing parameters
 *
 * - `q` with `search_type` (`all`, `title`, `content`, `tags`, `author`)
 * - `tags=a,b` - posts carrying every listed tag
 * - `sort_by` (`newest`, `oldest`, `title_asc`, `title_desc`)
 * - `author`, `author_name`
 * - `publication_year`, `publication_year_min`, `publication_year_max`
 * - `page`, `page_size`
 *
 * @module
 */

import { count } from "drizzle-orm";
import type { Database } from "../db";
import { findPostsByIds, type PostWithRelations } from "../entities/post";
import { posts } from "../schema";
import { composeListQuery } from "./composer";
import { paginate } from "./pagination";
import type { ListCriteria, Page, PageRequest } from "./types";

export {
  authorIs,
  authorNameContains,
  containsPattern,
  contentContains,
  parseInteger,
  tagNameContains,
  tagNameExact,
  titleContains,
  yearExact,
  yearMax,
  yearMin,
} from "./builder";
export {
  buildOrderBy,
  buildSearchCondition,
  buildTagFilter,
  composeListQuery,
} from "./composer";
export {
  MAX_FILTER_TAGS,
  MAX_PAGE_SIZE,
  MAX_QUERY_LENGTH,
  MIN_QUERY_LENGTH,
  parseListingParams,
} from "./criteria";
export type { ListingParams, ParsedListing } from "./criteria";
export { pageUrl, paginate } from "./pagination";
export type {
  ListCriteria,
  Page,
  PageInfo,
  PageRequest,
  SearchMode,
  SortKey,
  YearRange,
} from "./types";
export { SEARCH_MODES, SORT_KEYS } from "./types";

export function defaultCriteria(): ListCriteria {
  return { query: "", mode: "all", tags: [], sort: "newest", year: {} };
}

/**
 * Run a listing: count the matching posts, then load the requested page
 * with authors, tags and comment counts, in listing order.
 */
export async function listPosts(
  db: Database,
  criteria: ListCriteria,
  request: PageRequest,
): Promise<Page<PostWithRelations>> {
  const { where, orderBy } = composeListQuery(criteria);
  const [{ total }] = await db
    .select({ total: count() })
    .from(posts)
    .where(where);
  const info = paginate(request, total);
  if (info.offset >= total) return { items: [], info };
  const hits = await db
    .select({ id: posts.id })
    .from(posts)
    .where(where)
    .orderBy(...orderBy)
    .limit(info.pageSize)
    .offset(info.offset);
  const items = await findPostsByIds(
    db,
    hits.map((hit) => hit.id),
  );
  return { items, info };
}
