/**
 * Query composer.
 *
 * Combines the predicates of a {@link ListCriteria} into one condition
 * and one ordering over the `posts` table:
 *
 * 1. the free-text query, OR-combined over the fields of its search mode;
 * 2. AND every listed tag (a post must carry all of them);
 * 3. AND the author and publication-year filters;
 * 4. ordered by the sort key, with the post id as the final tie-breaker.
 *
 * All relation traversals are semi-joins, so selecting from `posts` with
 * the composed condition yields each post at most once.
 */

import { and, asc, desc, or, type SQL } from "drizzle-orm";
import { posts } from "../schema";
import {
  authorIs,
  authorNameContains,
  contentContains,
  tagNameContains,
  tagNameExact,
  titleContains,
  yearExact,
  yearMax,
  yearMin,
} from "./builder";
import type { ListCriteria, SearchMode, SortKey } from "./types";

export interface ComposedQuery {
  where: SQL | undefined;
  orderBy: SQL[];
}

/**
 * Build the free-text condition for a search mode.
 */
export function buildSearchCondition(
  query: string,
  mode: SearchMode,
): SQL | undefined {
  switch (mode) {
    case "all":
      return or(
        titleContains(query),
        contentContains(query),
        authorNameContains(query),
        tagNameContains(query),
      );
    case "title":
      return titleContains(query);
    case "content":
      return contentContains(query);
    case "author":
      return authorNameContains(query);
    case "tags":
      return tagNameContains(query);
  }
}

/**
 * Build the AND-of-memberships condition for a tag list.
 */
export function buildTagFilter(names: readonly string[]): SQL | undefined {
  return and(...names.map((name) => tagNameExact(name)));
}

export function buildOrderBy(sort: SortKey): SQL[] {
  switch (sort) {
    case "newest":
      return [desc(posts.published), desc(posts.id)];
    case "oldest":
      return [asc(posts.published), asc(posts.id)];
    case "title_asc":
      return [asc(posts.title), asc(posts.id)];
    case "title_desc":
      return [desc(posts.title), desc(posts.id)];
  }
}

export function composeListQuery(criteria: ListCriteria): ComposedQuery {
  return {
    where: and(
      buildSearchCondition(criteria.query, criteria.mode),
      buildTagFilter(criteria.tags),
      authorIs(criteria.authorId),
      authorNameContains(criteria.authorName),
      yearExact(criteria.year.exact),
      yearMin(criteria.year.min),
      yearMax(criteria.year.max),
    ),
    orderBy: buildOrderBy(criteria.sort),
  };
}
