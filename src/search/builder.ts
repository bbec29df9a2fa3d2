/**
 * Filter predicate builder.
 *
 * Each builder turns one listing criterion into a Drizzle SQL condition
 * over the `posts` table.  An empty or missing criterion yields
 * `undefined`, which Drizzle's `and()`/`or()` skip, so absent criteria
 * never narrow a listing.
 *
 * Conditions over tags and authors are `EXISTS` semi-joins: they never
 * repeat a post row, however many tags match.
 */

import { eq, ilike, type SQL, sql } from "drizzle-orm";
import { InvalidFilterValueError } from "../errors";
import { posts, postTags, tags, users } from "../schema";
import { slugify } from "../tags";
import type { Uuid } from "../uuid";

const INTEGER_REGEXP = /^[+-]?\d+$/;

/**
 * Escape the LIKE wildcards in a value, and wrap it for a substring match.
 */
export function containsPattern(value: string): string {
  const escapedValue = value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
  return `%${escapedValue}%`;
}

function present(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed == null || trimmed === "" ? undefined : trimmed;
}

export function titleContains(text: string | null | undefined): SQL | undefined {
  const value = present(text);
  if (value == null) return undefined;
  return ilike(posts.title, containsPattern(value));
}

export function contentContains(
  text: string | null | undefined,
): SQL | undefined {
  const value = present(text);
  if (value == null) return undefined;
  return ilike(posts.content, containsPattern(value));
}

/**
 * Matches posts whose author's username contains the text.
 */
export function authorNameContains(
  text: string | null | undefined,
): SQL | undefined {
  const value = present(text);
  if (value == null) return undefined;
  return sql`EXISTS (SELECT 1 FROM ${users} WHERE ${users.id} = ${posts.authorId} AND ${ilike(users.username, containsPattern(value))})`;
}

export function authorIs(id: Uuid | null | undefined): SQL | undefined {
  if (id == null) return undefined;
  return eq(posts.authorId, id);
}

/**
 * Matches posts carrying at least one tag whose name contains the text.
 */
export function tagNameContains(
  text: string | null | undefined,
): SQL | undefined {
  const value = present(text);
  if (value == null) return undefined;
  return sql`EXISTS (SELECT 1 FROM ${postTags} INNER JOIN ${tags} ON ${tags.id} = ${postTags.tagId} WHERE ${postTags.postId} = ${posts.id} AND ${ilike(tags.name, containsPattern(value))})`;
}

/**
 * Matches posts carrying the tag this name stands for.  Tags are identified
 * by slug, so `Django`, `django` and any other spelling stored as the same
 * tag all match.
 */
export function tagNameExact(text: string | null | undefined): SQL | undefined {
  const value = present(text);
  if (value == null) return undefined;
  return sql`EXISTS (SELECT 1 FROM ${postTags} INNER JOIN ${tags} ON ${tags.id} = ${postTags.tagId} WHERE ${postTags.postId} = ${posts.id} AND ${eq(tags.slug, slugify(value))})`;
}

const publicationYear = sql`EXTRACT(YEAR FROM ${posts.published})`;

export function yearExact(year: number | null | undefined): SQL | undefined {
  if (year == null) return undefined;
  return sql`${publicationYear} = ${year}`;
}

export function yearMin(year: number | null | undefined): SQL | undefined {
  if (year == null) return undefined;
  return sql`${publicationYear} >= ${year}`;
}

export function yearMax(year: number | null | undefined): SQL | undefined {
  if (year == null) return undefined;
  return sql`${publicationYear} <= ${year}`;
}

/**
 * Parse the value of an integer filter parameter.
 * @param parameter The query parameter name, reported on failure.
 * @param raw The raw parameter value.
 * @returns `undefined` for an empty or missing value.
 * @throws {InvalidFilterValueError} When the value is not an integer.
 */
export function parseInteger(
  parameter: string,
  raw: string | null | undefined,
): number | undefined {
  const value = present(raw);
  if (value == null) return undefined;
  if (!INTEGER_REGEXP.test(value)) {
    throw new InvalidFilterValueError(parameter, value, "expected an integer");
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidFilterValueError(parameter, value, "integer out of range");
  }
  return parsed;
}
