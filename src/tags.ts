import { getLogger } from "@logtape/logtape";
import { asc, count, eq, inArray } from "drizzle-orm";
import { uniqBy } from "es-toolkit";
import type { Database } from "./db";
import { characterCount } from "./forms";
import { SLUG_UNSAFE_CHARACTERS, TAG_REJECTED_CHARACTERS } from "./patterns";
import { postTags, type Tag, tags } from "./schema";
import { newId, type Uuid } from "./uuid";

const logger = getLogger(["penpost", "tags"]);

export const MAX_TAGS_PER_POST = 10;
export const MIN_TAG_LENGTH = 2;
export const MAX_TAG_LENGTH = 50;

/**
 * Split a comma-separated tag list.  Entries are trimmed, empty entries
 * are dropped, and case-insensitive duplicates keep their first spelling.
 */
export function parseTagList(raw: string | null | undefined): string[] {
  if (raw == null) return [];
  const names = raw
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name !== "");
  return uniqBy(names, (name) => name.toLowerCase());
}

/**
 * Derive the URL slug of a tag name: lowercase, whitespace runs become
 * hyphens, characters outside letters, digits and `-._~` are dropped.
 */
export function slugify(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "-")
    .replace(SLUG_UNSAFE_CHARACTERS, "")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function validateTagName(name: string): string | undefined {
  const length = characterCount(name);
  if (length < MIN_TAG_LENGTH) {
    return `Tag "${name}" is too short (minimum ${MIN_TAG_LENGTH} characters).`;
  }
  if (length > MAX_TAG_LENGTH) {
    return `Tag "${name}" is too long (maximum ${MAX_TAG_LENGTH} characters).`;
  }
  if (TAG_REJECTED_CHARACTERS.test(name)) {
    return `Tag "${name}" contains invalid characters.`;
  }
  if (slugify(name) === "") {
    return `Tag "${name}" must contain at least one letter or digit.`;
  }
  return undefined;
}

export function validateTagList(
  names: readonly string[],
  max: number = MAX_TAGS_PER_POST,
): string | undefined {
  if (names.length > max) {
    return `Too many tags (maximum ${max}).`;
  }
  for (const name of names) {
    const error = validateTagName(name);
    if (error != null) return error;
  }
  return undefined;
}

/**
 * Look up the tags with the given names, creating the missing ones.  A
 * name whose slug already belongs to a tag resolves to that tag.
 * @returns The tags in the order of `names`, without duplicates.
 */
export async function getOrCreateTags(
  db: Database,
  names: readonly string[],
): Promise<Tag[]> {
  const candidates = uniqBy(
    names.map((name) => ({ name, slug: slugify(name) })),
    (t) => t.slug,
  );
  if (candidates.length < 1) return [];
  const created = await db
    .insert(tags)
    .values(candidates.map((t) => ({ id: newId(), ...t })))
    .onConflictDoNothing()
    .returning();
  if (created.length > 0) {
    logger.debug("Created tags: {names}", {
      names: created.map((t) => t.name),
    });
  }
  const found = await db.query.tags.findMany({
    where: inArray(
      tags.slug,
      candidates.map((t) => t.slug),
    ),
  });
  const bySlug = new Map(found.map((t) => [t.slug, t]));
  const result: Tag[] = [];
  for (const candidate of candidates) {
    const tag = bySlug.get(candidate.slug);
    if (tag != null) result.push(tag);
  }
  return result;
}

/**
 * Replace the tag membership of a post.  Tags dropped from the post are
 * kept, even when no other post uses them.
 */
export async function setPostTags(
  db: Database,
  postId: Uuid,
  names: readonly string[],
): Promise<Tag[]> {
  const postTagList = await getOrCreateTags(db, names);
  await db.delete(postTags).where(eq(postTags.postId, postId));
  if (postTagList.length > 0) {
    await db
      .insert(postTags)
      .values(postTagList.map((tag) => ({ postId, tagId: tag.id })))
      .onConflictDoNothing();
  }
  return postTagList;
}

export async function getTagBySlug(
  db: Database,
  slug: string,
): Promise<Tag | undefined> {
  return await db.query.tags.findFirst({ where: eq(tags.slug, slug) });
}

export interface TagSummary {
  name: string;
  slug: string;
  postsCount: number;
}

export async function listTags(db: Database): Promise<TagSummary[]> {
  const rows = await db
    .select({
      name: tags.name,
      slug: tags.slug,
      postsCount: count(postTags.postId),
    })
    .from(tags)
    .leftJoin(postTags, eq(postTags.tagId, tags.id))
    .groupBy(tags.id)
    .orderBy(asc(tags.name));
  return rows;
}
