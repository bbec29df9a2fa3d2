import { getLogger } from "@logtape/logtape";
import { eq } from "drizzle-orm";
import type { Database } from "./db";
import { findPost, type PostDetail } from "./entities/post";
import { NotFoundError, PermissionDeniedError, ValidationError } from "./errors";
import { type FormValues, validateForm } from "./forms";
import { postForm } from "./forms/post";
import { type Post, posts, type User } from "./schema";
import { setPostTags } from "./tags";
import { isUuid, newId } from "./uuid";

const logger = getLogger(["penpost", "posts"]);

/**
 * @throws {NotFoundError} When the id is malformed or unknown.
 */
export async function getPost(db: Database, id: string): Promise<PostDetail> {
  if (!isUuid(id)) throw new NotFoundError("No such post");
  const post = await findPost(db, id);
  if (post == null) throw new NotFoundError("No such post");
  return post;
}

/**
 * @throws {NotFoundError} When the id is malformed or unknown.
 * @throws {PermissionDeniedError} When the user is not the author.
 */
export async function getOwnPost(
  db: Database,
  id: string,
  user: User,
): Promise<PostDetail> {
  const post = await getPost(db, id);
  if (post.authorId !== user.id) {
    throw new PermissionDeniedError("You can only change your own posts");
  }
  return post;
}

/**
 * The form values that reproduce a post as it is stored.
 */
export function postFormValues(
  post: PostDetail,
): FormValues<"title" | "content" | "tags"> {
  return {
    title: post.title,
    content: post.content,
    tags: post.tags.map(({ tag }) => tag.name).join(", "),
  };
}

/**
 * Validate the input and create a post authored by `author`.  Any author
 * field in the input is ignored.
 * @throws {ValidationError} When the input is invalid.
 */
export async function createPost(
  db: Database,
  author: User,
  input: Record<string, unknown>,
): Promise<Post> {
  const result = await validateForm(postForm, input);
  if (!result.success) throw new ValidationError(result.errors);
  const { title, content, tags } = result.data;
  const post = await db.transaction(async (tx) => {
    const [post] = await tx
      .insert(posts)
      .values({ id: newId(), title, content, authorId: author.id })
      .returning();
    await setPostTags(tx, post.id, tags);
    return post;
  });
  logger.info("{username} created post {postId}", {
    username: author.username,
    postId: post.id,
  });
  return post;
}

/**
 * Validate the input and update a post, replacing its tags.  Fields
 * missing from `input` keep their stored values.
 * @throws {NotFoundError} When there is no such post.
 * @throws {PermissionDeniedError} When the user is not the author.
 * @throws {ValidationError} When the input is invalid.
 */
export async function updatePost(
  db: Database,
  id: string,
  user: User,
  input: Record<string, unknown>,
): Promise<Post> {
  const existing = await getOwnPost(db, id, user);
  const result = await validateForm(postForm, {
    ...postFormValues(existing),
    ...input,
  });
  if (!result.success) throw new ValidationError(result.errors);
  const { title, content, tags } = result.data;
  const post = await db.transaction(async (tx) => {
    const [post] = await tx
      .update(posts)
      .set({ title, content, updated: new Date() })
      .where(eq(posts.id, existing.id))
      .returning();
    await setPostTags(tx, existing.id, tags);
    return post;
  });
  logger.info("{username} updated post {postId}", {
    username: user.username,
    postId: post.id,
  });
  return post;
}

/**
 * Delete a post with its comments and tag associations.  The tags
 * themselves are kept.
 * @throws {NotFoundError} When there is no such post.
 * @throws {PermissionDeniedError} When the user is not the author.
 */
export async function deletePost(
  db: Database,
  id: string,
  user: User,
): Promise<void> {
  const existing = await getOwnPost(db, id, user);
  await db.delete(posts).where(eq(posts.id, existing.id));
  logger.info("{username} deleted post {postId}", {
    username: user.username,
    postId: existing.id,
  });
}
