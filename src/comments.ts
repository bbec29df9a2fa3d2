import { getLogger } from "@logtape/logtape";
import { desc, eq } from "drizzle-orm";
import type { Database } from "./db";
import { NotFoundError, PermissionDeniedError, ValidationError } from "./errors";
import { validateForm } from "./forms";
import { commentForm } from "./forms/post";
import { getPost } from "./posts";
import { type Comment, comments, type User } from "./schema";
import { isUuid, newId } from "./uuid";

const logger = getLogger(["penpost", "comments"]);

export type CommentWithAuthor = Comment & { author: User };

/**
 * @returns The comments of a post, newest first.
 * @throws {NotFoundError} When there is no such post.
 */
export async function listComments(
  db: Database,
  postId: string,
): Promise<CommentWithAuthor[]> {
  const post = await getPost(db, postId);
  return await db.query.comments.findMany({
    where: eq(comments.postId, post.id),
    with: { author: true },
    orderBy: desc(comments.created),
  });
}

/**
 * @throws {NotFoundError} When the id is malformed or unknown.
 */
export async function getComment(
  db: Database,
  id: string,
): Promise<CommentWithAuthor> {
  if (!isUuid(id)) throw new NotFoundError("No such comment");
  const comment = await db.query.comments.findFirst({
    where: eq(comments.id, id),
    with: { author: true },
  });
  if (comment == null) throw new NotFoundError("No such comment");
  return comment;
}

/**
 * @throws {NotFoundError} When the id is malformed or unknown.
 * @throws {PermissionDeniedError} When the user is not the author.
 */
export async function getOwnComment(
  db: Database,
  id: string,
  user: User,
): Promise<CommentWithAuthor> {
  const comment = await getComment(db, id);
  if (comment.authorId !== user.id) {
    throw new PermissionDeniedError("You can only change your own comments");
  }
  return comment;
}

/**
 * @throws {NotFoundError} When there is no such post.
 * @throws {ValidationError} When the input is invalid.
 */
export async function addComment(
  db: Database,
  postId: string,
  author: User,
  input: Record<string, unknown>,
): Promise<CommentWithAuthor> {
  const post = await getPost(db, postId);
  const result = await validateForm(commentForm, input);
  if (!result.success) throw new ValidationError(result.errors);
  const [comment] = await db
    .insert(comments)
    .values({
      id: newId(),
      postId: post.id,
      authorId: author.id,
      content: result.data.content,
    })
    .returning();
  logger.info("{username} commented on post {postId}", {
    username: author.username,
    postId: post.id,
  });
  return { ...comment, author };
}

/**
 * Change the content of a comment.  Its post, author and creation time
 * stay as they are.
 * @throws {NotFoundError} When there is no such comment.
 * @throws {PermissionDeniedError} When the user is not the author.
 * @throws {ValidationError} When the input is invalid.
 */
export async function updateComment(
  db: Database,
  id: string,
  user: User,
  input: Record<string, unknown>,
): Promise<CommentWithAuthor> {
  const existing = await getOwnComment(db, id, user);
  const result = await validateForm(commentForm, input);
  if (!result.success) throw new ValidationError(result.errors);
  const [comment] = await db
    .update(comments)
    .set({ content: result.data.content, updated: new Date() })
    .where(eq(comments.id, existing.id))
    .returning();
  return { ...comment, author: existing.author };
}

/**
 * @throws {NotFoundError} When there is no such comment.
 * @throws {PermissionDeniedError} When the user is not the author.
 * @returns The deleted comment.
 */
export async function deleteComment(
  db: Database,
  id: string,
  user: User,
): Promise<CommentWithAuthor> {
  const existing = await getOwnComment(db, id, user);
  await db.delete(comments).where(eq(comments.id, existing.id));
  logger.info("{username} deleted comment {commentId}", {
    username: user.username,
    commentId: existing.id,
  });
  return existing;
}
