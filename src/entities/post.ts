import { desc, eq, inArray } from "drizzle-orm";
import type { Database } from "../db";
import { comments, type Comment, posts, type User } from "../schema";
import type { Uuid } from "../uuid";

export const postRelations = {
  author: true,
  tags: { with: { tag: true } },
  comments: { columns: { id: true } },
} as const;

export async function findPostsByIds(db: Database, ids: readonly Uuid[]) {
  if (ids.length < 1) return [];
  const found = await db.query.posts.findMany({
    where: inArray(posts.id, [...ids]),
    with: postRelations,
  });
  const order = new Map(ids.map((id, index) => [id, index]));
  return found.sort(
    (a, b) => (order.get(a.id) ?? 0) - (order.get(b.id) ?? 0),
  );
}

export type PostWithRelations = Awaited<
  ReturnType<typeof findPostsByIds>
>[number];

export async function findPost(db: Database, id: Uuid) {
  return await db.query.posts.findFirst({
    where: eq(posts.id, id),
    with: {
      ...postRelations,
      comments: { with: { author: true }, orderBy: desc(comments.created) },
    },
  });
}

export type PostDetail = NonNullable<Awaited<ReturnType<typeof findPost>>>;

export function serializeAuthor(author: User) {
  return {
    id: author.id,
    username: author.username,
  };
}

export function serializePost(post: PostWithRelations, baseUrl: URL | string) {
  return {
    id: post.id,
    url: new URL(`/posts/${post.id}`, baseUrl).href,
    title: post.title,
    content: post.content,
    author: serializeAuthor(post.author),
    tags: post.tags.map(({ tag }) => ({ name: tag.name, slug: tag.slug })),
    published: post.published.toISOString(),
    updated: post.updated.toISOString(),
    comments_count: post.comments.length,
  };
}

export function serializeComment(
  comment: Comment & { author: User },
) {
  return {
    id: comment.id,
    post_id: comment.postId,
    author: serializeAuthor(comment.author),
    content: comment.content,
    created: comment.created.toISOString(),
    updated: comment.updated.toISOString(),
  };
}

export function serializePostDetail(post: PostDetail, baseUrl: URL | string) {
  return {
    ...serializePost(post, baseUrl),
    comments_count: post.comments.length,
    comments: post.comments.map(serializeComment),
  };
}
