import type { PostWithRelations } from "../entities/post";

export interface PostListProps {
  posts: PostWithRelations[];
}

export function PostList({ posts }: PostListProps) {
  if (posts.length < 1) {
    return <p>No posts found.</p>;
  }
  return (
    <>
      {posts.map((post) => (
        <PostSummary post={post} />
      ))}
    </>
  );
}

export interface PostSummaryProps {
  post: PostWithRelations;
}

export function PostSummary({ post }: PostSummaryProps) {
  const excerpt =
    post.content.length > 200 ? `${post.content.slice(0, 200)}…` : post.content;
  return (
    <article>
      <header>
        <h3>
          <a href={`/posts/${post.id}`}>{post.title}</a>
        </h3>
        <small>
          by <a href={`/users/${post.author.id}/posts`}>{post.author.username}</a>{" "}
          on{" "}
          <time datetime={post.published.toISOString()}>
            {post.published.toLocaleDateString("en", { dateStyle: "medium" })}
          </time>
          {" · "}
          {post.comments.length === 1
            ? "1 comment"
            : `${post.comments.length} comments`}
        </small>
      </header>
      <p>{excerpt}</p>
      {post.tags.length > 0 && (
        <footer>
          {post.tags.map(({ tag }) => (
            <>
              <a href={`/tags/${tag.slug}`}>#{tag.name}</a>{" "}
            </>
          ))}
        </footer>
      )}
    </article>
  );
}
