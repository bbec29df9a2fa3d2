import { Hono } from "hono";
import { getUser } from "../accounts";
import {
  addComment,
  deleteComment,
  getOwnComment,
  updateComment,
} from "../comments";
import { CommentForm, CommentList } from "../components/Comments";
import { ConfirmForm } from "../components/ConfirmForm";
import { Layout } from "../components/Layout";
import { Pagination } from "../components/Pagination";
import { PostForm } from "../components/PostForm";
import { PostList } from "../components/PostList";
import { SearchForm } from "../components/SearchForm";
import { config } from "../config";
import db from "../db";
import type { PostDetail } from "../entities/post";
import { NotFoundError, ValidationError } from "../errors";
import { type FormErrors, readFormValues } from "../forms";
import { commentForm, postForm } from "../forms/post";
import { requestBody } from "../helpers";
import { type Env, requireUser } from "../login";
import {
  createPost,
  deletePost,
  getOwnPost,
  getPost,
  postFormValues,
  updatePost,
} from "../posts";
import type { User } from "../schema";
import { type ListCriteria, listPosts, parseListingParams } from "../search";
import { getTagBySlug } from "../tags";
import { isUuid } from "../uuid";

const posts = new Hono<Env>();

interface ListingPageOptions {
  title: string;
  url: string;
  query: Record<string, string>;
  user: User | null;
  scope?: (criteria: ListCriteria) => ListCriteria;
}

async function renderListing({
  title,
  url,
  query,
  user,
  scope,
}: ListingPageOptions) {
  const { criteria, page, errors } = parseListingParams(
    query,
    config.PAGE_SIZE,
  );
  const { items, info } = await listPosts(
    db,
    scope == null ? criteria : scope(criteria),
    page,
  );
  return (
    <Layout title={title} user={user}>
      <h1>{title}</h1>
      <SearchForm
        action={new URL(url).pathname}
        criteria={criteria}
        errors={errors}
      />
      <p>
        {info.totalCount === 1 ? "1 post" : `${info.totalCount} posts`}
      </p>
      <PostList posts={items} />
      <Pagination url={url} info={info} />
    </Layout>
  );
}

for (const path of ["/", "/posts"]) {
  posts.get(path, async (c) => {
    return c.html(
      await renderListing({
        title: "Posts",
        url: c.req.url,
        query: c.req.query(),
        user: c.get("user"),
      }),
    );
  });
}

posts.get("/users/:id/posts", async (c) => {
  const id = c.req.param("id");
  const author = isUuid(id) ? await getUser(db, id) : undefined;
  if (author == null) throw new NotFoundError("No such user");
  return c.html(
    await renderListing({
      title: `Posts by ${author.username}`,
      url: c.req.url,
      query: c.req.query(),
      user: c.get("user"),
      scope: (criteria) => ({ ...criteria, authorId: author.id }),
    }),
  );
});

posts.get("/tags/:slug", async (c) => {
  const tag = await getTagBySlug(db, c.req.param("slug"));
  if (tag == null) throw new NotFoundError("No such tag");
  return c.html(
    await renderListing({
      title: `Posts tagged #${tag.name}`,
      url: c.req.url,
      query: c.req.query(),
      user: c.get("user"),
      scope: (criteria) => ({
        ...criteria,
        tags: [tag.name, ...criteria.tags],
      }),
    }),
  );
});

interface PostPageProps {
  post: PostDetail;
  user: User | null;
  comment?: string;
  errors?: FormErrors;
}

function PostPage({ post, user, comment, errors }: PostPageProps) {
  return (
    <Layout title={post.title} user={user}>
      <article>
        <header>
          <h1>{post.title}</h1>
          <small>
            by{" "}
            <a href={`/users/${post.author.id}/posts`}>
              {post.author.username}
            </a>{" "}
            on{" "}
            <time datetime={post.published.toISOString()}>
              {post.published.toLocaleDateString("en", {
                dateStyle: "medium",
              })}
            </time>
          </small>
        </header>
        {post.content.split(/\n{2,}/).map((paragraph) => (
          <p>{paragraph}</p>
        ))}
        <footer>
          {post.tags.map(({ tag }) => (
            <>
              <a href={`/tags/${tag.slug}`}>#{tag.name}</a>{" "}
            </>
          ))}
          {user?.id === post.authorId && (
            <p>
              <a href={`/post/${post.id}/update`}>Edit</a>{" "}
              <a href={`/post/${post.id}/delete`}>Delete</a>
            </p>
          )}
        </footer>
      </article>
      <section>
        <h2>Comments</h2>
        <CommentList comments={post.comments} viewer={user} />
        {user == null ? (
          <p>
            <a href={`/login?next=${encodeURIComponent(`/posts/${post.id}`)}`}>
              Log in
            </a>{" "}
            to leave a comment.
          </p>
        ) : (
          <CommentForm
            action={`/posts/${post.id}/comments/new`}
            content={comment}
            errors={errors}
          />
        )}
      </section>
    </Layout>
  );
}

posts.get("/posts/:id", async (c) => {
  const post = await getPost(db, c.req.param("id"));
  return c.html(<PostPage post={post} user={c.get("user")} />);
});

posts.post("/posts/:id/comments/new", async (c) => {
  const user = requireUser(c.get("user"));
  const postId = c.req.param("id");
  const input = await requestBody(c.req);
  try {
    const comment = await addComment(db, postId, user, input);
    return c.redirect(`/posts/${comment.postId}#comment-${comment.id}`);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    const post = await getPost(db, postId);
    return c.html(
      <PostPage
        post={post}
        user={user}
        comment={readFormValues(commentForm, input).content}
        errors={error.errors}
      />,
      400,
    );
  }
});

posts.get("/post/new", (c) => {
  const user = requireUser(c.get("user"));
  return c.html(
    <Layout title="New post" user={user}>
      <h1>New post</h1>
      <PostForm action="/post/new" submitLabel="Publish" />
    </Layout>,
  );
});

posts.post("/post/new", async (c) => {
  const user = requireUser(c.get("user"));
  const input = await requestBody(c.req);
  try {
    const post = await createPost(db, user, input);
    return c.redirect(`/posts/${post.id}`);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    return c.html(
      <Layout title="New post" user={user}>
        <h1>New post</h1>
        <PostForm
          action="/post/new"
          values={readFormValues(postForm, input)}
          errors={error.errors}
          submitLabel="Publish"
        />
      </Layout>,
      400,
    );
  }
});

posts.get("/post/:id/update", async (c) => {
  const user = requireUser(c.get("user"));
  const post = await getOwnPost(db, c.req.param("id"), user);
  return c.html(
    <Layout title={`Edit ${post.title}`} user={user}>
      <h1>Edit post</h1>
      <PostForm
        action={`/post/${post.id}/update`}
        values={postFormValues(post)}
        submitLabel="Save"
      />
    </Layout>,
  );
});

posts.post("/post/:id/update", async (c) => {
  const user = requireUser(c.get("user"));
  const id = c.req.param("id");
  const input = await requestBody(c.req);
  try {
    const post = await updatePost(db, id, user, input);
    return c.redirect(`/posts/${post.id}`);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    return c.html(
      <Layout title="Edit post" user={user}>
        <h1>Edit post</h1>
        <PostForm
          action={`/post/${id}/update`}
          values={readFormValues(postForm, input)}
          errors={error.errors}
          submitLabel="Save"
        />
      </Layout>,
      400,
    );
  }
});

posts.get("/post/:id/delete", async (c) => {
  const user = requireUser(c.get("user"));
  const post = await getOwnPost(db, c.req.param("id"), user);
  return c.html(
    <Layout title={`Delete ${post.title}`} user={user}>
      <h1>Delete post</h1>
      <ConfirmForm
        action={`/post/${post.id}/delete`}
        question={`Are you sure you want to delete "${post.title}"?`}
        cancelUrl={`/posts/${post.id}`}
      />
    </Layout>,
  );
});

posts.post("/post/:id/delete", async (c) => {
  const user = requireUser(c.get("user"));
  await deletePost(db, c.req.param("id"), user);
  return c.redirect("/posts");
});

posts.get("/comment/:id/update", async (c) => {
  const user = requireUser(c.get("user"));
  const comment = await getOwnComment(db, c.req.param("id"), user);
  return c.html(
    <Layout title="Edit comment" user={user}>
      <h1>Edit comment</h1>
      <CommentForm
        action={`/comment/${comment.id}/update`}
        content={comment.content}
        submitLabel="Save"
      />
    </Layout>,
  );
});

posts.post("/comment/:id/update", async (c) => {
  const user = requireUser(c.get("user"));
  const id = c.req.param("id");
  const input = await requestBody(c.req);
  try {
    const comment = await updateComment(db, id, user, input);
    return c.redirect(`/posts/${comment.postId}#comment-${comment.id}`);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    return c.html(
      <Layout title="Edit comment" user={user}>
        <h1>Edit comment</h1>
        <CommentForm
          action={`/comment/${id}/update`}
          content={readFormValues(commentForm, input).content}
          errors={error.errors}
          submitLabel="Save"
        />
      </Layout>,
      400,
    );
  }
});

posts.get("/comment/:id/delete", async (c) => {
  const user = requireUser(c.get("user"));
  const comment = await getOwnComment(db, c.req.param("id"), user);
  return c.html(
    <Layout title="Delete comment" user={user}>
      <h1>Delete comment</h1>
      <blockquote>{comment.content}</blockquote>
      <ConfirmForm
        action={`/comment/${comment.id}/delete`}
        question="Are you sure you want to delete this comment?"
        cancelUrl={`/posts/${comment.postId}`}
      />
    </Layout>,
  );
});

posts.post("/comment/:id/delete", async (c) => {
  const user = requireUser(c.get("user"));
  const comment = await deleteComment(db, c.req.param("id"), user);
  return c.redirect(`/posts/${comment.postId}`);
});

export default posts;
