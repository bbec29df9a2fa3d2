import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { compress } from "hono/compress";
import { cors } from "hono/cors";
import { z } from "zod";
import { getUser } from "../accounts";
import {
  addComment,
  deleteComment,
  listComments,
  updateComment,
} from "../comments";
import { config } from "../config";
import db from "../db";
import {
  serializeComment,
  serializePost,
  serializePostDetail,
} from "../entities/post";
import { NotFoundError } from "../errors";
import { requestBody } from "../helpers";
import { type Env, requireUser } from "../login";
import { createPost, deletePost, getPost, updatePost } from "../posts";
import {
  type ListCriteria,
  listPosts,
  pageUrl,
  parseListingParams,
} from "../search";
import { getTagBySlug, listTags } from "../tags";
import { isUuid, uuid } from "../uuid";

const app = new Hono<Env>();

app.use("*", compress());

app.use(
  cors({
    origin: "*",
    allowMethods: ["GET", "HEAD", "POST", "DELETE", "PATCH"],
  }),
);

function idParam(message: string) {
  return zValidator("param", z.object({ id: uuid }), (result) => {
    if (!result.success) throw new NotFoundError(message);
  });
}

/**
 * Run the listing described by the query string of `url`, narrowed by
 * `scope`, and shape it as a paginated response body.
 */
async function listing(
  url: string,
  query: Record<string, string>,
  scope: (criteria: ListCriteria) => ListCriteria = (criteria) => criteria,
) {
  const { criteria, page, errors } = parseListingParams(
    query,
    config.PAGE_SIZE,
  );
  const { items, info } = await listPosts(db, scope(criteria), page);
  return {
    count: info.totalCount,
    next: info.hasNext ? pageUrl(url, info.page + 1) : null,
    previous: info.hasPrevious ? pageUrl(url, info.page - 1) : null,
    results: items.map((post) => serializePost(post, url)),
    ...(Object.keys(errors).length > 0 ? { errors } : {}),
  };
}

app.get("/posts", async (c) => {
  return c.json(await listing(c.req.url, c.req.query()));
});

app.post("/posts", async (c) => {
  const user = requireUser(c.get("user"));
  const post = await createPost(db, user, await requestBody(c.req));
  const created = await getPost(db, post.id);
  return c.json(serializePostDetail(created, c.req.url), 201);
});

app.get("/posts/:id", idParam("No such post"), async (c) => {
  const post = await getPost(db, c.req.valid("param").id);
  return c.json(serializePostDetail(post, c.req.url));
});

app.patch("/posts/:id", idParam("No such post"), async (c) => {
  const user = requireUser(c.get("user"));
  const { id } = c.req.valid("param");
  await updatePost(db, id, user, await requestBody(c.req));
  return c.json(serializePostDetail(await getPost(db, id), c.req.url));
});

app.delete("/posts/:id", idParam("No such post"), async (c) => {
  const user = requireUser(c.get("user"));
  await deletePost(db, c.req.valid("param").id, user);
  return c.body(null, 204);
});

app.get("/posts/:id/comments", idParam("No such post"), async (c) => {
  const comments = await listComments(db, c.req.valid("param").id);
  return c.json(comments.map(serializeComment));
});

app.post("/posts/:id/comments", idParam("No such post"), async (c) => {
  const user = requireUser(c.get("user"));
  const comment = await addComment(
    db,
    c.req.valid("param").id,
    user,
    await requestBody(c.req),
  );
  return c.json(serializeComment(comment), 201);
});

app.patch("/comments/:id", idParam("No such comment"), async (c) => {
  const user = requireUser(c.get("user"));
  const comment = await updateComment(
    db,
    c.req.valid("param").id,
    user,
    await requestBody(c.req),
  );
  return c.json(serializeComment(comment));
});

app.delete("/comments/:id", idParam("No such comment"), async (c) => {
  const user = requireUser(c.get("user"));
  await deleteComment(db, c.req.valid("param").id, user);
  return c.body(null, 204);
});

app.get("/tags", async (c) => {
  const tags = await listTags(db);
  return c.json(
    tags.map((tag) => ({
      name: tag.name,
      slug: tag.slug,
      posts_count: tag.postsCount,
    })),
  );
});

app.get("/tags/:slug/posts", async (c) => {
  const tag = await getTagBySlug(db, c.req.param("slug"));
  if (tag == null) throw new NotFoundError("No such tag");
  return c.json(
    await listing(c.req.url, c.req.query(), (criteria) => ({
      ...criteria,
      tags: [tag.name, ...criteria.tags],
    })),
  );
});

app.get("/users/:id/posts", async (c) => {
  const id = c.req.param("id");
  const user = isUuid(id) ? await getUser(db, id) : undefined;
  if (user == null) throw new NotFoundError("No such user");
  return c.json(
    await listing(c.req.url, c.req.query(), (criteria) => ({
      ...criteria,
      authorId: user.id,
    })),
  );
});

export default app;
