import { beforeEach, describe, expect, it } from "vitest";

import { cleanDatabase, createPost, createUser } from "../../tests/helpers";
import { formHeaders, logInAs } from "../../tests/helpers/session";
import db from "../db";
import app from "../index";
import { getPost } from "../posts";
import type { User } from "../schema";

function form(values: Record<string, string>): string {
  return new URLSearchParams(values).toString();
}

describe.sequential("post pages", () => {
  let author: User;
  let cookie: string;

  beforeEach(async () => {
    await cleanDatabase();
    author = await createUser({ username: "alice" });
    cookie = await logInAs(author);
  });

  describe("listing", () => {
    it("renders posts with their tags on the home page", async () => {
      expect.assertions(4);

      await createPost(author, { title: "Hello Django", tags: ["django"] });

      const response = await app.request("/");
      expect(response.status).toBe(200);
      const html = await response.text();
      expect(html).toContain("Hello Django");
      expect(html).toContain('<a href="/tags/django">#django</a>');
      expect(html).toContain("1 post");
    });

    it("links to the next page keeping the filters", async () => {
      expect.assertions(1);

      for (let i = 0; i < 3; i++) {
        await createPost(author, { title: `Python ${i}` });
      }

      const response = await app.request("/posts?q=python&page_size=2");
      expect(await response.text()).toContain(
        'href="http://localhost/posts?q=python&amp;page_size=2&amp;page=2"',
      );
    });

    it("shows a bad search query above the results", async () => {
      expect.assertions(2);

      const response = await app.request("/posts?q=x");
      expect(response.status).toBe(200);
      expect(await response.text()).toContain(
        "Search query must be between 2 and 200 characters.",
      );
    });

    it("answers a malformed year with 400", async () => {
      expect.assertions(1);

      const response = await app.request("/posts?publication_year=abc");
      expect(response.status).toBe(400);
    });

    it("lists the posts of a tag and 404s for an unknown one", async () => {
      expect.assertions(3);

      await createPost(author, { title: "Tagged", tags: ["Web Dev"] });
      await createPost(author, { title: "Untagged" });

      const response = await app.request("/tags/web-dev");
      const html = await response.text();
      expect(html).toContain("Tagged");
      expect(html).not.toContain("Untagged");
      expect((await app.request("/tags/unknown")).status).toBe(404);
    });

    it("lists the posts of a user", async () => {
      expect.assertions(2);

      const bob = await createUser({ username: "bob" });
      await createPost(bob, { title: "Bob writes" });
      await createPost(author, { title: "Alice writes" });

      const html = await (await app.request(`/users/${bob.id}/posts`)).text();
      expect(html).toContain("Bob writes");
      expect(html).not.toContain("Alice writes");
    });
  });

  describe("creating posts", () => {
    it("sends anonymous users to the login page", async () => {
      expect.assertions(2);

      const response = await app.request("/post/new");
      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toBe(
        "/login?next=%2Fpost%2Fnew",
      );
    });

    it("creates a post and redirects to it", async () => {
      expect.assertions(3);

      const response = await app.request("/post/new", {
        method: "POST",
        headers: formHeaders(cookie),
        body: form({
          title: "A new post",
          content: "Content of the new post.",
          tags: "django, python",
        }),
      });
      expect(response.status).toBe(302);
      const location = response.headers.get("Location") ?? "";
      expect(location).toMatch(/^\/posts\/[0-9a-f-]{36}$/);
      const post = await getPost(db, location.slice("/posts/".length));
      expect(post.title).toBe("A new post");
    });

    it("re-renders the form with errors", async () => {
      expect.assertions(3);

      const response = await app.request("/post/new", {
        method: "POST",
        headers: formHeaders(cookie),
        body: form({ title: "", content: "Too short", tags: "" }),
      });
      expect(response.status).toBe(400);
      const html = await response.text();
      expect(html).toContain("Title is required.");
      expect(html).toContain("Content must be at least 10 characters long.");
    });

    it("rejects form posts from other origins", async () => {
      expect.assertions(1);

      const response = await app.request("/post/new", {
        method: "POST",
        headers: {
          ...formHeaders(cookie),
          Origin: "http://evil.example",
        },
        body: form({ title: "A new post", content: "Content of the post." }),
      });
      expect(response.status).toBe(403);
    });
  });

  describe("editing posts", () => {
    it("updates a post", async () => {
      expect.assertions(3);

      const post = await createPost(author, { title: "Before" });
      const page = await app.request(`/post/${post.id}/update`, {
        headers: { Cookie: cookie },
      });
      expect(await page.text()).toContain('value="Before"');

      const response = await app.request(`/post/${post.id}/update`, {
        method: "POST",
        headers: formHeaders(cookie),
        body: form({
          title: "After",
          content: "Updated content here.",
          tags: "",
        }),
      });
      expect(response.headers.get("Location")).toBe(`/posts/${post.id}`);
      expect((await getPost(db, post.id)).title).toBe("After");
    });

    it("forbids other users", async () => {
      expect.assertions(2);

      const post = await createPost(author);
      const mallory = await createUser({ username: "mallory" });
      const malloryCookie = await logInAs(mallory);

      const response = await app.request(`/post/${post.id}/update`, {
        headers: { Cookie: malloryCookie },
      });
      expect(response.status).toBe(403);
      expect(await response.text()).toContain(
        "You can only change your own posts",
      );
    });

    it("deletes a post after confirmation", async () => {
      expect.assertions(3);

      const post = await createPost(author, { title: "Doomed" });
      const confirm = await app.request(`/post/${post.id}/delete`, {
        headers: { Cookie: cookie },
      });
      expect(await confirm.text()).toContain(
        "Are you sure you want to delete &quot;Doomed&quot;?",
      );

      const response = await app.request(`/post/${post.id}/delete`, {
        method: "POST",
        headers: formHeaders(cookie),
        body: "",
      });
      expect(response.headers.get("Location")).toBe("/posts");
      expect((await app.request(`/posts/${post.id}`)).status).toBe(404);
    });
  });

  describe("comments", () => {
    it("adds a comment and shows it on the post", async () => {
      expect.assertions(3);

      const post = await createPost(author);
      const response = await app.request(`/posts/${post.id}/comments/new`, {
        method: "POST",
        headers: formHeaders(cookie),
        body: form({ content: "Great write-up" }),
      });
      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toMatch(
        new RegExp(`^/posts/${post.id}#comment-`),
      );

      const html = await (await app.request(`/posts/${post.id}`)).text();
      expect(html).toContain("Great write-up");
    });

    it("shows comment errors on the post page", async () => {
      expect.assertions(2);

      const post = await createPost(author);
      const response = await app.request(`/posts/${post.id}/comments/new`, {
        method: "POST",
        headers: formHeaders(cookie),
        body: form({ content: "" }),
      });
      expect(response.status).toBe(400);
      expect(await response.text()).toContain("Comment cannot be empty.");
    });
  });
});
