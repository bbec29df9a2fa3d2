import { beforeEach, describe, expect, it } from "vitest";

import { cleanDatabase, createUser } from "../../tests/helpers";
import { formHeaders, logInAs } from "../../tests/helpers/session";
import { getAccount } from "../accounts";
import db from "../db";
import app from "../index";
import { SESSION_COOKIE } from "../login";

function form(values: Record<string, string>): string {
  return new URLSearchParams(values).toString();
}

describe.sequential("account pages", () => {
  beforeEach(async () => {
    await cleanDatabase();
  });

  describe("registration", () => {
    const registration = {
      username: "ada",
      email: "ada@example.com",
      first_name: "Ada",
      last_name: "Lovelace",
      password1: "test-password",
      password2: "test-password",
    };

    it("creates the account and logs in", async () => {
      expect.assertions(4);

      const response = await app.request("/register", {
        method: "POST",
        headers: formHeaders(),
        body: form(registration),
      });
      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toBe("/profile?done=registered");
      const cookie = response.headers.get("Set-Cookie") ?? "";
      expect(cookie.startsWith(`${SESSION_COOKIE}=`)).toBe(true);

      const profile = await app.request("/profile?done=registered", {
        headers: { Cookie: cookie.split(";")[0] },
      });
      expect(await profile.text()).toContain("Your account has been created.");
    });

    it("shows every error and keeps the entered values", async () => {
      expect.assertions(4);

      const response = await app.request("/register", {
        method: "POST",
        headers: formHeaders(),
        body: form({
          ...registration,
          email: "nope",
          password2: "something-else",
        }),
      });
      expect(response.status).toBe(400);
      const html = await response.text();
      expect(html).toContain("Enter a valid email address.");
      expect(html).toContain("The two password fields didn&#39;t match.");
      expect(html).toContain('value="ada"');
    });

    it("sends logged-in users to their profile", async () => {
      expect.assertions(2);

      const user = await createUser();
      const cookie = await logInAs(user);
      const response = await app.request("/register", {
        headers: { Cookie: cookie },
      });
      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toBe("/profile");
    });
  });

  describe("login and logout", () => {
    it("follows a same-site next path", async () => {
      expect.assertions(1);

      const user = await createUser();
      const response = await app.request("/login", {
        method: "POST",
        headers: formHeaders(),
        body: form({
          username: user.username,
          password: "test-password",
          next: "/posts?q=django",
        }),
      });
      expect(response.headers.get("Location")).toBe("/posts?q=django");
    });

    it("ignores an off-site next path", async () => {
      expect.assertions(1);

      const user = await createUser();
      const response = await app.request("/login", {
        method: "POST",
        headers: formHeaders(),
        body: form({
          username: user.username,
          password: "test-password",
          next: "//evil.example/",
        }),
      });
      expect(response.headers.get("Location")).toBe("/profile");
    });

    it("rejects a wrong password", async () => {
      expect.assertions(3);

      const user = await createUser();
      const response = await app.request("/login", {
        method: "POST",
        headers: formHeaders(),
        body: form({ username: user.username, password: "wrong-password" }),
      });
      expect(response.status).toBe(400);
      expect(response.headers.get("Set-Cookie")).toBeNull();
      expect(await response.text()).toContain(
        "Please enter a correct username and password.",
      );
    });

    it("logs out", async () => {
      expect.assertions(3);

      const user = await createUser();
      const cookie = await logInAs(user);
      const response = await app.request("/logout", {
        method: "POST",
        headers: formHeaders(cookie),
        body: "",
      });
      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toBe("/");
      expect(response.headers.get("Set-Cookie")).toContain("Max-Age=0");
    });

    it("ignores a tampered session cookie", async () => {
      expect.assertions(1);

      const response = await app.request("/profile", {
        headers: { Cookie: `${SESSION_COOKIE}=forged.value` },
      });
      expect(response.headers.get("Location")).toBe(
        "/login?next=%2Fprofile",
      );
    });
  });

  describe("profile", () => {
    it("updates the profile", async () => {
      expect.assertions(3);

      const user = await createUser();
      const cookie = await logInAs(user);
      const response = await app.request("/profile", {
        method: "POST",
        headers: formHeaders(cookie),
        body: form({
          email: "updated@example.com",
          first_name: "Ada",
          last_name: "",
          bio: "Engines.",
          location: "London",
          website: "",
          avatar_url: "",
        }),
      });
      expect(response.headers.get("Location")).toBe("/profile?done=updated");
      const account = await getAccount(db, user.id);
      expect(account.email).toBe("updated@example.com");
      expect(account.profile.location).toBe("London");
    });

    it("re-renders the form with errors", async () => {
      expect.assertions(2);

      const user = await createUser();
      const cookie = await logInAs(user);
      const response = await app.request("/profile", {
        method: "POST",
        headers: formHeaders(cookie),
        body: form({ email: "", website: "nope" }),
      });
      expect(response.status).toBe(400);
      expect(await response.text()).toContain("Enter a valid URL.");
    });
  });
});
