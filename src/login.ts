import type { Context } from "hono";
import { deleteCookie, getSignedCookie, setSignedCookie } from "hono/cookie";
import { createMiddleware } from "hono/factory";
import { getUser } from "./accounts";
import { config } from "./config";
import db from "./db";
import { UnauthenticatedError } from "./errors";
import type { User } from "./schema";
import { isUuid } from "./uuid";

export const SESSION_COOKIE = "penpost_session";
export const SESSION_MAX_AGE = 60 * 60 * 24 * 14;

export type Variables = {
  user: User | null;
};

export type Env = { Variables: Variables };

/**
 * Resolve the session cookie into the `user` variable; `null` when there
 * is no valid session.
 */
export const session = createMiddleware<Env>(async (c, next) => {
  const userId = await getSignedCookie(c, config.SECRET_KEY, SESSION_COOKIE);
  const user =
    typeof userId === "string" && isUuid(userId)
      ? ((await getUser(db, userId)) ?? null)
      : null;
  c.set("user", user);
  await next();
});

/**
 * @throws {UnauthenticatedError} When nobody is logged in.
 */
export function requireUser(user: User | null): User {
  if (user == null) throw new UnauthenticatedError();
  return user;
}

export async function logIn(c: Context<Env>, user: User): Promise<void> {
  await setSignedCookie(c, SESSION_COOKIE, user.id, config.SECRET_KEY, {
    path: "/",
    httpOnly: true,
    sameSite: "Lax",
    maxAge: SESSION_MAX_AGE,
  });
  c.set("user", user);
}

export function logOut(c: Context<Env>): void {
  deleteCookie(c, SESSION_COOKIE, { path: "/" });
  c.set("user", null);
}

/**
 * Only same-site absolute paths are followed after login; anything else
 * falls back to the profile page.
 */
export function safeNextPath(next: string | undefined): string {
  if (next == null || !next.startsWith("/") || next.startsWith("//")) {
    return "/profile";
  }
  if (next.includes("\\")) return "/profile";
  return next;
}
