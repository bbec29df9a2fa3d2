import { getLogger } from "@logtape/logtape";
import { type Context, Hono } from "hono";
import { csrf } from "hono/csrf";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import api from "./api";
import { Layout } from "./components/Layout";
import {
  InvalidFilterValueError,
  NotFoundError,
  PermissionDeniedError,
  UnauthenticatedError,
  ValidationError,
} from "./errors";
import { requestLogger } from "./logging";
import { type Env, session } from "./login";
import pages from "./pages";

const logger = getLogger(["penpost", "app"]);

const app = new Hono<Env>();

app.use(requestLogger);
app.use(csrf());
app.use(session);

app.route("/api", api);
app.route("/", pages);

function isApiRequest(c: Context<Env>): boolean {
  return c.req.path === "/api" || c.req.path.startsWith("/api/");
}

function errorPage(
  c: Context<Env>,
  status: ContentfulStatusCode,
  title: string,
  message: string,
) {
  return c.html(
    <Layout title={title} user={c.get("user") ?? null}>
      <h1>{title}</h1>
      <p>{message}</p>
    </Layout>,
    status,
  );
}

app.notFound((c) => {
  if (isApiRequest(c)) {
    return c.json({ error: "not_found", message: "Not found" }, 404);
  }
  return errorPage(c, 404, "Not found", "There is nothing here.");
});

app.onError((error, c) => {
  const json = isApiRequest(c);
  if (error instanceof ValidationError) {
    if (json) {
      return c.json({ error: "validation_failed", errors: error.errors }, 400);
    }
    return errorPage(c, 400, "Bad request", error.message);
  }
  if (error instanceof InvalidFilterValueError) {
    if (json) {
      return c.json(
        {
          error: "invalid_filter_value",
          parameter: error.parameter,
          message: error.message,
        },
        400,
      );
    }
    return errorPage(c, 400, "Bad request", error.message);
  }
  if (error instanceof NotFoundError) {
    if (json) return c.json({ error: "not_found", message: error.message }, 404);
    return errorPage(c, 404, "Not found", error.message);
  }
  if (error instanceof PermissionDeniedError) {
    if (json) {
      return c.json(
        { error: "permission_denied", message: error.message },
        403,
      );
    }
    return errorPage(c, 403, "Forbidden", error.message);
  }
  if (error instanceof UnauthenticatedError) {
    if (json) return c.json({ error: "unauthorized" }, 401);
    const next = new URL(c.req.url);
    return c.redirect(
      `/login?next=${encodeURIComponent(next.pathname + next.search)}`,
    );
  }
  if (error instanceof HTTPException) return error.getResponse();
  logger.error("Unhandled error on {method} {path}: {error}", {
    method: c.req.method,
    path: c.req.path,
    error,
  });
  if (json) return c.json({ error: "internal_error" }, 500);
  return errorPage(c, 500, "Server error", "Something went wrong.");
});

export default app;
