import type { HonoRequest } from "hono";
import { z } from "zod";

const jsonObject = z.record(z.string(), z.unknown());

export type RequestInput = Record<string, unknown>;

/**
 * Read a request body as a flat record of field values, whether it was
 * sent as JSON or as form data.  A JSON body that is not an object reads
 * as no fields at all.
 */
export async function requestBody(req: HonoRequest): Promise<RequestInput> {
  const contentType = req.header("Content-Type")?.toLowerCase();
  if (contentType?.startsWith("application/json")) {
    const json: unknown = await req.json().catch(() => null);
    const result = jsonObject.safeParse(json);
    return result.success ? result.data : {};
  }

  // Clients that post form data without a Content-Type make Hono's
  // parseBody() treat the body as text/plain and return nothing.
  if (
    contentType === undefined ||
    contentType === "text/plain" ||
    contentType.startsWith("text/plain;")
  ) {
    const text = await req.text();
    if (!text.includes("=")) return {};
    return Object.fromEntries(new URLSearchParams(text));
  }

  return await req.parseBody();
}

