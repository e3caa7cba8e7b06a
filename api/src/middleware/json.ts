/**
 * JSON Content Negotiation Middleware
 *
 * Every API response is JSON. Requests that carry a body must declare
 * `application/json` somewhere in their Content-Type list.
 */

import type { Context, Next } from "hono";
import { splitHeaderList } from "../shared/utils.ts";

export const JSON_CONTENT_TYPE = "application/json; charset=UTF-8";

const BODY_METHODS = new Set(["POST", "PUT", "PATCH"]);

function declaresJson(contentType: string | undefined): boolean {
  return splitHeaderList(contentType).some((value) => {
    const [mediaType] = value.split(";");
    return mediaType.trim().toLowerCase() === "application/json";
  });
}

function withJsonContentType(res: Response): Response {
  const headers = new Headers(res.headers);
  headers.set("Content-Type", JSON_CONTENT_TYPE);
  return new Response(res.body, {
    status: res.status,
    statusText: res.statusText,
    headers,
  });
}

export async function jsonOnly(c: Context, next: Next): Promise<void | Response> {
  if (BODY_METHODS.has(c.req.method)) {
    const contentType = c.req.header("Content-Type");
    if (!declaresJson(contentType)) {
      return withJsonContentType(
        c.json({ error: `Media type (${contentType ?? ""}) not supported` }, 415),
      );
    }
  }

  await next();
  c.res = withJsonContentType(c.res);
}
