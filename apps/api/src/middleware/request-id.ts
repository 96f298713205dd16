import type { Context, Next } from "hono";
import type { AppBindings } from "../types/context.js";
import { randomUUID } from "node:crypto";

/**
 * Request ID middleware
 * Reuses an incoming x-request-id (or x-correlation-id) or generates one,
 * and echoes it in the response headers for log correlation
 */
export async function requestIdMiddleware(c: Context<AppBindings>, next: Next) {
  const requestId =
    c.req.header("x-request-id") || c.req.header("x-correlation-id") || randomUUID();

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  await next();
}
