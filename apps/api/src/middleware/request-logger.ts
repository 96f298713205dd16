import type { MiddlewareHandler } from "hono";
import type { Logger } from "@tally/observability";
import type { AppBindings } from "../types/context.js";

/**
 * Attach a request-scoped child logger and log each completed request
 */
export function requestLoggerMiddleware(baseLogger: Logger): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const startedAt = performance.now();
    const log = baseLogger.child({ requestId: c.get("requestId") });
    c.set("logger", log);

    await next();

    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round(performance.now() - startedAt),
      },
      "Request completed"
    );
  };
}
