import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type { Logger } from "../logger";

export const REQUEST_ID_HEADER = "x-request-id";

/**
 * Logs one `request.completed` line per request and tags the response with
 * a request ID (the caller's, when it sent one).
 */
export function requestLogging(logger: Logger) {
  return async (c: Context, next: Next) => {
    const start = performance.now();
    const incoming = c.req.header(REQUEST_ID_HEADER)?.trim();
    const requestId = incoming ? incoming : randomUUID();

    try {
      await next();
    } finally {
      const status = c.res.status;
      c.header(REQUEST_ID_HEADER, requestId);
      logger.info(
        {
          requestId,
          method: c.req.method,
          path: c.req.path,
          status,
          durationMs: Math.round(performance.now() - start),
        },
        "request.completed",
      );
    }
  };
}
