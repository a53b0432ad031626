/**
 * Request ID middleware - generates or propagates a request ID for tracing.
 * The ID ends up in log lines, error bodies and activity log entries.
 */
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

/** Incoming IDs are echoed into HTML and headers; anything else is replaced */
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

/**
 * Use the caller's x-request-id when it is a plain token, otherwise a UUID.
 */
export function resolveRequestId(header: string | undefined): string {
  return header !== undefined && REQUEST_ID_PATTERN.test(header)
    ? header
    : randomUUID();
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = resolveRequestId(c.req.header("x-request-id"));

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      htmx: c.req.header("HX-Request") === "true",
    },
    "→ Request started",
  );

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    "✓ Request completed",
  );
};

// Type augmentation for Hono context
declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
