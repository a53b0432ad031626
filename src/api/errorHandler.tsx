/**
 * Global error boundary - catches anything a route throws instead of
 * returning a CecError Result.
 *
 * JSON clients get the standard error body with a 500. The dashboard gets an
 * error entry for its activity log, with a 200 so htmx swaps it in.
 */
import type { ErrorHandler } from "hono";
import { config } from "../config.js";
import { createLogger } from "../logger.js";
import { CommandResult } from "../ui/components/CommandResult.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";
  const route = `${c.req.method} ${c.req.routePath}`;

  log.error(
    {
      operation: "unhandledError",
      requestId,
      route,
      path: c.req.path,
      error: err.message,
      stack: err.stack,
    },
    `❌ Unhandled error in ${route}`,
  );

  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  if (c.req.header("HX-Request") === "true") {
    return c.html(
      <CommandResult
        label="Request failed"
        success={false}
        message={message}
        timestamp={new Date()}
        requestId={requestId}
      />,
    );
  }

  return c.json({ status: "error", message, requestId }, 500);
};
