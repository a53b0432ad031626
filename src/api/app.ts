/**
 * Hono application: middleware, error boundary, static files and routes.
 */
import { serveStatic } from "@hono/node-server/serve-static";
import { Hono } from "hono";

import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { type RouteDeps, createRoutes } from "./routes.js";

export function createApp(deps: RouteDeps): Hono {
  const app = new Hono();

  // Global middleware
  app.use("*", requestIdMiddleware);

  // Error handler
  app.onError(errorHandler);

  // Static files (public directory, relative to the working directory)
  app.use("/public/*", serveStatic({ root: "./" }));

  app.route("/", createRoutes(deps));

  return app;
}
