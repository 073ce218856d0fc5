/**
 * Status endpoint server.
 *
 * Sets up Hono with request ID tracing, the global error handler and the
 * status routes, served on Node through @hono/node-server.
 */
import { type ServerType, serve } from "@hono/node-server";
import { Hono } from "hono";

import { createLogger } from "../logger.js";
import { statusErrorHandler } from "./errorHandler.js";
import { requestContext } from "./middleware/requestContext.js";
import { routes } from "./routes.js";

const log = createLogger("api");

/**
 * Build the status app.
 */
export function createStatusApp(): Hono {
  const app = new Hono();

  // Global middleware
  app.use("*", requestContext);

  // Error handler
  app.onError(statusErrorHandler);

  // Mount routes
  app.route("/", routes);

  return app;
}

/**
 * Start listening on the given port.
 */
export function startStatusServer(port: number): ServerType {
  const app = createStatusApp();

  return serve({ fetch: app.fetch, port, hostname: "0.0.0.0" }, (info) => {
    log.info({ port: info.port }, "Status endpoint listening");
  });
}

/**
 * Stop accepting connections and wait for the server to close.
 */
export function stopStatusServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
