/**
 * Error boundary for the status endpoint.
 *
 * A route that throws answers 500 in the same envelope as `/api/health`
 * (`status`, `timestamp`, `requestId`). The log line carries the monitor
 * counts of the moment so a failing probe can be matched to exporter state.
 */
import type { ErrorHandler } from "hono";
import { createLogger } from "../logger.js";
import { getMonitorSnapshots } from "../monitor/index.js";

const log = createLogger("api");

export const statusErrorHandler: ErrorHandler = (error, c) => {
  const requestId = c.get("requestId");
  const snapshots = getMonitorSnapshots();

  log.error(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      controllers: snapshots.length,
      activeControllers: snapshots.filter((s) => s.state === "ACTIVE").length,
      error: error.message,
      stack: error.stack,
    },
    "Status request failed",
  );

  return c.json(
    {
      status: "error",
      timestamp: new Date().toISOString(),
      requestId,
      error: "Internal server error",
    },
    500,
  );
};
