/**
 * Status routes for the AirTouch telemetry exporter.
 *
 * - /api/health - Liveness and monitor summary
 * - /api/controllers - One snapshot per controller monitor
 */
import { Hono } from "hono";
import { createLogger } from "../logger.js";
import { getMonitorSnapshots } from "../monitor/index.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

const startedAt = Date.now();

export const routes = new Hono();

// =============================================================================
// Health Check
// =============================================================================

/**
 * Health endpoint - 200 while at least one controller is monitored,
 * 503 otherwise. Used by the process supervisor.
 */
routes.get("/api/health", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "Health check");

  const snapshots = getMonitorSnapshots();
  const activeControllers = snapshots.filter(
    (snapshot) => snapshot.state === "ACTIVE",
  ).length;
  const samplesRecorded = snapshots.reduce(
    (total, snapshot) => total + snapshot.samplesRecorded,
    0,
  );

  return c.json(
    {
      status: activeControllers > 0 ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      requestId,
      version: APP_VERSION,
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      controllers: snapshots.length,
      activeControllers,
      samplesRecorded,
    },
    activeControllers > 0 ? 200 : 503,
  );
});

/**
 * Version endpoint - returns app version.
 */
routes.get("/api/version", (c) => {
  return c.json({ version: APP_VERSION });
});

// =============================================================================
// Controllers
// =============================================================================

/**
 * Monitor snapshots, one per discovered controller.
 */
routes.get("/api/controllers", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "GET /api/controllers");

  return c.json({
    controllers: getMonitorSnapshots(),
    requestId,
  });
});
