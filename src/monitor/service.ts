/**
 * Monitor Module - Service Layer
 *
 * Owns one controller's lifecycle: initialize, subscribe the zone update
 * handler to every air conditioner, record a baseline, then park until the
 * shutdown signal or a dropped connection. A failed controller is abandoned
 * for the process lifetime; its failure stays inside this task.
 */
import { type Result, err, ok } from "neverthrow";

import type { ControllerHandle } from "../airtouch/index.js";
import { type TimedResult, waitForAbort, withTimeout } from "../async.js";
import {
  createLogger,
  logOperationComplete,
  logOperationStart,
} from "../logger.js";
import type { MetricEmitter } from "../telemetry/index.js";
import { createZoneUpdateHandler } from "../zones/index.js";
import {
  type MonitorError,
  connectionLost,
  formatMonitorError,
  initError,
  initFailed,
  initTimeout,
} from "./errors.js";
import type {
  MonitorOptions,
  MonitorOutcome,
  MonitorSnapshot,
  MonitorState,
} from "./schema.js";

const log = createLogger("monitor");

// =============================================================================
// Module State
// =============================================================================

let snapshots: ReadonlyMap<string, MonitorSnapshot> = new Map();

/**
 * Get a snapshot of every monitor started in this process.
 */
export function getMonitorSnapshots(): ReadonlyArray<MonitorSnapshot> {
  return [...snapshots.values()];
}

/**
 * Forget all monitors. Used between runs in tests.
 */
export function resetMonitorSnapshots(): void {
  snapshots = new Map();
}

function updateSnapshot(id: string, changes: Partial<MonitorSnapshot>): void {
  const current = snapshots.get(id);
  if (!current) return;
  snapshots = new Map(snapshots).set(id, { ...current, ...changes });
}

function setState(id: string, state: MonitorState): void {
  updateSnapshot(id, { state });
  log.debug({ controller: id, state }, "Monitor state changed");
}

/**
 * Identify a controller in logs: `name (host)`.
 */
export function controllerId(controller: Pick<ControllerHandle, "name" | "host">): string {
  return `${controller.name} (${controller.host})`;
}

// =============================================================================
// Monitor
// =============================================================================

/**
 * Monitor one controller until the signal is aborted.
 *
 * Resolves with an error value when initialization fails; never rejects for
 * controller problems.
 */
export async function monitorController(
  controller: ControllerHandle,
  emitter: MetricEmitter,
  options: MonitorOptions,
): Promise<Result<MonitorOutcome, MonitorError>> {
  const id = controllerId(controller);
  snapshots = new Map(snapshots).set(id, {
    name: controller.name,
    host: controller.host,
    state: "UNINITIALIZED",
    samplesRecorded: 0,
    lastUpdateAt: null,
    error: null,
  });

  const fail = (error: MonitorError): Result<MonitorOutcome, MonitorError> => {
    const message = formatMonitorError(error);
    log.error({ controller: id, errorType: error.type }, message);
    updateSnapshot(id, { error: message });
    setState(id, "TERMINATED");
    return err(error);
  };

  // 1. Initialize
  setState(id, "INITIALIZING");
  const start = Date.now();
  logOperationStart(log, "initialize", { controller: id });

  let initialized: TimedResult<boolean>;
  try {
    initialized = await withTimeout(
      controller.init(),
      options.initTimeoutMs,
      options.signal,
    );
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return fail(initError(id, cause.message, cause));
  }

  switch (initialized.type) {
    case "ABORTED":
      log.info({ controller: id }, "Shutdown requested during initialization");
      setState(id, "TERMINATED");
      return ok({ type: "CANCELLED", controller: id });
    case "TIMED_OUT":
      return fail(initTimeout(id, initialized.timeoutMs));
    case "COMPLETED":
      if (!initialized.value) {
        return fail(initFailed(id));
      }
  }

  logOperationComplete(log, "initialize", start, { controller: id });

  const disconnected = new Promise<string>((resolve) => {
    controller.onDisconnect(resolve);
  });

  // 2. Subscribe and record the baseline
  let samplesRecorded = 0;
  const handler = createZoneUpdateHandler(controller, emitter, (summary) => {
    samplesRecorded += summary.recorded;
    updateSnapshot(id, {
      samplesRecorded,
      lastUpdateAt: new Date().toISOString(),
    });
  });

  for (const airConditioner of controller.airConditioners) {
    controller.subscribe(airConditioner.acId, handler);
    handler.handle(airConditioner.acId);
  }

  // 3. Park until shutdown or until the console goes away
  setState(id, "ACTIVE");
  log.info({ controller: id }, `Continuously monitoring '${id}'...`);

  const lostReason = await Promise.race([
    waitForAbort(options.signal).then(() => null),
    disconnected,
  ]);
  if (lostReason !== null) {
    return fail(connectionLost(id, lostReason));
  }

  setState(id, "TERMINATED");
  log.info({ controller: id, samplesRecorded }, "Monitor stopped");
  return ok({ type: "STOPPED", controller: id, samplesRecorded });
}
