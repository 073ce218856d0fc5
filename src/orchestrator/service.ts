/**
 * Orchestrator Module - Service Layer
 *
 * Top-level driver: builds the export pipeline, discovers controllers, runs
 * one monitor per controller and supervises them as a group. A monitor that
 * fails is reported and counted as finished; it never cancels its siblings.
 */
import { type Result, err, ok } from "neverthrow";

import type { ControllerHandle } from "../airtouch/index.js";
import { type TimedResult, withTimeout } from "../async.js";
import { createLogger, logOperationFailed } from "../logger.js";
import { controllerId, monitorController } from "../monitor/index.js";
import {
  type ExportPipeline,
  type MetricEmitter,
  ZONE_TEMPERATURE_METRIC,
  createMetricEmitter,
  formatTelemetryError,
  shutdownExportPipeline,
} from "../telemetry/index.js";
import {
  type OrchestratorError,
  configurationError,
  discoveryFailed,
  discoveryTimeout,
} from "./errors.js";
import type {
  MonitorTaskResult,
  RunDependencies,
  RunOptions,
  RunOutcome,
} from "./schema.js";

const log = createLogger("orchestrator");

/**
 * Run the exporter until the signal is aborted.
 *
 * The pipeline is built before discovery; when that fails discovery is never
 * attempted.
 */
export async function runExporter(
  options: RunOptions,
  deps: RunDependencies,
): Promise<Result<RunOutcome, OrchestratorError>> {
  // 1. Export pipeline
  const built = deps.buildPipeline();
  if (built.isErr()) {
    return err(configurationError(built.error));
  }

  const pipeline = built.value;
  const emitter = createMetricEmitter(
    pipeline.createGauge(
      ZONE_TEMPERATURE_METRIC.name,
      ZONE_TEMPERATURE_METRIC.unit,
      ZONE_TEMPERATURE_METRIC.description,
    ),
  );

  // 2. Discovery
  if (options.targetHost) {
    log.info(`Attempting to connect to AirTouch at ${options.targetHost}...`);
  } else {
    log.info("Searching for AirTouch systems on the local network...");
  }

  let discovered: TimedResult<ControllerHandle[]>;
  try {
    discovered = await withTimeout(
      deps.discover(options.targetHost),
      options.discoveryTimeoutMs,
      options.signal,
    );
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    await stopPipeline(pipeline);
    return err(discoveryFailed(cause.message, cause));
  }

  if (discovered.type === "TIMED_OUT") {
    await stopPipeline(pipeline);
    return err(discoveryTimeout(discovered.timeoutMs));
  }

  if (discovered.type === "ABORTED") {
    await stopPipeline(pipeline);
    return ok({ type: "STOPPED", controllers: 0, failed: 0 });
  }

  const controllers = discovered.value;
  if (controllers.length === 0) {
    log.info("No AirTouch systems were discovered.");
    await stopPipeline(pipeline);
    return ok({ type: "NO_CONTROLLERS" });
  }

  log.info(`Discovered ${controllers.length} AirTouch system(s):`);
  for (const controller of controllers) {
    log.info(`  - ${controllerId(controller)}`);
  }

  // 3. One monitor per controller, supervised as a group
  const results = await Promise.all(
    controllers.map((controller) =>
      superviseMonitor(controller, emitter, options),
    ),
  );

  const failed = results.filter(
    (result) => result === "FAILED" || result === "CRASHED",
  ).length;

  // 4. Wind down
  await Promise.all(controllers.map(closeController));
  await stopPipeline(pipeline);

  if (!options.signal.aborted) {
    log.error(
      { controllers: controllers.length, failed },
      "Every monitor ended before shutdown was requested",
    );
    return ok({ type: "NO_ACTIVE_CONTROLLERS", controllers: controllers.length });
  }

  log.info(
    { controllers: controllers.length, failed, samplesRecorded: emitter.recordedCount() },
    "All monitors stopped",
  );
  return ok({ type: "STOPPED", controllers: controllers.length, failed });
}

/**
 * Run one monitor, reporting anything it throws instead of letting it reach
 * the group.
 */
async function superviseMonitor(
  controller: ControllerHandle,
  emitter: MetricEmitter,
  options: RunOptions,
): Promise<MonitorTaskResult> {
  try {
    const result = await monitorController(controller, emitter, {
      signal: options.signal,
      initTimeoutMs: options.initTimeoutMs,
    });

    if (result.isErr()) {
      return "FAILED";
    }
    return result.value.type;
  } catch (error) {
    logOperationFailed(log, "monitor", error, {
      controller: controllerId(controller),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return "CRASHED";
  }
}

async function closeController(controller: ControllerHandle): Promise<void> {
  try {
    await controller.close();
  } catch (error) {
    log.warn(
      {
        controller: controllerId(controller),
        error: error instanceof Error ? error.message : String(error),
      },
      "Failed to close controller connection",
    );
  }
}

async function stopPipeline(pipeline: ExportPipeline): Promise<void> {
  const result = await shutdownExportPipeline(pipeline);
  if (result.isErr()) {
    log.error({ errorType: result.error.type }, formatTelemetryError(result.error));
  }
}
