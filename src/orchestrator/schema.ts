/**
 * Orchestrator Module - Schemas and Types
 *
 * Inputs and outcomes of one exporter run.
 */
import type { Result } from "neverthrow";

import type { DiscoverControllers } from "../airtouch/index.js";
import type { ExportPipeline, TelemetryError } from "../telemetry/index.js";

/**
 * Per-run options.
 */
export type RunOptions = Readonly<{
  /** Restrict discovery to one console; null broadcasts */
  targetHost: string | null;
  /** Aborted on operator shutdown */
  signal: AbortSignal;
  discoveryTimeoutMs: number;
  initTimeoutMs: number;
}>;

/**
 * Collaborators the orchestrator drives. Injected so tests can replace them.
 */
export type RunDependencies = Readonly<{
  buildPipeline: () => Result<ExportPipeline, TelemetryError>;
  discover: DiscoverControllers;
}>;

/**
 * How a monitor task finished, as seen by the supervisor.
 */
export type MonitorTaskResult = "STOPPED" | "CANCELLED" | "FAILED" | "CRASHED";

/**
 * How a run ended without a fatal error.
 */
export type RunOutcome =
  | {
      /** Operator shutdown */
      readonly type: "STOPPED";
      readonly controllers: number;
      readonly failed: number;
    }
  | {
      /** Discovery found nothing */
      readonly type: "NO_CONTROLLERS";
    }
  | {
      /** Every monitor ended on its own before shutdown */
      readonly type: "NO_ACTIVE_CONTROLLERS";
      readonly controllers: number;
    };
