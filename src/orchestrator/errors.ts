/**
 * Orchestrator Module - Error Types
 *
 * Fatal errors of a run. Each maps to its own process exit code.
 */
import { type TelemetryError, formatTelemetryError } from "../telemetry/index.js";

/**
 * Errors that end the whole run.
 */
export type OrchestratorError =
  | {
      readonly type: "CONFIGURATION_ERROR";
      readonly message: string;
      readonly cause: TelemetryError;
    }
  | {
      readonly type: "DISCOVERY_TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "DISCOVERY_FAILED";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a CONFIGURATION_ERROR from a pipeline failure.
 */
export function configurationError(cause: TelemetryError): OrchestratorError {
  return {
    type: "CONFIGURATION_ERROR",
    message: formatTelemetryError(cause),
    cause,
  };
}

/**
 * Create a DISCOVERY_TIMEOUT error.
 */
export function discoveryTimeout(timeoutMs: number): OrchestratorError {
  return {
    type: "DISCOVERY_TIMEOUT",
    message: "Discovery did not finish in time",
    timeoutMs,
  };
}

/**
 * Create a DISCOVERY_FAILED error.
 */
export function discoveryFailed(message: string, cause?: Error): OrchestratorError {
  if (cause) {
    return { type: "DISCOVERY_FAILED", message, cause };
  }
  return { type: "DISCOVERY_FAILED", message };
}

/**
 * Format an OrchestratorError for logging.
 */
export function formatOrchestratorError(error: OrchestratorError): string {
  switch (error.type) {
    case "CONFIGURATION_ERROR":
      return error.message;
    case "DISCOVERY_TIMEOUT":
      return `Discovery timed out after ${error.timeoutMs}ms`;
    case "DISCOVERY_FAILED":
      return `Discovery failed: ${error.message}`;
  }
}
