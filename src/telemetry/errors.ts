/**
 * Telemetry Module - Error Types
 *
 * Typed error unions for the export pipeline.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while building or stopping the export pipeline.
 */
export type TelemetryError =
  | {
      readonly type: "MISSING_CREDENTIAL";
      readonly message: string;
    }
  | {
      readonly type: "PIPELINE_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "FLUSH_FAILED";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a MISSING_CREDENTIAL error.
 */
export function missingCredential(message: string): TelemetryError {
  return { type: "MISSING_CREDENTIAL", message };
}

/**
 * Create a PIPELINE_FAILED error.
 */
export function pipelineFailed(message: string, cause?: Error): TelemetryError {
  if (cause) {
    return { type: "PIPELINE_FAILED", message, cause };
  }
  return { type: "PIPELINE_FAILED", message };
}

/**
 * Create a FLUSH_FAILED error.
 */
export function flushFailed(message: string, cause?: Error): TelemetryError {
  if (cause) {
    return { type: "FLUSH_FAILED", message, cause };
  }
  return { type: "FLUSH_FAILED", message };
}

/**
 * Format a TelemetryError for logging.
 */
export function formatTelemetryError(error: TelemetryError): string {
  switch (error.type) {
    case "MISSING_CREDENTIAL":
      return `Missing telemetry credential: ${error.message}`;
    case "PIPELINE_FAILED":
      return `Export pipeline could not be built: ${error.message}`;
    case "FLUSH_FAILED":
      return `Export pipeline flush failed: ${error.message}`;
  }
}
