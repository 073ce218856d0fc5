/**
 * Monitor Module - Error Types
 *
 * Typed error unions for controller initialization and lost connections.
 * Errors are values, not exceptions.
 */

/**
 * Errors that end a monitor. They never reach sibling monitors.
 */
export type MonitorError =
  | {
      readonly type: "INIT_FAILED";
      readonly controller: string;
    }
  | {
      readonly type: "INIT_TIMEOUT";
      readonly controller: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "INIT_ERROR";
      readonly controller: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "CONNECTION_LOST";
      readonly controller: string;
      readonly reason: string;
    };

/**
 * Create an INIT_FAILED error.
 */
export function initFailed(controller: string): MonitorError {
  return { type: "INIT_FAILED", controller };
}

/**
 * Create an INIT_TIMEOUT error.
 */
export function initTimeout(controller: string, timeoutMs: number): MonitorError {
  return { type: "INIT_TIMEOUT", controller, timeoutMs };
}

/**
 * Create an INIT_ERROR error.
 */
export function initError(
  controller: string,
  message: string,
  cause?: Error,
): MonitorError {
  if (cause) {
    return { type: "INIT_ERROR", controller, message, cause };
  }
  return { type: "INIT_ERROR", controller, message };
}

/**
 * Create a CONNECTION_LOST error.
 */
export function connectionLost(controller: string, reason: string): MonitorError {
  return { type: "CONNECTION_LOST", controller, reason };
}

/**
 * Format a MonitorError for logging.
 */
export function formatMonitorError(error: MonitorError): string {
  switch (error.type) {
    case "INIT_FAILED":
      return `Error: ${error.controller} initialisation failed.`;
    case "INIT_TIMEOUT":
      return `Error: ${error.controller} initialisation timed out after ${error.timeoutMs}ms.`;
    case "INIT_ERROR":
      return `Error: ${error.controller} initialisation raised: ${error.message}`;
    case "CONNECTION_LOST":
      return `Error: ${error.controller} connection lost: ${error.reason}`;
  }
}
