/**
 * AirTouch Module - Error Types
 *
 * Typed error unions for console communication.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while talking to an AirTouch console.
 */
export type AirTouchError =
  | {
      readonly type: "CONNECTION_FAILED";
      readonly host: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "CONNECTION_CLOSED";
      readonly host: string;
      readonly message: string;
    };

/**
 * Create a CONNECTION_FAILED error.
 */
export function connectionFailed(
  host: string,
  message: string,
  cause?: Error,
): AirTouchError {
  if (cause) {
    return { type: "CONNECTION_FAILED", host, message, cause };
  }
  return { type: "CONNECTION_FAILED", host, message };
}

/**
 * Create a CONNECTION_CLOSED error.
 */
export function connectionClosed(host: string, message: string): AirTouchError {
  return { type: "CONNECTION_CLOSED", host, message };
}

/**
 * Format an AirTouchError for logging.
 */
export function formatAirTouchError(error: AirTouchError): string {
  switch (error.type) {
    case "CONNECTION_FAILED":
      return `Connection to ${error.host} failed: ${error.message}`;
    case "CONNECTION_CLOSED":
      return `Connection to ${error.host} closed: ${error.message}`;
  }
}
