/**
 * Monitor Module - Public API
 *
 * Exports types and service functions for per-controller monitoring.
 */

// Types
export type {
  MonitorOptions,
  MonitorOutcome,
  MonitorSnapshot,
  MonitorState,
} from "./schema.js";
export type { MonitorError } from "./errors.js";

// Error utilities
export { formatMonitorError } from "./errors.js";

// Service functions
export {
  controllerId,
  getMonitorSnapshots,
  monitorController,
  resetMonitorSnapshots,
} from "./service.js";
