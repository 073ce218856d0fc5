/**
 * Orchestrator Module - Public API
 */

// Types
export type {
  MonitorTaskResult,
  RunDependencies,
  RunOptions,
  RunOutcome,
} from "./schema.js";
export type { OrchestratorError } from "./errors.js";

// Error utilities
export { formatOrchestratorError } from "./errors.js";

// Service functions
export { runExporter } from "./service.js";
