/**
 * Telemetry Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  AttributeValue,
  ExportPipeline,
  Gauge,
  MetricAttributes,
  MetricEmitter,
  TelemetrySettings,
} from "./schema.js";
export type { TelemetryError } from "./errors.js";

export { METER_NAME, ZONE_TEMPERATURE_METRIC } from "./schema.js";

// Error utilities
export { formatTelemetryError } from "./errors.js";

// Service functions (side effects)
export {
  buildExportPipeline,
  createMetricEmitter,
  shutdownExportPipeline,
} from "./service.js";
