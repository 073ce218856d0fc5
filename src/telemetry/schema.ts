/**
 * Telemetry Module - Schemas and Types
 *
 * Defines the metric sample shape and the export pipeline capabilities.
 */

// =============================================================================
// Metric Attributes
// =============================================================================

/**
 * Attribute values: integers, floats and strings.
 */
export type AttributeValue = number | string;

/**
 * Flat attribute map attached to one sample. Rebuilt for every sample.
 */
export type MetricAttributes = Readonly<Record<string, AttributeValue>>;

/**
 * The single gauge this exporter records.
 */
export const ZONE_TEMPERATURE_METRIC = {
  name: "airtouch.zone.temperature",
  unit: "C",
  description:
    "Current zone temperature. Other zone states are included as attributes.",
} as const;

export const METER_NAME = "airtouch.monitor";

// =============================================================================
// Export Pipeline
// =============================================================================

/**
 * Settings for the OTLP export pipeline.
 */
export type TelemetrySettings = Readonly<{
  licenseKey: string | undefined;
  endpoint: string;
  serviceName: string;
  exportIntervalMs: number;
}>;

/**
 * Instantaneous-value instrument.
 */
export interface Gauge {
  set(value: number, attributes: MetricAttributes): void;
}

/**
 * Constructed once at startup and passed down explicitly.
 */
export interface ExportPipeline {
  createGauge(name: string, unit: string, description: string): Gauge;
  /** Export everything recorded so far */
  forceFlush(): Promise<void>;
  /** Flush and stop the periodic reader */
  shutdown(): Promise<void>;
}

/**
 * Records samples on the shared gauge.
 */
export interface MetricEmitter {
  record(value: number, attributes: MetricAttributes): void;
  /** Samples recorded since startup */
  recordedCount(): number;
}
