/**
 * Telemetry Module - Service Layer
 *
 * Builds the OpenTelemetry export pipeline (OTLP/HTTP exporter behind a
 * periodic reader) and the emitter that records samples on the shared gauge.
 * The meter provider is owned by the pipeline object; nothing is registered
 * globally.
 */
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { Resource } from "@opentelemetry/resources";
import {
  MeterProvider,
  PeriodicExportingMetricReader,
  type PushMetricExporter,
} from "@opentelemetry/sdk-metrics";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type TelemetryError,
  flushFailed,
  missingCredential,
  pipelineFailed,
} from "./errors.js";
import type {
  ExportPipeline,
  Gauge,
  MetricAttributes,
  MetricEmitter,
  TelemetrySettings,
} from "./schema.js";
import { METER_NAME } from "./schema.js";

const log = createLogger("telemetry");

/** The reader rejects an export timeout longer than its interval. */
const MAX_EXPORT_TIMEOUT_MS = 30000;

// =============================================================================
// Export Pipeline
// =============================================================================

/**
 * Build the export pipeline. Fails fast when the credential is absent.
 *
 * @param settings - Endpoint, credential and cadence
 * @param exporter - Replaces the OTLP exporter (tests use an in-memory one)
 */
export function buildExportPipeline(
  settings: TelemetrySettings,
  exporter?: PushMetricExporter,
): Result<ExportPipeline, TelemetryError> {
  const licenseKey = settings.licenseKey?.trim();
  if (!licenseKey) {
    return err(missingCredential("NEW_RELIC_LICENSE_KEY is not set"));
  }

  try {
    const reader = new PeriodicExportingMetricReader({
      exporter:
        exporter ??
        new OTLPMetricExporter({
          url: settings.endpoint,
          headers: { "api-key": licenseKey },
        }),
      exportIntervalMillis: settings.exportIntervalMs,
      exportTimeoutMillis: Math.min(MAX_EXPORT_TIMEOUT_MS, settings.exportIntervalMs),
    });

    const provider = new MeterProvider({
      resource: new Resource({ "service.name": settings.serviceName }),
      readers: [reader],
    });
    const meter = provider.getMeter(METER_NAME);

    log.info(
      {
        endpoint: settings.endpoint,
        serviceName: settings.serviceName,
        exportIntervalMs: settings.exportIntervalMs,
      },
      "Export pipeline ready",
    );

    const pipeline: ExportPipeline = {
      createGauge(name, unit, description): Gauge {
        const gauge = meter.createGauge(name, { unit, description });
        return {
          set: (value, attributes) => gauge.record(value, attributes),
        };
      },
      forceFlush: () => provider.forceFlush(),
      shutdown: () => provider.shutdown(),
    };

    return ok(pipeline);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(pipelineFailed(cause.message, cause));
  }
}

/**
 * Flush outstanding samples and stop the pipeline.
 */
export async function shutdownExportPipeline(
  pipeline: ExportPipeline,
): Promise<Result<true, TelemetryError>> {
  try {
    await pipeline.shutdown();
    log.info("Export pipeline flushed and stopped");
    return ok(true);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(flushFailed(cause.message, cause));
  }
}

// =============================================================================
// Metric Emitter
// =============================================================================

/**
 * Wrap the shared gauge. Recording is synchronous, so a sample is handed to
 * the gauge whole even when several monitors record in the same tick.
 */
export function createMetricEmitter(gauge: Gauge): MetricEmitter {
  let recorded = 0;

  return {
    record(value: number, attributes: MetricAttributes): void {
      gauge.set(value, attributes);
      recorded++;
    },
    recordedCount: () => recorded,
  };
}
