/**
 * Typed configuration - all config lives in the environment, parsed with Zod at startup.
 *
 * AirTouch Telemetry configuration covering:
 * - Runtime and logging
 * - OpenTelemetry export pipeline (New Relic OTLP endpoint)
 * - AirTouch discovery and initialization bounds
 * - Optional status endpoint
 *
 * Unlike a crash-on-import config, loading returns a Result so the entry point
 * can exit with the configuration-error code.
 */
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z
    .string()
    .default("AirTouchTelemetry")
    .describe("Application name"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info").describe("Pino log level"),

  // ==========================================================================
  // Telemetry Export
  // ==========================================================================
  NEW_RELIC_LICENSE_KEY: optionalString.describe(
    "License key sent as the OTLP api-key header",
  ),
  OTLP_ENDPOINT: z
    .string()
    .url()
    .default("https://otlp.nr-data.net:4318/v1/metrics")
    .describe("OTLP/HTTP metrics endpoint"),
  OTEL_SERVICE_NAME: z
    .string()
    .min(1)
    .default("airtouch-monitor")
    .describe("service.name resource attribute"),
  METRIC_EXPORT_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(60000)
    .describe("Periodic metric export interval (ms)"),

  // ==========================================================================
  // AirTouch Discovery
  // ==========================================================================
  AIRTOUCH_HOST: optionalString.describe(
    "Host name or IP address of a single AirTouch console",
  ),
  DISCOVERY_WINDOW_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(5000)
    .describe("How long discovery listens for console replies (ms)"),
  DISCOVERY_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30000)
    .describe("Upper bound on the whole discovery step (ms)"),
  INIT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30000)
    .describe("Upper bound on one controller's initialization (ms)"),

  // ==========================================================================
  // Status Endpoint
  // ==========================================================================
  STATUS_PORT: optionalString
    .pipe(z.coerce.number().int().min(1).max(65535).optional())
    .describe("HTTP port for /api/health and /api/controllers (disabled if unset)"),
});

export type Config = Readonly<z.infer<typeof ConfigSchema>>;

/**
 * Errors raised while reading configuration.
 */
export type ConfigError = {
  readonly type: "INVALID_CONFIG";
  readonly message: string;
  readonly issues: ReadonlyArray<string>;
};

/**
 * Format a ConfigError for logging.
 */
export function formatConfigError(error: ConfigError): string {
  return `Invalid configuration: ${error.issues.join("; ")}`;
}

/**
 * Parse configuration from an environment map.
 *
 * @example
 * const result = loadConfig(process.env);
 * if (result.isErr()) process.exit(EXIT_CODES.CONFIGURATION_ERROR);
 */
export function loadConfig(
  env: NodeJS.ProcessEnv,
): Result<Config, ConfigError> {
  const parsed = ConfigSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    return err({
      type: "INVALID_CONFIG",
      message: "Environment failed validation",
      issues,
    });
  }

  return ok(parsed.data);
}

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Export pipeline settings for the telemetry module.
 * The license key stays optional here; the pipeline decides whether it is usable.
 */
export function getTelemetrySettings(config: Config): Readonly<{
  licenseKey: string | undefined;
  endpoint: string;
  serviceName: string;
  exportIntervalMs: number;
}> {
  return {
    licenseKey: config.NEW_RELIC_LICENSE_KEY,
    endpoint: config.OTLP_ENDPOINT,
    serviceName: config.OTEL_SERVICE_NAME,
    exportIntervalMs: config.METRIC_EXPORT_INTERVAL_MS,
  };
}

/**
 * Status endpoint configuration.
 * Returns null if STATUS_PORT is not configured.
 */
export function getStatusServerConfig(config: Config): Readonly<{
  port: number;
}> | null {
  if (config.STATUS_PORT === undefined) {
    return null;
  }

  return { port: config.STATUS_PORT };
}

// =============================================================================
// Logging Settings
// =============================================================================

const LogSettingsSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .catch("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).catch("info"),
});

/**
 * Logging settings never fail: loggers must exist before the full config is
 * validated so configuration errors can themselves be logged.
 */
export const logSettings: Readonly<z.infer<typeof LogSettingsSchema>> =
  LogSettingsSchema.parse({
    NODE_ENV: process.env.NODE_ENV,
    LOG_LEVEL: process.env.LOG_LEVEL,
  });
