#!/usr/bin/env node
/**
 * AirTouch Telemetry Exporter - Application Entry Point
 *
 * Sets up:
 * - Command line and environment configuration
 * - Optional status endpoint
 * - Discovery, one monitor per controller, OTLP export
 * - Graceful shutdown on SIGINT/SIGTERM
 *
 * All operational output goes to stderr.
 */
import { createAirTouchDiscovery } from "./airtouch/index.js";
import { startStatusServer, stopStatusServer } from "./api/server.js";
import { EXIT_CODES, type ExitCode, USAGE, exitCodeFor, parseCliArgs } from "./cli.js";
import {
  formatConfigError,
  getStatusServerConfig,
  getTelemetrySettings,
  loadConfig,
} from "./config.js";
import { createLogger, setLogLevel } from "./logger.js";
import { formatOrchestratorError, runExporter } from "./orchestrator/index.js";
import { buildExportPipeline } from "./telemetry/index.js";

const log = createLogger("app");

async function main(): Promise<ExitCode> {
  // ===========================================================================
  // Arguments and configuration
  // ===========================================================================

  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.isErr()) {
    log.error({ error: cli.error.message }, "Invalid arguments");
    console.error(USAGE);
    return EXIT_CODES.CONFIGURATION_ERROR;
  }

  if (cli.value.help) {
    console.error(USAGE);
    return EXIT_CODES.STOPPED;
  }

  if (cli.value.debug) {
    setLogLevel("debug");
  }

  const loaded = loadConfig(process.env);
  if (loaded.isErr()) {
    log.fatal({ issues: loaded.error.issues }, formatConfigError(loaded.error));
    return EXIT_CODES.CONFIGURATION_ERROR;
  }
  const config = loaded.value;

  // ===========================================================================
  // Startup banner
  // ===========================================================================

  console.error("");
  console.error("========================================");
  console.error(`  ${config.APP_NAME}`);
  console.error("========================================");
  console.error("");

  // Log configuration summary (non-sensitive values only)
  log.info(
    {
      env: config.NODE_ENV,
      otlpEndpoint: config.OTLP_ENDPOINT,
      serviceName: config.OTEL_SERVICE_NAME,
      exportIntervalMs: config.METRIC_EXPORT_INTERVAL_MS,
      discoveryTimeoutMs: config.DISCOVERY_TIMEOUT_MS,
      initTimeoutMs: config.INIT_TIMEOUT_MS,
      credentialSet: config.NEW_RELIC_LICENSE_KEY !== undefined,
    },
    "Configuration loaded",
  );

  // ===========================================================================
  // Graceful shutdown
  // ===========================================================================

  const shutdown = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    log.info({ signal }, `${signal} received. Shutting down gracefully...`);
    shutdown.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  // ===========================================================================
  // Status endpoint
  // ===========================================================================

  const statusConfig = getStatusServerConfig(config);
  const server = statusConfig ? startStatusServer(statusConfig.port) : null;

  // ===========================================================================
  // Run
  // ===========================================================================

  const result = await runExporter(
    {
      targetHost: cli.value.host ?? config.AIRTOUCH_HOST ?? null,
      signal: shutdown.signal,
      discoveryTimeoutMs: config.DISCOVERY_TIMEOUT_MS,
      initTimeoutMs: config.INIT_TIMEOUT_MS,
    },
    {
      buildPipeline: () => buildExportPipeline(getTelemetrySettings(config)),
      discover: createAirTouchDiscovery({ windowMs: config.DISCOVERY_WINDOW_MS }),
    },
  );

  if (server) {
    await stopStatusServer(server);
  }

  if (result.isErr()) {
    log.fatal({ errorType: result.error.type }, formatOrchestratorError(result.error));
  } else if (result.value.type === "STOPPED") {
    log.info("Monitoring stopped by user.");
  }

  return exitCodeFor(result);
}

process.on("unhandledRejection", (reason) => {
  log.fatal(
    { error: reason instanceof Error ? reason.message : String(reason) },
    "Unhandled rejection",
  );
  process.exit(EXIT_CODES.UNEXPECTED_ERROR);
});

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    log.fatal(
      {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      "An unexpected error occurred and the program has to stop.",
    );
    process.exit(EXIT_CODES.UNEXPECTED_ERROR);
  });
