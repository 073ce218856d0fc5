/**
 * Module-scoped color-coded loggers for the AirTouch telemetry exporter.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs. Every logger writes to
 * stderr so stdout stays free for structured output.
 */
import pino from "pino";
import { type LogLevel, logSettings } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Core modules
  app: "\x1b[34m", // blue
  orchestrator: "\x1b[33m", // yellow

  // Device modules
  discovery: "\x1b[36m", // cyan
  airtouch: "\x1b[35m", // magenta
  monitor: "\x1b[32m", // green
  zones: "\x1b[92m", // bright green

  // Export
  telemetry: "\x1b[91m", // bright red

  // Status endpoint
  api: "\x1b[94m", // bright blue
  middleware: "\x1b[95m", // bright magenta
} as const;

const RESET = "\x1b[0m";

const STDERR = 2;

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

const loggers: pino.Logger[] = [];
let currentLevel: LogLevel = logSettings.LOG_LEVEL;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @param module - The module name (must be one of the predefined modules)
 * @returns A pino logger instance configured for the module
 *
 * @example
 * const log = createLogger('monitor');
 * log.info({ host }, 'Monitoring controller');
 */
export function createLogger(module: ModuleName): pino.Logger {
  const color = MODULE_COLORS[module];

  const isDevelopment = logSettings.NODE_ENV === "development";

  const logger = isDevelopment
    ? // Pretty printing for development
      pino({
        name: module,
        level: currentLevel,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            destination: STDERR,
            messageFormat: `${color}[{name}]${RESET} {msg}`,
            ignore: "pid,hostname",
            translateTime: "HH:MM:ss",
          },
        },
      })
    : // Structured JSON for production
      pino({ name: module, level: currentLevel }, pino.destination(STDERR));

  loggers.push(logger);
  return logger;
}

/**
 * Change the level of every logger created so far and of those created later.
 * Used by the --debug flag.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: pino.Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with error details.
 */
export function logOperationFailed(
  logger: pino.Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(
    { operation, error: errorMessage, ...context },
    `✗ ${operation} failed: ${errorMessage}`,
  );
}
