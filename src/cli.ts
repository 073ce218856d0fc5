/**
 * Command line and process exit codes.
 *
 * Arguments select the target host and debug logging only; the telemetry
 * credential always comes from the environment.
 */
import { parseArgs } from "node:util";
import { type Result, err, ok } from "neverthrow";

import type { OrchestratorError, RunOutcome } from "./orchestrator/index.js";

export const USAGE = `Usage: airtouch-telemetry [--host <address>] [--debug]

Monitors AirTouch devices and sends telemetry to New Relic.

Options:
  --host <address>  Connect by host name or IP address.
  --debug           Enable debug logging.
  -h, --help        Show this help.`;

export const EXIT_CODES = {
  STOPPED: 0,
  UNEXPECTED_ERROR: 1,
  CONFIGURATION_ERROR: 2,
  NO_CONTROLLERS: 3,
  DISCOVERY_TIMEOUT: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type CliOptions = Readonly<{
  host: string | null;
  debug: boolean;
  help: boolean;
}>;

export type CliError = {
  readonly type: "INVALID_ARGUMENTS";
  readonly message: string;
};

/**
 * Parse command line arguments (without the node and script entries).
 *
 * @example
 * parseCliArgs(["--host", "192.168.1.20", "--debug"])
 * // ok({ host: "192.168.1.20", debug: true, help: false })
 */
export function parseCliArgs(
  args: ReadonlyArray<string>,
): Result<CliOptions, CliError> {
  try {
    const { values } = parseArgs({
      args: [...args],
      options: {
        host: { type: "string" },
        debug: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
      allowPositionals: false,
    });

    const host = values.host?.trim();
    if (values.host !== undefined && !host) {
      return err({ type: "INVALID_ARGUMENTS", message: "--host needs a value" });
    }

    return ok({
      host: host ?? null,
      debug: values.debug === true,
      help: values.help === true,
    });
  } catch (error) {
    return err({
      type: "INVALID_ARGUMENTS",
      message: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Map the result of a run to the process exit code.
 */
export function exitCodeFor(
  result: Result<RunOutcome, OrchestratorError>,
): ExitCode {
  if (result.isErr()) {
    return exitCodeForError(result.error);
  }

  switch (result.value.type) {
    case "STOPPED":
      return EXIT_CODES.STOPPED;
    case "NO_CONTROLLERS":
    case "NO_ACTIVE_CONTROLLERS":
      return EXIT_CODES.NO_CONTROLLERS;
  }
}

function exitCodeForError(error: OrchestratorError): ExitCode {
  switch (error.type) {
    case "CONFIGURATION_ERROR":
      return EXIT_CODES.CONFIGURATION_ERROR;
    case "DISCOVERY_TIMEOUT":
      return EXIT_CODES.DISCOVERY_TIMEOUT;
    case "DISCOVERY_FAILED":
      return EXIT_CODES.UNEXPECTED_ERROR;
  }
}
