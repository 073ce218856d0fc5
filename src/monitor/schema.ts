/**
 * Monitor Module - Schemas and Types
 *
 * Lifecycle of one controller's monitor.
 */

/**
 * UNINITIALIZED → INITIALIZING → ACTIVE → TERMINATED
 * (INITIALIZING → TERMINATED when initialization fails or is cancelled,
 * ACTIVE → TERMINATED early when the connection drops)
 */
export type MonitorState =
  | "UNINITIALIZED"
  | "INITIALIZING"
  | "ACTIVE"
  | "TERMINATED";

/**
 * Options handed to every monitor by the orchestrator.
 */
export type MonitorOptions = Readonly<{
  /** Aborted once on operator shutdown */
  signal: AbortSignal;
  /** Upper bound on controller.init() */
  initTimeoutMs: number;
}>;

/**
 * Point-in-time view of one monitor, served by the status endpoint.
 */
export type MonitorSnapshot = Readonly<{
  name: string;
  host: string;
  state: MonitorState;
  samplesRecorded: number;
  /** ISO timestamp of the last processed notification */
  lastUpdateAt: string | null;
  error: string | null;
}>;

/**
 * How a monitor ended without error.
 */
export type MonitorOutcome =
  | {
      readonly type: "STOPPED";
      readonly controller: string;
      readonly samplesRecorded: number;
    }
  | {
      /** Shutdown arrived before initialization finished */
      readonly type: "CANCELLED";
      readonly controller: string;
    };
