/**
 * AirTouch Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  AcFanSpeed,
  AcMode,
  AcPowerState,
  AirConditioner,
  ControllerHandle,
  DiscoverControllers,
  DiscoveredConsole,
  Subscriber,
  Zone,
  ZoneControlMethod,
  ZonePowerState,
} from "./schema.js";
export type { AirTouchError } from "./errors.js";

// Error utilities
export { formatAirTouchError } from "./errors.js";

// Service (side effects)
export {
  AirTouchController,
  type ConnectConsole,
  createAirTouchDiscovery,
} from "./service.js";

// Pure transformations
export { parseDiscoveryReply } from "./transform.js";
