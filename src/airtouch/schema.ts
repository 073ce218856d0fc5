/**
 * AirTouch Module - Schemas and Types
 *
 * Defines the live state of an AirTouch controller, its air conditioners and
 * zones, and the capability interfaces the rest of the system consumes.
 * State values come from fixed lookup tables in the decoder; only the
 * discovery reply (free text from the network) goes through a zod schema.
 */
import { z } from "zod";

// =============================================================================
// Enumerations
// =============================================================================

export type AcPowerState =
  | "OFF"
  | "ON"
  | "AWAY_OFF"
  | "AWAY_ON"
  | "SLEEP"
  | "UNKNOWN";

export type AcMode =
  | "AUTO"
  | "HEAT"
  | "DRY"
  | "FAN"
  | "COOL"
  | "AUTO_HEAT"
  | "AUTO_COOL"
  | "UNKNOWN";

export type AcFanSpeed =
  | "AUTO"
  | "QUIET"
  | "LOW"
  | "MEDIUM"
  | "HIGH"
  | "POWERFUL"
  | "TURBO"
  | "INTELLIGENT_AUTO"
  | "UNKNOWN";

export type ZonePowerState = "OFF" | "ON" | "TURBO";

export type ZoneControlMethod = "TEMPERATURE" | "PERCENTAGE";

// =============================================================================
// Live State
// =============================================================================

/**
 * One zone of an air conditioner.
 */
export type Zone = Readonly<{
  zoneId: number;
  /** Null until the console reports zone names */
  name: string | null;
  powerState: ZonePowerState;
  controlMethod: ZoneControlMethod;
  /** Null when no sensor is fitted or the reading is unavailable */
  currentTemperature: number | null;
  targetTemperature: number | null;
  /** Damper open percentage (0-100); null when the console sends no valid value */
  damperPercentage: number | null;
  spillActive: boolean;
  lowBattery: boolean;
}>;

/**
 * One air conditioner ("sub-unit") owned by a controller.
 */
export type AirConditioner = Readonly<{
  acId: number;
  name: string | null;
  powerState: AcPowerState;
  mode: AcMode;
  fanSpeed: AcFanSpeed;
  currentTemperature: number | null;
  targetTemperature: number | null;
  zones: ReadonlyArray<Zone>;
}>;

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Receives state-change notifications for one air conditioner.
 */
export interface Subscriber {
  onUpdate(acId: number): void;
}

/**
 * A discovered controller. State is read live through `airConditioners`.
 */
export interface ControllerHandle {
  readonly name: string;
  readonly host: string;
  readonly airConditioners: ReadonlyArray<AirConditioner>;

  /** Connect and complete the handshake. Resolves false on failure. */
  init(): Promise<boolean>;

  subscribe(acId: number, subscriber: Subscriber): void;

  /**
   * Called once with a reason when the connection drops after init.
   * A listener added after the drop is called straight away.
   */
  onDisconnect(listener: (reason: string) => void): void;

  close(): Promise<void>;
}

/**
 * Discovery entry point. Resolves with an empty list when nothing answers.
 */
export type DiscoverControllers = (
  targetHost: string | null,
) => Promise<ControllerHandle[]>;

// =============================================================================
// Discovery Reply
// =============================================================================

/**
 * Reply to the discovery broadcast:
 * `ip,consoleId,AirTouch5,airtouchId,name`
 */
export const DiscoveryReplySchema = z.tuple([
  z.string().ip().describe("Console IP address"),
  z.string().min(1).describe("Console id"),
  z.literal("AirTouch5"),
  z.string().min(1).describe("AirTouch id"),
  z.string().min(1).describe("System name"),
]);

export type DiscoveredConsole = Readonly<{
  host: string;
  consoleId: string;
  airtouchId: string;
  name: string;
}>;

// =============================================================================
// Wire Messages
// =============================================================================

/**
 * Decoded frame (header and CRC already checked).
 */
export type Frame = Readonly<{
  address: number;
  messageId: number;
  messageType: number;
  data: Uint8Array;
}>;

/**
 * Capability record for one air conditioner (AC ability message).
 */
export type AcAbility = Readonly<{
  acId: number;
  name: string;
  startZone: number;
  zoneCount: number;
}>;

/**
 * Air conditioner status without zones or names (AC status message).
 */
export type AcStatus = Omit<AirConditioner, "name" | "zones">;

/**
 * Zone status without its name (zone status message).
 */
export type ZoneStatus = Omit<Zone, "name">;

export type ZoneName = Readonly<{ zoneId: number; name: string }>;

/**
 * A decoded message from the console.
 */
export type ConsoleMessage =
  | { readonly type: "AC_STATUS"; readonly acs: ReadonlyArray<AcStatus> }
  | { readonly type: "ZONE_STATUS"; readonly zones: ReadonlyArray<ZoneStatus> }
  | { readonly type: "AC_ABILITY"; readonly abilities: ReadonlyArray<AcAbility> }
  | { readonly type: "ZONE_NAMES"; readonly names: ReadonlyArray<ZoneName> }
  | { readonly type: "UNSUPPORTED"; readonly messageType: number; readonly subType: number };
