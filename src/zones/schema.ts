/**
 * Zones Module - Schemas and Types
 *
 * Attribute keys attached to every zone temperature sample.
 */

/**
 * Keys present on every sample.
 */
export const MANDATORY_ATTRIBUTE_KEYS = [
  "airtouch.ac.id",
  "airtouch.ac.name",
  "airtouch.zone.id",
  "airtouch.zone.name",
  "airtouch.host",
  "airtouch.zone.powerState",
  "airtouch.zone.controlMethod",
  "airtouch.zone.spill",
  "airtouch.zone.lowBattery",
  "airtouch.aircon.powerState",
  "airtouch.aircon.activeMode",
  "airtouch.aircon.activeFanSpeed",
] as const;

/**
 * Keys present only when the console reports the value.
 */
export const OPTIONAL_ATTRIBUTE_KEYS = [
  "airtouch.zone.setPoint",
  "airtouch.zone.openPercentage",
  "airtouch.aircon.currentTemperature",
  "airtouch.aircon.targetTemperature",
] as const;

export type MandatoryAttributeKey = (typeof MANDATORY_ATTRIBUTE_KEYS)[number];
export type OptionalAttributeKey = (typeof OPTIONAL_ATTRIBUTE_KEYS)[number];

/**
 * What one notification produced.
 */
export type ZoneUpdateSummary = Readonly<{
  acId: number;
  /** Samples handed to the emitter */
  recorded: number;
  /** Zones without a temperature reading */
  skipped: number;
  /** Zones whose attributes could not be built */
  failed: number;
}>;
