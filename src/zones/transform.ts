/**
 * Zones Module - Pure Transformations
 *
 * Flattens one zone and its air conditioner into the attribute map attached
 * to the zone temperature sample. No side effects, no I/O.
 */
import type { AirConditioner, Zone } from "../airtouch/index.js";
import type { AttributeValue, MetricAttributes } from "../telemetry/index.js";
import type { MandatoryAttributeKey, OptionalAttributeKey } from "./schema.js";

/**
 * Name shown for an air conditioner, falling back to `AC-<id>`.
 */
export function airConditionerDisplayName(
  airConditioner: Pick<AirConditioner, "acId" | "name">,
): string {
  return airConditioner.name || `AC-${airConditioner.acId}`;
}

/**
 * Name shown for a zone, falling back to `Zone-<id>`.
 *
 * @example
 * zoneDisplayName({ zoneId: 3, name: null }) // "Zone-3"
 */
export function zoneDisplayName(zone: Pick<Zone, "zoneId" | "name">): string {
  return zone.name || `Zone-${zone.zoneId}`;
}

/**
 * Only a zone that is plainly ON reports as powered; TURBO reports 0.
 */
export function isZonePowered(zone: Pick<Zone, "powerState">): boolean {
  return zone.powerState === "ON";
}

const flag = (value: boolean): number => (value ? 1 : 0);

/**
 * Build the attribute map for one zone sample.
 *
 * Optional values are omitted when the console does not report them,
 * never replaced by a sentinel.
 *
 * @example
 * buildZoneAttributes("192.168.1.20", airConditioner, zone)
 * // { "airtouch.ac.id": 0, "airtouch.zone.name": "Living", ... }
 */
export function buildZoneAttributes(
  host: string,
  airConditioner: AirConditioner,
  zone: Zone,
): MetricAttributes {
  const mandatory: Record<MandatoryAttributeKey, AttributeValue> = {
    "airtouch.ac.id": airConditioner.acId,
    "airtouch.ac.name": airConditionerDisplayName(airConditioner),
    "airtouch.zone.id": zone.zoneId,
    "airtouch.zone.name": zoneDisplayName(zone),
    "airtouch.host": host,
    "airtouch.zone.powerState": isZonePowered(zone) ? 1 : 0,
    "airtouch.zone.controlMethod": zone.controlMethod,
    "airtouch.zone.spill": flag(zone.spillActive),
    "airtouch.zone.lowBattery": flag(zone.lowBattery),
    "airtouch.aircon.powerState": airConditioner.powerState,
    "airtouch.aircon.activeMode": airConditioner.mode,
    "airtouch.aircon.activeFanSpeed": airConditioner.fanSpeed,
  };

  const attributes: Record<string, AttributeValue> = { ...mandatory };
  const addIfPresent = (key: OptionalAttributeKey, value: number | null) => {
    if (value !== null) {
      attributes[key] = value;
    }
  };

  addIfPresent("airtouch.zone.setPoint", zone.targetTemperature);
  addIfPresent("airtouch.zone.openPercentage", zone.damperPercentage);
  addIfPresent(
    "airtouch.aircon.currentTemperature",
    airConditioner.currentTemperature,
  );
  addIfPresent(
    "airtouch.aircon.targetTemperature",
    airConditioner.targetTemperature,
  );

  return attributes;
}
