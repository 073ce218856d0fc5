/**
 * Zones Module - Service Layer
 *
 * Zone update handler: subscribed to a controller's air conditioners, it reads
 * the live state on every notification and records one temperature sample per
 * zone that has a reading.
 */
import type { ControllerHandle, Subscriber } from "../airtouch/index.js";
import { createLogger } from "../logger.js";
import type { MetricEmitter } from "../telemetry/index.js";
import type { ZoneUpdateSummary } from "./schema.js";
import {
  airConditionerDisplayName,
  buildZoneAttributes,
  zoneDisplayName,
} from "./transform.js";

const log = createLogger("zones");

/**
 * Subscriber that can also be invoked directly for the baseline snapshot.
 */
export interface ZoneUpdateHandler extends Subscriber {
  /** Process one notification. Null when the air conditioner is unknown. */
  handle(acId: number): ZoneUpdateSummary | null;
}

/**
 * Create the handler for one controller.
 *
 * @param controller - Read live on every notification, never cached
 * @param emitter - Shared metric emitter
 * @param onSummary - Receives the outcome of every processed notification
 */
export function createZoneUpdateHandler(
  controller: ControllerHandle,
  emitter: MetricEmitter,
  onSummary?: (summary: ZoneUpdateSummary) => void,
): ZoneUpdateHandler {
  const handle = (acId: number): ZoneUpdateSummary | null => {
    const airConditioner = controller.airConditioners.find(
      (ac) => ac.acId === acId,
    );
    if (!airConditioner) {
      log.warn(
        { host: controller.host, acId },
        "Update received for unknown air conditioner",
      );
      return null;
    }

    log.info(
      { host: controller.host, acId },
      `Telemetry update received for AC ${acId} (${airConditionerDisplayName(airConditioner)}).`,
    );

    let recorded = 0;
    let skipped = 0;
    let failed = 0;

    airConditioner.zones.forEach((zone, zoneIndex) => {
      try {
        if (zone.currentTemperature === null) {
          skipped++;
          log.info(
            { host: controller.host, acId, zoneId: zone.zoneId },
            `Skipping metric for Zone '${zoneDisplayName(zone)}' due to no temperature reading.`,
          );
          return;
        }

        const attributes = buildZoneAttributes(
          controller.host,
          airConditioner,
          zone,
        );
        emitter.record(zone.currentTemperature, attributes);
        recorded++;

        log.debug(
          {
            host: controller.host,
            acId,
            zoneId: zone.zoneId,
            temperature: zone.currentTemperature,
          },
          `Updated metric for Zone '${zoneDisplayName(zone)}'`,
        );
      } catch (error) {
        failed++;
        log.error(
          {
            host: controller.host,
            acId,
            zoneIndex,
            error: error instanceof Error ? error.message : String(error),
          },
          "Failed to record zone sample, skipping zone",
        );
      }
    });

    const summary: ZoneUpdateSummary = { acId, recorded, skipped, failed };
    onSummary?.(summary);
    return summary;
  };

  return {
    handle,
    onUpdate(acId: number): void {
      handle(acId);
    },
  };
}
