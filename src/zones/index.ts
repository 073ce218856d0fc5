/**
 * Zones Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  MandatoryAttributeKey,
  OptionalAttributeKey,
  ZoneUpdateSummary,
} from "./schema.js";

export {
  MANDATORY_ATTRIBUTE_KEYS,
  OPTIONAL_ATTRIBUTE_KEYS,
} from "./schema.js";

// Service functions (side effects)
export { type ZoneUpdateHandler, createZoneUpdateHandler } from "./service.js";

// Pure transformations
export {
  airConditionerDisplayName,
  buildZoneAttributes,
  isZonePowered,
  zoneDisplayName,
} from "./transform.js";
