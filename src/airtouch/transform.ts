/**
 * AirTouch Module - Pure Transformations
 *
 * AirTouch 5 wire codec and state assembly.
 * No side effects, no I/O - just bytes in, values out.
 */
import type {
  AcAbility,
  AcFanSpeed,
  AcMode,
  AcPowerState,
  AcStatus,
  AirConditioner,
  ConsoleMessage,
  DiscoveredConsole,
  Frame,
  ZoneName,
  ZonePowerState,
  ZoneStatus,
} from "./schema.js";
import { DiscoveryReplySchema } from "./schema.js";

// =============================================================================
// Protocol Constants
// =============================================================================

export const DISCOVERY_PORT = 49005;
export const CONSOLE_PORT = 9005;
export const DISCOVERY_REQUEST = "::REQUEST-POLYAIRE-AIRTOUCH-DEVICE-INFO:;";

export const HEADER = Buffer.from([0x55, 0x55, 0x55, 0xaa]);

export const ADDRESS_NORMAL = 0x80b0;
export const ADDRESS_EXTENDED = 0x90b0;

export const MESSAGE_TYPE_CONTROL_STATUS = 0xc0;
export const MESSAGE_TYPE_EXTENDED = 0x1f;

export const SUBTYPE_ZONE_STATUS = 0x21;
export const SUBTYPE_AC_STATUS = 0x23;

export const EXTENDED_PREFIX = 0xff;
export const EXTENDED_AC_ABILITY = 0x11;
export const EXTENDED_ZONE_NAMES = 0x13;

const ESCAPE_RUN = 3;
const FRAME_PREFIX_LENGTH = 6; // address(2) + id + type + length(2)
const CRC_LENGTH = 2;
const CONTROL_HEADER_LENGTH = 8;
const AC_NAME_LENGTH = 16;

/** Raw readings above this are "no reading" (above 100 °C). */
const TEMPERATURE_RAW_MAX = 1500;
/** Set-point bytes above this are "not set" (above 30 °C). */
const SETPOINT_RAW_MAX = 200;
/** Damper bytes above this are "no value". */
const DAMPER_PERCENT_MAX = 100;

// =============================================================================
// CRC
// =============================================================================

/**
 * CRC-16/MODBUS (poly 0xA001 reflected, init 0xFFFF).
 *
 * @example
 * crc16Modbus(Buffer.from("123456789")) // 0x4b37
 */
export function crc16Modbus(bytes: Uint8Array): number {
  let crc = 0xffff;
  for (const byte of bytes) {
    crc ^= byte;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 1 ? (crc >>> 1) ^ 0xa001 : crc >>> 1;
    }
  }
  return crc;
}

// =============================================================================
// Framing
// =============================================================================

/**
 * Insert 0x00 after every run of three 0x55 bytes.
 */
export function escapeBytes(bytes: Uint8Array): Buffer {
  const out: number[] = [];
  let run = 0;
  for (const byte of bytes) {
    out.push(byte);
    run = byte === 0x55 ? run + 1 : 0;
    if (run === ESCAPE_RUN) {
      out.push(0x00);
      run = 0;
    }
  }
  return Buffer.from(out);
}

/**
 * Encode a frame for the wire: header, escaped body and CRC.
 */
export function encodeFrame(frame: Frame): Buffer {
  const body = Buffer.alloc(FRAME_PREFIX_LENGTH + frame.data.length + CRC_LENGTH);
  body.writeUInt16BE(frame.address, 0);
  body.writeUInt8(frame.messageId, 2);
  body.writeUInt8(frame.messageType, 3);
  body.writeUInt16BE(frame.data.length, 4);
  body.set(frame.data, FRAME_PREFIX_LENGTH);

  const crc = crc16Modbus(body.subarray(0, FRAME_PREFIX_LENGTH + frame.data.length));
  body.writeUInt16BE(crc, FRAME_PREFIX_LENGTH + frame.data.length);

  return Buffer.concat([HEADER, escapeBytes(body)]);
}

/**
 * Request for AC status or zone status (control/status message with no data).
 */
export function encodeStatusRequest(messageId: number, subType: number): Buffer {
  return encodeFrame({
    address: ADDRESS_NORMAL,
    messageId,
    messageType: MESSAGE_TYPE_CONTROL_STATUS,
    data: Uint8Array.from([subType, 0, 0, 0, 0, 0, 0, 0]),
  });
}

/**
 * Request for an extended message (AC ability, zone names).
 */
export function encodeExtendedRequest(messageId: number, subType: number): Buffer {
  return encodeFrame({
    address: ADDRESS_EXTENDED,
    messageId,
    messageType: MESSAGE_TYPE_EXTENDED,
    data: Uint8Array.from([EXTENDED_PREFIX, subType]),
  });
}

/**
 * Result of scanning a receive buffer for frames.
 */
export type FrameScan = Readonly<{
  frames: ReadonlyArray<Frame>;
  /** Bytes to keep for the next read (an incomplete frame) */
  rest: Buffer;
  /** Frames dropped because their CRC did not match */
  corrupt: number;
}>;

/**
 * Extract every complete frame from a receive buffer.
 * Garbage before a header is dropped; an incomplete trailing frame is kept.
 */
export function extractFrames(buffer: Buffer): FrameScan {
  const frames: Frame[] = [];
  let corrupt = 0;
  let offset = 0;

  for (;;) {
    const start = buffer.indexOf(HEADER, offset);
    if (start === -1) {
      // Keep a partial header that may complete on the next read
      const keep = Math.min(buffer.length - offset, HEADER.length - 1);
      return { frames, rest: buffer.subarray(buffer.length - keep), corrupt };
    }

    const body = unescapeFrameBody(buffer, start + HEADER.length);
    if (body === null) {
      return { frames, rest: buffer.subarray(start), corrupt };
    }

    const payloadLength = body.bytes.length - CRC_LENGTH;
    const expected = body.bytes.readUInt16BE(payloadLength);
    if (crc16Modbus(body.bytes.subarray(0, payloadLength)) !== expected) {
      corrupt++;
      offset = start + HEADER.length;
      continue;
    }

    frames.push({
      address: body.bytes.readUInt16BE(0),
      messageId: body.bytes.readUInt8(2),
      messageType: body.bytes.readUInt8(3),
      data: body.bytes.subarray(FRAME_PREFIX_LENGTH, payloadLength),
    });
    offset = body.end;
  }
}

/**
 * Unescape bytes after a header until the declared length (plus CRC) is read.
 * Returns null when the buffer ends first.
 */
function unescapeFrameBody(
  buffer: Buffer,
  from: number,
): { bytes: Buffer; end: number } | null {
  const out: number[] = [];
  let needed = FRAME_PREFIX_LENGTH;
  let run = 0;
  let index = from;

  while (out.length < needed) {
    if (index >= buffer.length) {
      return null;
    }
    const byte = buffer[index++] ?? 0;

    if (run === ESCAPE_RUN) {
      run = 0;
      if (byte === 0x00) {
        continue;
      }
    }

    out.push(byte);
    run = byte === 0x55 ? run + 1 : 0;

    if (out.length === FRAME_PREFIX_LENGTH) {
      const dataLength = ((out[4] ?? 0) << 8) | (out[5] ?? 0);
      needed = FRAME_PREFIX_LENGTH + dataLength + CRC_LENGTH;
    }
  }

  return { bytes: Buffer.from(out), end: index };
}

// =============================================================================
// Message Decoding
// =============================================================================

/**
 * Decode a frame into a console message.
 *
 * Control/status data starts with an 8-byte header: sub-type, reserved,
 * normal data length, repeat entry length, repeat entry count (all 16-bit
 * big-endian after the first two bytes).
 */
export function decodeMessage(frame: Frame): ConsoleMessage {
  const data = Buffer.from(frame.data);

  if (frame.messageType === MESSAGE_TYPE_CONTROL_STATUS && data.length >= CONTROL_HEADER_LENGTH) {
    const subType = data.readUInt8(0);
    const normalLength = data.readUInt16BE(2);
    const repeatLength = data.readUInt16BE(4);
    const repeatCount = data.readUInt16BE(6);
    const entries = splitRepeatData(
      data.subarray(CONTROL_HEADER_LENGTH + normalLength),
      repeatCount,
      repeatLength,
    );

    switch (subType) {
      case SUBTYPE_AC_STATUS:
        return { type: "AC_STATUS", acs: entries.filter((e) => e.length >= 6).map(parseAcStatus) };
      case SUBTYPE_ZONE_STATUS:
        return { type: "ZONE_STATUS", zones: entries.filter((e) => e.length >= 7).map(parseZoneStatus) };
      default:
        return { type: "UNSUPPORTED", messageType: frame.messageType, subType };
    }
  }

  if (frame.messageType === MESSAGE_TYPE_EXTENDED && data.length >= 2 && data[0] === EXTENDED_PREFIX) {
    const subType = data.readUInt8(1);
    switch (subType) {
      case EXTENDED_AC_ABILITY:
        return { type: "AC_ABILITY", abilities: parseAcAbilities(data.subarray(2)) };
      case EXTENDED_ZONE_NAMES:
        return { type: "ZONE_NAMES", names: parseZoneNames(data.subarray(2)) };
      default:
        return { type: "UNSUPPORTED", messageType: frame.messageType, subType };
    }
  }

  return { type: "UNSUPPORTED", messageType: frame.messageType, subType: data[0] ?? 0 };
}

function splitRepeatData(data: Buffer, count: number, length: number): Buffer[] {
  const entries: Buffer[] = [];
  if (length === 0) {
    return entries;
  }
  for (let i = 0; i < count && (i + 1) * length <= data.length; i++) {
    entries.push(data.subarray(i * length, (i + 1) * length));
  }
  return entries;
}

const AC_POWER_STATES: Readonly<Partial<Record<number, AcPowerState>>> = {
  0: "OFF",
  1: "ON",
  2: "AWAY_OFF",
  3: "AWAY_ON",
  5: "SLEEP",
};

const AC_MODES: Readonly<Partial<Record<number, AcMode>>> = {
  0: "AUTO",
  1: "HEAT",
  2: "DRY",
  3: "FAN",
  4: "COOL",
  8: "AUTO_HEAT",
  9: "AUTO_COOL",
};

const AC_FAN_SPEEDS: Readonly<Partial<Record<number, AcFanSpeed>>> = {
  0: "AUTO",
  1: "QUIET",
  2: "LOW",
  3: "MEDIUM",
  4: "HIGH",
  5: "POWERFUL",
  6: "TURBO",
};

const ZONE_POWER_STATES: Readonly<Partial<Record<number, ZonePowerState>>> = {
  0: "OFF",
  1: "ON",
  3: "TURBO",
};

/**
 * Temperatures are 11 bits in the top of a 16-bit word: (raw - 500) / 10.
 */
function decodeTemperature(word: number): number | null {
  const raw = word >> 5;
  return raw > TEMPERATURE_RAW_MAX ? null : (raw - 500) / 10;
}

/**
 * Set-points are one byte: (raw + 100) / 10.
 */
function decodeSetpoint(raw: number): number | null {
  return raw > SETPOINT_RAW_MAX ? null : (raw + 100) / 10;
}

/**
 * AC status entry:
 * byte 1 power (bits 8-5) and AC number (bits 4-1),
 * byte 2 mode (bits 8-5) and fan speed (bits 4-1),
 * byte 3 set-point, bytes 5-6 temperature.
 */
export function parseAcStatus(entry: Buffer): AcStatus {
  const b0 = entry.readUInt8(0);
  const b1 = entry.readUInt8(1);
  const fan = b1 & 0x0f;

  return {
    acId: b0 & 0x0f,
    powerState: AC_POWER_STATES[b0 >> 4] ?? "UNKNOWN",
    mode: AC_MODES[b1 >> 4] ?? "UNKNOWN",
    fanSpeed: AC_FAN_SPEEDS[fan] ?? (fan >= 8 ? "INTELLIGENT_AUTO" : "UNKNOWN"),
    targetTemperature: decodeSetpoint(entry.readUInt8(2)),
    currentTemperature: decodeTemperature(entry.readUInt16BE(4)),
  };
}

/**
 * Zone status entry:
 * byte 1 power (bits 8-7) and zone number (bits 6-1),
 * byte 2 control method (bit 8) and open percentage (bits 7-1),
 * byte 3 set-point, byte 4 sensor fitted (bit 8),
 * bytes 5-6 temperature, byte 7 spill (bit 2) and low battery (bit 1).
 */
export function parseZoneStatus(entry: Buffer): ZoneStatus {
  const b0 = entry.readUInt8(0);
  const b1 = entry.readUInt8(1);
  const hasSensor = (entry.readUInt8(3) & 0x80) !== 0;
  const flags = entry.readUInt8(6);
  const percentage = b1 & 0x7f;

  return {
    zoneId: b0 & 0x3f,
    powerState: ZONE_POWER_STATES[b0 >> 6] ?? "OFF",
    controlMethod: b1 & 0x80 ? "TEMPERATURE" : "PERCENTAGE",
    damperPercentage: percentage > DAMPER_PERCENT_MAX ? null : percentage,
    targetTemperature: hasSensor ? decodeSetpoint(entry.readUInt8(2)) : null,
    currentTemperature: hasSensor ? decodeTemperature(entry.readUInt16BE(4)) : null,
    spillActive: (flags & 0x02) !== 0,
    lowBattery: (flags & 0x01) !== 0,
  };
}

/**
 * AC ability records: AC number, following length, then
 * name (16 bytes), start zone, zone count and capability bytes.
 */
export function parseAcAbilities(data: Buffer): AcAbility[] {
  const abilities: AcAbility[] = [];
  let offset = 0;

  while (offset + 2 <= data.length) {
    const acId = data.readUInt8(offset);
    const length = data.readUInt8(offset + 1);
    const record = data.subarray(offset + 2, offset + 2 + length);
    offset += 2 + length;

    if (record.length < AC_NAME_LENGTH + 2) {
      continue;
    }

    abilities.push({
      acId,
      name: decodeName(record.subarray(0, AC_NAME_LENGTH)),
      startZone: record.readUInt8(AC_NAME_LENGTH),
      zoneCount: record.readUInt8(AC_NAME_LENGTH + 1),
    });
  }

  return abilities;
}

/**
 * Zone name records: zone number, name length, name.
 */
export function parseZoneNames(data: Buffer): ZoneName[] {
  const names: ZoneName[] = [];
  let offset = 0;

  while (offset + 2 <= data.length) {
    const zoneId = data.readUInt8(offset);
    const length = data.readUInt8(offset + 1);
    names.push({
      zoneId,
      name: decodeName(data.subarray(offset + 2, offset + 2 + length)),
    });
    offset += 2 + length;
  }

  return names;
}

function decodeName(bytes: Buffer): string {
  return bytes.toString("latin1").replace(/\0.*$/s, "").trim();
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * Parse one discovery reply. Returns null for anything that is not an AirTouch 5.
 *
 * @example
 * parseDiscoveryReply("192.168.1.20,C1,AirTouch5,A1,Home")
 * // { host: "192.168.1.20", consoleId: "C1", airtouchId: "A1", name: "Home" }
 */
export function parseDiscoveryReply(text: string): DiscoveredConsole | null {
  const parsed = DiscoveryReplySchema.safeParse(
    text.trim().split(",").map((part) => part.trim()),
  );
  if (!parsed.success) {
    return null;
  }

  const [host, consoleId, , airtouchId, name] = parsed.data;
  return { host, consoleId, airtouchId, name };
}

// =============================================================================
// State Assembly
// =============================================================================

/**
 * Everything the console has reported so far.
 */
export type ConsoleState = Readonly<{
  abilities: ReadonlyMap<number, AcAbility>;
  acs: ReadonlyMap<number, AcStatus>;
  zones: ReadonlyMap<number, ZoneStatus>;
  zoneNames: ReadonlyMap<number, string>;
}>;

/**
 * Find the air conditioner a zone belongs to.
 * Without ability records every zone belongs to the lowest AC number.
 */
export function owningAcId(
  zoneId: number,
  abilities: ReadonlyMap<number, AcAbility>,
  acIds: ReadonlyArray<number>,
): number | null {
  for (const ability of abilities.values()) {
    if (zoneId >= ability.startZone && zoneId < ability.startZone + ability.zoneCount) {
      return ability.acId;
    }
  }

  if (abilities.size === 0 && acIds.length > 0) {
    return Math.min(...acIds);
  }

  return null;
}

/**
 * Build the live air conditioner list, ordered by AC number with zones
 * ordered by zone number.
 */
export function assembleAirConditioners(state: ConsoleState): AirConditioner[] {
  const acIds = [...state.acs.keys()].sort((a, b) => a - b);
  const zones = [...state.zones.values()].sort((a, b) => a.zoneId - b.zoneId);

  return acIds.flatMap((acId) => {
    const status = state.acs.get(acId);
    if (!status) {
      return [];
    }

    return [
      {
        ...status,
        name: state.abilities.get(acId)?.name || null,
        zones: zones
          .filter((zone) => owningAcId(zone.zoneId, state.abilities, acIds) === acId)
          .map((zone) => ({ ...zone, name: state.zoneNames.get(zone.zoneId) ?? null })),
      },
    ];
  });
}
