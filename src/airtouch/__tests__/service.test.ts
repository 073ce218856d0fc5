/**
 * Service tests - controller session over an in-process stream.
 */
import { Duplex } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { AirTouchController } from "../service.js";
import {
  ADDRESS_EXTENDED,
  ADDRESS_NORMAL,
  EXTENDED_AC_ABILITY,
  EXTENDED_ZONE_NAMES,
  MESSAGE_TYPE_CONTROL_STATUS,
  MESSAGE_TYPE_EXTENDED,
  SUBTYPE_AC_STATUS,
  SUBTYPE_ZONE_STATUS,
  encodeExtendedRequest,
  encodeFrame,
  encodeStatusRequest,
} from "../transform.js";

const CONSOLE = {
  host: "192.168.1.20",
  consoleId: "C1234",
  airtouchId: "A5678",
  name: "Home",
};

function statusFrame(subType: number, entries: number[][]): Buffer {
  return encodeFrame({
    address: ADDRESS_NORMAL,
    messageId: 1,
    messageType: MESSAGE_TYPE_CONTROL_STATUS,
    data: Uint8Array.from([
      subType,
      0x00,
      0x00,
      0x00,
      0x00,
      entries[0]?.length ?? 0,
      0x00,
      entries.length,
      ...entries.flat(),
    ]),
  });
}

const AC_STATUS = statusFrame(SUBTYPE_AC_STATUS, [
  [0x10, 0x44, 0x8c, 0x00, 0x5f, 0x60, 0x00, 0x00, 0x00, 0x00],
]);
const ZONE_STATUS = statusFrame(SUBTYPE_ZONE_STATUS, [
  [0x40, 0xd0, 0x78, 0x80, 0x59, 0x60, 0x00, 0x00],
  [0x01, 0x00, 0x78, 0x00, 0x00, 0x00, 0x00, 0x00],
]);
const ZONE_NAMES = encodeFrame({
  address: ADDRESS_EXTENDED,
  messageId: 2,
  messageType: MESSAGE_TYPE_EXTENDED,
  data: Uint8Array.from([0xff, 0x13, 0x00, 0x06, ...Buffer.from("Living", "latin1")]),
});

function createFakeConsole() {
  const written: Buffer[] = [];
  const stream = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(Buffer.from(chunk));
      callback();
    },
  });
  return { stream, written };
}

describe("AirTouchController", () => {
  it("requests abilities, names and status on init", async () => {
    const { stream, written } = createFakeConsole();
    const controller = new AirTouchController(CONSOLE, async () => stream);

    const ready = controller.init();
    stream.push(AC_STATUS);
    stream.push(ZONE_STATUS);

    expect(await ready).toBe(true);
    expect(written).toEqual([
      encodeExtendedRequest(1, EXTENDED_AC_ABILITY),
      encodeExtendedRequest(2, EXTENDED_ZONE_NAMES),
      encodeStatusRequest(3, SUBTYPE_AC_STATUS),
      encodeStatusRequest(4, SUBTYPE_ZONE_STATUS),
    ]);

    await controller.close();
  });

  it("connects to the console port of the discovered host", async () => {
    const { stream } = createFakeConsole();
    const connect = vi.fn(async () => stream);
    const controller = new AirTouchController(CONSOLE, connect);

    const ready = controller.init();
    stream.push(Buffer.concat([AC_STATUS, ZONE_STATUS]));
    await ready;

    expect(connect).toHaveBeenCalledWith("192.168.1.20", 9005);
    expect(controller.name).toBe("Home");
    expect(controller.host).toBe("192.168.1.20");

    await controller.close();
  });

  it("exposes the assembled air conditioners", async () => {
    const { stream } = createFakeConsole();
    const controller = new AirTouchController(CONSOLE, async () => stream);

    const ready = controller.init();
    stream.push(ZONE_NAMES);
    stream.push(AC_STATUS);
    stream.push(ZONE_STATUS);
    await ready;

    expect(controller.airConditioners).toEqual([
      {
        acId: 0,
        name: null,
        powerState: "ON",
        mode: "COOL",
        fanSpeed: "HIGH",
        targetTemperature: 24,
        currentTemperature: 26.3,
        zones: [
          {
            zoneId: 0,
            name: "Living",
            powerState: "ON",
            controlMethod: "TEMPERATURE",
            damperPercentage: 80,
            targetTemperature: 22,
            currentTemperature: 21.5,
            spillActive: false,
            lowBattery: false,
          },
          {
            zoneId: 1,
            name: null,
            powerState: "OFF",
            controlMethod: "PERCENTAGE",
            damperPercentage: 0,
            targetTemperature: null,
            currentTemperature: null,
            spillActive: false,
            lowBattery: false,
          },
        ],
      },
    ]);

    await controller.close();
  });

  it("notifies subscribers of the affected air conditioner", async () => {
    const { stream } = createFakeConsole();
    const controller = new AirTouchController(CONSOLE, async () => stream);

    const ready = controller.init();
    stream.push(Buffer.concat([AC_STATUS, ZONE_STATUS]));
    await ready;

    const onUpdate = vi.fn();
    const other = vi.fn();
    controller.subscribe(0, { onUpdate });
    controller.subscribe(1, { onUpdate: other });

    stream.push(ZONE_STATUS);

    await vi.waitFor(() => expect(onUpdate).toHaveBeenCalledWith(0));
    expect(other).not.toHaveBeenCalled();

    await controller.close();
  });

  it("keeps notifying after a subscriber throws", async () => {
    const { stream } = createFakeConsole();
    const controller = new AirTouchController(CONSOLE, async () => stream);

    const ready = controller.init();
    stream.push(Buffer.concat([AC_STATUS, ZONE_STATUS]));
    await ready;

    const failing = vi.fn(() => {
      throw new Error("subscriber failed");
    });
    const onUpdate = vi.fn();
    controller.subscribe(0, { onUpdate: failing });
    controller.subscribe(0, { onUpdate });

    stream.push(AC_STATUS);

    await vi.waitFor(() => expect(onUpdate).toHaveBeenCalledTimes(1));
    expect(failing).toHaveBeenCalledTimes(1);

    await controller.close();
  });

  it("returns false when the connection cannot be opened", async () => {
    const controller = new AirTouchController(CONSOLE, async () => {
      throw new Error("connect ECONNREFUSED");
    });

    expect(await controller.init()).toBe(false);
  });

  it("returns false when the console closes before answering", async () => {
    const { stream, written } = createFakeConsole();
    const controller = new AirTouchController(CONSOLE, async () => stream);

    const ready = controller.init();
    await vi.waitFor(() => expect(written).toHaveLength(4));
    stream.destroy();

    expect(await ready).toBe(false);
  });

  it("reports a connection dropped after init to disconnect listeners", async () => {
    const { stream } = createFakeConsole();
    const controller = new AirTouchController(CONSOLE, async () => stream);

    const ready = controller.init();
    stream.push(Buffer.concat([AC_STATUS, ZONE_STATUS]));
    expect(await ready).toBe(true);

    const onDisconnect = vi.fn();
    controller.onDisconnect(onDisconnect);
    stream.destroy(new Error("read ECONNRESET"));

    await vi.waitFor(() => expect(onDisconnect).toHaveBeenCalledTimes(1));
    expect(onDisconnect).toHaveBeenCalledWith("read ECONNRESET");

    const late = vi.fn();
    controller.onDisconnect(late);
    expect(late).toHaveBeenCalledWith("read ECONNRESET");

    await controller.close();
    expect(onDisconnect).toHaveBeenCalledTimes(1);
  });

  it("does not report a disconnect for its own close", async () => {
    const { stream } = createFakeConsole();
    const controller = new AirTouchController(CONSOLE, async () => stream);

    const ready = controller.init();
    stream.push(Buffer.concat([AC_STATUS, ZONE_STATUS]));
    await ready;

    const onDisconnect = vi.fn();
    controller.onDisconnect(onDisconnect);
    await controller.close();

    expect(onDisconnect).not.toHaveBeenCalled();
  });

  it("settles a pending init as false when closed", async () => {
    const { stream, written } = createFakeConsole();
    const controller = new AirTouchController(CONSOLE, async () => stream);

    const ready = controller.init();
    await vi.waitFor(() => expect(written).toHaveLength(4));
    await controller.close();

    expect(await ready).toBe(false);
    expect(stream.destroyed).toBe(true);
  });
});
