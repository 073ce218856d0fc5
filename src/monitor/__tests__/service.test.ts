/**
 * Service tests - one controller's monitor lifecycle.
 */
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  FakeController,
  createRecordingGauge,
  makeAirConditioner,
  makeZone,
  never,
} from "../../__tests__/fixtures.js";
import { createMetricEmitter } from "../../telemetry/index.js";
import { formatMonitorError } from "../errors.js";
import {
  controllerId,
  getMonitorSnapshots,
  monitorController,
  resetMonitorSnapshots,
} from "../service.js";

const AIR_CONDITIONERS = [
  makeAirConditioner({
    acId: 0,
    zones: [makeZone({ zoneId: 0 }), makeZone({ zoneId: 1 })],
  }),
  makeAirConditioner({
    acId: 1,
    name: "Upstairs",
    zones: [makeZone({ zoneId: 2 })],
  }),
];

function setup(initResult: boolean | (() => Promise<boolean>) = true) {
  const controller = new FakeController("Home", "192.168.1.20", AIR_CONDITIONERS, initResult);
  const gauge = createRecordingGauge();
  const emitter = createMetricEmitter(gauge);
  const shutdown = new AbortController();
  return { controller, gauge, emitter, shutdown };
}

describe("monitorController", () => {
  beforeEach(() => {
    resetMonitorSnapshots();
  });

  it("subscribes every air conditioner and records a baseline", async () => {
    const { controller, gauge, emitter, shutdown } = setup();

    const running = monitorController(controller, emitter, {
      signal: shutdown.signal,
      initTimeoutMs: 1000,
    });

    await vi.waitFor(() => expect(getMonitorSnapshots()[0]?.state).toBe("ACTIVE"));

    expect(controller.subscriptions.map((s) => s.acId)).toEqual([0, 1]);
    expect(gauge.samples).toHaveLength(3);
    expect(getMonitorSnapshots()[0]?.samplesRecorded).toBe(3);

    shutdown.abort();
    const result = await running;

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        type: "STOPPED",
        controller: "Home (192.168.1.20)",
        samplesRecorded: 3,
      });
    }
    expect(getMonitorSnapshots()[0]?.state).toBe("TERMINATED");
  });

  it("records a sample for every notification while active", async () => {
    const { controller, gauge, emitter, shutdown } = setup();

    const running = monitorController(controller, emitter, {
      signal: shutdown.signal,
      initTimeoutMs: 1000,
    });
    await vi.waitFor(() => expect(getMonitorSnapshots()[0]?.state).toBe("ACTIVE"));

    controller.notify(1);

    expect(gauge.samples).toHaveLength(4);
    expect(gauge.samples[3]?.attributes["airtouch.ac.name"]).toBe("Upstairs");
    expect(getMonitorSnapshots()[0]?.samplesRecorded).toBe(4);
    expect(getMonitorSnapshots()[0]?.lastUpdateAt).not.toBeNull();

    shutdown.abort();
    await running;
  });

  it("terminates with an error when the connection drops while active", async () => {
    const { controller, gauge, emitter, shutdown } = setup();

    const running = monitorController(controller, emitter, {
      signal: shutdown.signal,
      initTimeoutMs: 1000,
    });
    await vi.waitFor(() => expect(getMonitorSnapshots()[0]?.state).toBe("ACTIVE"));

    controller.disconnect("console closed the connection");
    const result = await running;

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: "CONNECTION_LOST",
        controller: "Home (192.168.1.20)",
        reason: "console closed the connection",
      });
    }
    expect(getMonitorSnapshots()[0]).toMatchObject({
      state: "TERMINATED",
      samplesRecorded: 3,
      error: "Error: Home (192.168.1.20) connection lost: console closed the connection",
    });
    expect(gauge.samples).toHaveLength(3);
    expect(shutdown.signal.aborted).toBe(false);
  });

  it("terminates without subscribing when init fails", async () => {
    const { controller, gauge, emitter, shutdown } = setup(false);

    const result = await monitorController(controller, emitter, {
      signal: shutdown.signal,
      initTimeoutMs: 1000,
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("INIT_FAILED");
      expect(formatMonitorError(result.error)).toBe(
        "Error: Home (192.168.1.20) initialisation failed.",
      );
    }
    expect(controller.subscriptions).toEqual([]);
    expect(gauge.samples).toEqual([]);
    expect(getMonitorSnapshots()[0]?.state).toBe("TERMINATED");
  });

  it("terminates when init does not finish in time", async () => {
    const { controller, emitter, shutdown } = setup(() => never<boolean>());

    const result = await monitorController(controller, emitter, {
      signal: shutdown.signal,
      initTimeoutMs: 20,
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: "INIT_TIMEOUT",
        controller: "Home (192.168.1.20)",
        timeoutMs: 20,
      });
    }
    expect(controller.subscriptions).toEqual([]);
  });

  it("terminates when init throws", async () => {
    const { controller, emitter, shutdown } = setup(async () => {
      throw new Error("socket hang up");
    });

    const result = await monitorController(controller, emitter, {
      signal: shutdown.signal,
      initTimeoutMs: 1000,
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("INIT_ERROR");
    }
    expect(getMonitorSnapshots()[0]?.error).not.toBeNull();
  });

  it("is cancelled by shutdown during init", async () => {
    const { controller, emitter, shutdown } = setup(() => never<boolean>());

    const running = monitorController(controller, emitter, {
      signal: shutdown.signal,
      initTimeoutMs: 10000,
    });
    await vi.waitFor(() => expect(controller.init).toHaveBeenCalled());
    shutdown.abort();

    const result = await running;

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.type).toBe("CANCELLED");
    }
    expect(controller.subscriptions).toEqual([]);
    expect(getMonitorSnapshots()[0]?.state).toBe("TERMINATED");
  });
});

describe("controllerId", () => {
  it("combines name and host", () => {
    expect(controllerId({ name: "Home", host: "10.0.0.5" })).toBe("Home (10.0.0.5)");
  });
});
