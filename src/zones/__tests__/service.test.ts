/**
 * Service tests - zone update handler against an in-memory controller.
 */
import { describe, expect, it, vi } from "vitest";
import {
  FakeController,
  createRecordingGauge,
  makeAirConditioner,
  makeZone,
} from "../../__tests__/fixtures.js";
import type { Zone } from "../../airtouch/index.js";
import { createMetricEmitter } from "../../telemetry/index.js";
import { createZoneUpdateHandler } from "../service.js";

function setup(zones: Zone[]) {
  const controller = new FakeController("Home", "192.168.1.20", [
    makeAirConditioner({ zones }),
  ]);
  const gauge = createRecordingGauge();
  const emitter = createMetricEmitter(gauge);
  return { controller, gauge, emitter };
}

describe("createZoneUpdateHandler", () => {
  it("records one sample per zone with a reading", () => {
    const { controller, gauge, emitter } = setup([
      makeZone({ zoneId: 1, name: "Living", currentTemperature: 21.5 }),
      makeZone({ zoneId: 2, name: "Kitchen", currentTemperature: null }),
      makeZone({ zoneId: 3, name: "Study", currentTemperature: 19 }),
    ]);
    const handler = createZoneUpdateHandler(controller, emitter);

    const summary = handler.handle(0);

    expect(summary).toEqual({ acId: 0, recorded: 2, skipped: 1, failed: 0 });
    expect(gauge.samples.map((s) => s.value)).toEqual([21.5, 19]);
    expect(gauge.samples.map((s) => s.attributes["airtouch.zone.id"])).toEqual([1, 3]);
    expect(emitter.recordedCount()).toBe(2);
  });

  it("records nothing when no zone has a reading", () => {
    const { controller, gauge, emitter } = setup([
      makeZone({ zoneId: 1, currentTemperature: null }),
      makeZone({ zoneId: 2, currentTemperature: null }),
    ]);
    const handler = createZoneUpdateHandler(controller, emitter);

    expect(handler.handle(0)).toEqual({ acId: 0, recorded: 0, skipped: 2, failed: 0 });
    expect(gauge.samples).toEqual([]);
  });

  it("ignores an unknown air conditioner", () => {
    const { controller, gauge, emitter } = setup([makeZone()]);
    const onSummary = vi.fn();
    const handler = createZoneUpdateHandler(controller, emitter, onSummary);

    expect(handler.handle(9)).toBeNull();
    expect(gauge.samples).toEqual([]);
    expect(onSummary).not.toHaveBeenCalled();
  });

  it("reads the controller's live state on every notification", () => {
    const { controller, gauge, emitter } = setup([
      makeZone({ zoneId: 1, currentTemperature: 21.5 }),
    ]);
    const handler = createZoneUpdateHandler(controller, emitter);

    handler.onUpdate(0);
    controller.airConditioners = [
      makeAirConditioner({ zones: [makeZone({ zoneId: 1, currentTemperature: 23 })] }),
    ];
    handler.onUpdate(0);

    expect(gauge.samples.map((s) => s.value)).toEqual([21.5, 23]);
  });

  it("skips a zone whose attributes cannot be built", () => {
    const broken: Zone = Object.defineProperty(
      { ...makeZone({ zoneId: 2 }) },
      "controlMethod",
      {
        get() {
          throw new Error("corrupt zone record");
        },
      },
    );
    const { controller, gauge, emitter } = setup([
      makeZone({ zoneId: 1 }),
      broken,
      makeZone({ zoneId: 3 }),
    ]);
    const handler = createZoneUpdateHandler(controller, emitter);

    expect(handler.handle(0)).toEqual({ acId: 0, recorded: 2, skipped: 0, failed: 1 });
    expect(gauge.samples.map((s) => s.attributes["airtouch.zone.id"])).toEqual([1, 3]);
  });

  it("reports each summary", () => {
    const { controller, emitter } = setup([makeZone()]);
    const onSummary = vi.fn();
    const handler = createZoneUpdateHandler(controller, emitter, onSummary);

    handler.onUpdate(0);

    expect(onSummary).toHaveBeenCalledWith({ acId: 0, recorded: 1, skipped: 0, failed: 0 });
  });
});
