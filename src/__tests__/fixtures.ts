/**
 * Shared test fixtures: state builders, an in-process controller and a
 * recording gauge.
 */
import { vi } from "vitest";

import type {
  AirConditioner,
  ControllerHandle,
  Subscriber,
  Zone,
} from "../airtouch/index.js";
import type { Gauge, MetricAttributes } from "../telemetry/index.js";

export function makeZone(overrides: Partial<Zone> = {}): Zone {
  return {
    zoneId: 1,
    name: "Living",
    powerState: "ON",
    controlMethod: "TEMPERATURE",
    currentTemperature: 21.5,
    targetTemperature: 22,
    damperPercentage: 80,
    spillActive: false,
    lowBattery: false,
    ...overrides,
  };
}

export function makeAirConditioner(
  overrides: Partial<AirConditioner> = {},
): AirConditioner {
  return {
    acId: 0,
    name: "Downstairs",
    powerState: "ON",
    mode: "COOL",
    fanSpeed: "AUTO",
    currentTemperature: 24.5,
    targetTemperature: 22,
    zones: [makeZone()],
    ...overrides,
  };
}

/**
 * Controller held entirely in memory. `notify` plays the console pushing a
 * status change and `disconnect` plays the console going away.
 */
export class FakeController implements ControllerHandle {
  airConditioners: ReadonlyArray<AirConditioner>;
  readonly subscriptions: Array<{ acId: number; subscriber: Subscriber }> = [];
  private readonly disconnectListeners: Array<(reason: string) => void> = [];
  readonly init = vi.fn<() => Promise<boolean>>();
  readonly close = vi.fn<() => Promise<void>>(async () => undefined);

  constructor(
    readonly name: string,
    readonly host: string,
    airConditioners: ReadonlyArray<AirConditioner>,
    initResult: boolean | (() => Promise<boolean>) = true,
  ) {
    this.airConditioners = airConditioners;
    this.init.mockImplementation(
      typeof initResult === "boolean" ? async () => initResult : initResult,
    );
  }

  subscribe(acId: number, subscriber: Subscriber): void {
    this.subscriptions.push({ acId, subscriber });
  }

  onDisconnect(listener: (reason: string) => void): void {
    this.disconnectListeners.push(listener);
  }

  disconnect(reason: string): void {
    for (const listener of this.disconnectListeners) {
      listener(reason);
    }
  }

  notify(acId: number): void {
    for (const subscription of this.subscriptions) {
      if (subscription.acId === acId) {
        subscription.subscriber.onUpdate(acId);
      }
    }
  }
}

export type RecordedSample = Readonly<{
  value: number;
  attributes: MetricAttributes;
}>;

/**
 * Gauge that keeps every sample it is given.
 */
export function createRecordingGauge(): Gauge & {
  samples: RecordedSample[];
} {
  const samples: RecordedSample[] = [];
  return {
    samples,
    set(value, attributes) {
      samples.push({ value, attributes });
    },
  };
}

/**
 * A promise that never settles, for timeout paths.
 */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
