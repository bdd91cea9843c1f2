import { ControlChannel } from "../executor";
import { NoiseSource } from "../managed-resource/process-model";
import { SensorSnapshot, ThresholdConfig } from "../types";

export const THRESHOLDS: ThresholdConfig = {
  do_low: 5.0,
  ammonia_high: 0.5,
  water_level_low: 80.0,
  temp_high: 26.0,
  ph_low: 6.0,
};

/** Every Gaussian sample lands exactly on its mean. */
export const zeroNoise: NoiseSource = {
  gaussian: (mean) => mean,
};

/** Local wall-clock time on a fixed day, so `getHours()` returns `hour`. */
export function atHour(hour: number): Date {
  return new Date(2025, 5, 15, hour, 0, 0);
}

export function makeSnapshot(overrides: Partial<SensorSnapshot> = {}): SensorSnapshot {
  return {
    timestamp: "2025-06-15T10:00:00.000Z",
    water_temp_C: 23.5,
    air_temp_C: 22.0,
    pH: 6.9,
    ammonia_mgL: 0.15,
    dissolved_oxygen_mgL: 6.5,
    ec_uScm: 900,
    water_level_percent: 95,
    humidity_percent: 60,
    light_lux: 12000,
    pump_status: "ON",
    light_status: "ON",
    reading_id: 1,
    ...overrides,
  };
}

export function payload(overrides: Partial<SensorSnapshot> = {}): string {
  return JSON.stringify(makeSnapshot(overrides));
}

export interface Published {
  topic: string;
  message: string;
}

export class FakeChannel implements ControlChannel {
  connected = true;
  failWith?: Error;
  readonly published: Published[] = [];

  publish(topic: string, message: string, callback?: (error?: Error) => void): void {
    this.published.push({ topic, message });
    callback?.(this.failWith);
  }
}

type Listener = (topic: string, payload: Buffer) => void;

/** Delivers every publish synchronously to every listener, in order. */
export class FakeBroker implements ControlChannel {
  connected = true;
  private readonly listeners: Listener[] = [];

  onMessage(listener: Listener): void {
    this.listeners.push(listener);
  }

  publish(topic: string, message: string, callback?: (error?: Error) => void): void {
    for (const listener of this.listeners) {
      listener(topic, Buffer.from(message));
    }
    callback?.();
  }
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error("condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
