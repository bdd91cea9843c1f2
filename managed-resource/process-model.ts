import {
  EC_DRIFT_STD,
  FAILURE_DO_PENALTY,
  FAILURE_WATER_LEVEL_PENALTY,
  LIGHT_PEAK_LUX,
  PH_DRIFT_PER_TICK,
  PUMP_OFF_DO_PENALTY,
  PUMP_OFF_WATER_LEVEL_PENALTY,
} from "../constants";
import { createServiceLogger, Logger } from "../logger";
import {
  ControlCommand,
  DeviceState,
  LightStatus,
  PenaltyConfig,
  PumpStatus,
  SensorSnapshot,
} from "../types";

export interface NoiseSource {
  gaussian(mean: number, std: number): number;
}

// Box-Muller over Math.random
export const randomNoise: NoiseSource = {
  gaussian(mean, std) {
    const u = 1 - Math.random(); // (0, 1], keeps log() finite
    const v = Math.random();
    return mean + std * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  },
};

export interface ProcessModelOptions {
  failure?: PenaltyConfig;
  pumpOff?: PenaltyConfig;
  noise?: NoiseSource;
  log?: Logger;
}

function round(value: number, decimals: number): number {
  return parseFloat(value.toFixed(decimals));
}

export function initialDeviceState(): DeviceState {
  return {
    pump_on: true,
    pump_failure: false,
    light_on: true,
    light_manual: false,
    ph_drift: 0,
    ec_drift: 0,
    reading_count: 0,
  };
}

/**
 * Digital twin of the aquaponics tank. Control commands change the device
 * state immediately; their effect shows up in the next generated reading.
 */
export class AquaponicsProcessModel {
  private readonly state: DeviceState = initialDeviceState();
  private readonly failure: PenaltyConfig;
  private readonly pumpOff: PenaltyConfig;
  private readonly noise: NoiseSource;
  private readonly log: Logger;

  constructor(options: ProcessModelOptions = {}) {
    this.failure = options.failure ?? {
      waterLevel: FAILURE_WATER_LEVEL_PENALTY,
      dissolvedOxygen: FAILURE_DO_PENALTY,
    };
    this.pumpOff = options.pumpOff ?? {
      waterLevel: PUMP_OFF_WATER_LEVEL_PENALTY,
      dissolvedOxygen: PUMP_OFF_DO_PENALTY,
    };
    this.noise = options.noise ?? randomNoise;
    this.log = options.log ?? createServiceLogger("simulator");
  }

  deviceState(): DeviceState {
    return { ...this.state };
  }

  applyCommand(command: ControlCommand): void {
    const s = this.state;

    switch (command.action) {
      case "pump":
        s.pump_on = command.state === "toggle" ? !s.pump_on : command.state === "on";
        this.log.info(`🔧 Pump is now: ${s.pump_on ? "ON" : "OFF"}`);
        break;

      case "light":
        if (command.state === "auto") {
          s.light_manual = false;
        } else {
          s.light_manual = true;
          s.light_on = command.state === "toggle" ? !s.light_on : command.state === "on";
        }
        this.log.info(
          `💡 Light is now: ${s.light_on ? "ON" : "OFF"} (${s.light_manual ? "manual" : "auto"})`,
        );
        break;

      case "simulate_failure":
        s.pump_failure = command.enable;
        this.log.info(`⚠️ Pump failure simulation: ${command.enable ? "ENABLED" : "DISABLED"}`);
        break;
    }
  }

  // mean + amplitude * sin(2π·hour/24) + noise
  private dailyCycle(hour: number, mean: number, amplitude: number, noiseStd: number): number {
    return mean + amplitude * Math.sin((2 * Math.PI * hour) / 24) + this.noise.gaussian(0, noiseStd);
  }

  private illuminance(hour: number): number {
    const base = this.state.light_manual
      ? this.state.light_on
        ? LIGHT_PEAK_LUX
        : 0
      : Math.max(0, LIGHT_PEAK_LUX * Math.sin((2 * Math.PI * (hour - 6)) / 24));
    return Math.max(0, base + this.noise.gaussian(0, 500));
  }

  generateReading(now: Date = new Date()): SensorSnapshot {
    const s = this.state;
    const hour = now.getHours();

    s.reading_count += 1;
    s.ph_drift -= PH_DRIFT_PER_TICK;
    s.ec_drift += this.noise.gaussian(0, EC_DRIFT_STD);

    const waterTemp = this.dailyCycle(hour, 23.5, 1.5, 0.2);
    const airTemp = this.dailyCycle(hour, 22.0, 2.0, 0.3);
    const ph = 6.9 + s.ph_drift + this.noise.gaussian(0, 0.05);
    const ammonia = Math.max(0, this.noise.gaussian(0.15, 0.05));
    let dissolvedOxygen = this.dailyCycle(hour, 6.5, 0.6, 0.15);
    const ec = 900 + s.ec_drift;
    let waterLevel = 95 + this.noise.gaussian(0, 2);
    const humidity = this.dailyCycle(hour, 60, 10, 2);
    const lux = round(this.illuminance(hour), 0);

    let pumpStatus: PumpStatus = "ON";
    if (s.pump_failure) {
      pumpStatus = "FAILURE";
      waterLevel -= this.failure.waterLevel;
      dissolvedOxygen -= this.failure.dissolvedOxygen;
    } else if (!s.pump_on) {
      pumpStatus = "OFF";
      waterLevel -= this.pumpOff.waterLevel;
      dissolvedOxygen -= this.pumpOff.dissolvedOxygen;
    }

    const lightStatus: LightStatus = (s.light_manual ? s.light_on : lux > 0) ? "ON" : "OFF";

    return {
      timestamp: now.toISOString(),
      water_temp_C: round(waterTemp, 2),
      air_temp_C: round(airTemp, 2),
      pH: round(ph, 2),
      ammonia_mgL: round(ammonia, 3),
      dissolved_oxygen_mgL: round(Math.max(0, dissolvedOxygen), 2),
      ec_uScm: round(ec, 1),
      water_level_percent: round(Math.max(0, waterLevel), 1),
      humidity_percent: round(humidity, 1),
      light_lux: lux,
      pump_status: pumpStatus,
      light_status: lightStatus,
      reading_id: s.reading_count,
    };
  }
}
