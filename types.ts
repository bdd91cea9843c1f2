export type PumpStatus = "ON" | "OFF" | "FAILURE";
export type LightStatus = "ON" | "OFF";

/**
 * Fields published by the managed resource on the telemetry channel.
 * `diagnosis` is added by the manager, see {@link Reading}.
 */
export interface SensorSnapshot {
  timestamp: string;
  water_temp_C: number;
  air_temp_C: number;
  pH: number;
  ammonia_mgL: number;
  dissolved_oxygen_mgL: number;
  ec_uScm: number;
  water_level_percent: number;
  humidity_percent: number;
  light_lux: number;
  pump_status: PumpStatus;
  light_status: LightStatus;
  reading_id: number;
}

export interface Reading extends SensorSnapshot {
  diagnosis: string;
}

export type NumericSensorField = Exclude<
  {
    [K in keyof SensorSnapshot]: SensorSnapshot[K] extends number ? K : never;
  }[keyof SensorSnapshot],
  "reading_id"
>;

export interface ThresholdConfig {
  do_low: number;
  ammonia_high: number;
  water_level_low: number;
  temp_high: number;
  ph_low: number;
}

export type AlertSeverity = "warning" | "danger";

export interface Alert {
  type: AlertSeverity;
  sensor: string;
  message: string;
}

export type PumpState = "on" | "off" | "toggle";
export type LightState = PumpState | "auto";

export type ControlCommand =
  | { action: "pump"; state: PumpState }
  | { action: "light"; state: LightState }
  | { action: "simulate_failure"; enable: boolean };

export interface DeviceState {
  pump_on: boolean;
  pump_failure: boolean;
  light_on: boolean;
  light_manual: boolean;
  ph_drift: number;
  ec_drift: number;
  reading_count: number;
}

export interface PenaltyConfig {
  waterLevel: number;
  dissolvedOxygen: number;
}

export interface SimulationConfig {
  publish_interval_ms: number;
  failure: PenaltyConfig;
  pump_off: PenaltyConfig;
}
