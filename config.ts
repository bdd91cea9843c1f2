import dotenv from "dotenv";
import {
  AMMONIA_HIGH,
  DEFAULT_API_PORT,
  DEFAULT_CONFIG_SERVICE_PORT,
  DEFAULT_CSV_FILE,
  DEFAULT_MANAGER_CLIENT_ID,
  DEFAULT_MAX_READINGS,
  DEFAULT_MQTT_BROKER_URL,
  DEFAULT_PUBLISH_INTERVAL_MS,
  DEFAULT_SIMULATOR_CLIENT_ID,
  DO_LOW,
  FAILURE_DO_PENALTY,
  FAILURE_WATER_LEVEL_PENALTY,
  PH_LOW,
  PUMP_OFF_DO_PENALTY,
  PUMP_OFF_WATER_LEVEL_PENALTY,
  TEMP_HIGH,
  WATER_LEVEL_LOW,
} from "./constants";
import { ConfigurationError } from "./errors";
import { SimulationConfig, ThresholdConfig } from "./types";

dotenv.config();

export interface AppConfig {
  MQTT_BROKER_URL: string;
  MANAGER_CLIENT_ID: string;
  SIMULATOR_CLIENT_ID: string;
  API_PORT: number;
  CONFIG_SERVICE_PORT: number;
  CONFIG_SERVICE_URL?: string;
  /** 0 retries the config service forever. */
  CONFIG_MAX_ATTEMPTS: number;
  CSV_FILE: string;
  MAX_READINGS: number;
  THRESHOLDS: ThresholdConfig;
  SIMULATION: SimulationConfig;
}

type Env = Record<string, string | undefined>;

function envNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function envNonNegativeInt(env: Env, name: string, fallback: number): number {
  const value = envNumber(env, name, fallback);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${env[name]}"`);
  }
  return value;
}

function envPositiveInt(env: Env, name: string, fallback: number): number {
  const value = envNumber(env, name, fallback);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${env[name]}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    MQTT_BROKER_URL: env.MQTT_BROKER_URL || DEFAULT_MQTT_BROKER_URL,
    MANAGER_CLIENT_ID: env.MANAGER_CLIENT_ID || DEFAULT_MANAGER_CLIENT_ID,
    SIMULATOR_CLIENT_ID: env.SIMULATOR_CLIENT_ID || DEFAULT_SIMULATOR_CLIENT_ID,
    API_PORT: envPositiveInt(env, "API_PORT", DEFAULT_API_PORT),
    CONFIG_SERVICE_PORT: envPositiveInt(env, "CONFIG_SERVICE_PORT", DEFAULT_CONFIG_SERVICE_PORT),
    CONFIG_SERVICE_URL: env.CONFIG_SERVICE_URL || undefined,
    CONFIG_MAX_ATTEMPTS: envNonNegativeInt(env, "CONFIG_MAX_ATTEMPTS", 0),
    CSV_FILE: env.CSV_FILE || DEFAULT_CSV_FILE,
    MAX_READINGS: envPositiveInt(env, "MAX_READINGS", DEFAULT_MAX_READINGS),
    THRESHOLDS: {
      do_low: envNumber(env, "THRESHOLD_DO_LOW", DO_LOW),
      ammonia_high: envNumber(env, "THRESHOLD_AMMONIA_HIGH", AMMONIA_HIGH),
      water_level_low: envNumber(env, "THRESHOLD_WATER_LEVEL_LOW", WATER_LEVEL_LOW),
      temp_high: envNumber(env, "THRESHOLD_TEMP_HIGH", TEMP_HIGH),
      ph_low: envNumber(env, "THRESHOLD_PH_LOW", PH_LOW),
    },
    SIMULATION: {
      publish_interval_ms: envPositiveInt(env, "PUBLISH_INTERVAL_MS", DEFAULT_PUBLISH_INTERVAL_MS),
      failure: {
        waterLevel: envNumber(env, "FAILURE_WATER_LEVEL_PENALTY", FAILURE_WATER_LEVEL_PENALTY),
        dissolvedOxygen: envNumber(env, "FAILURE_DO_PENALTY", FAILURE_DO_PENALTY),
      },
      pump_off: {
        waterLevel: envNumber(env, "PUMP_OFF_WATER_LEVEL_PENALTY", PUMP_OFF_WATER_LEVEL_PENALTY),
        dissolvedOxygen: envNumber(env, "PUMP_OFF_DO_PENALTY", PUMP_OFF_DO_PENALTY),
      },
    },
  };
}
