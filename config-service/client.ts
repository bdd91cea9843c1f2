import axios from "axios";
import { AppConfig } from "../config";
import { CONFIG_RETRY_DELAY_MS } from "../constants";
import { ConfigurationError, describeError, ParseError } from "../errors";
import { Logger } from "../logger";
import { PenaltyConfig, SimulationConfig, ThresholdConfig } from "../types";
import { RemoteConfig } from "./app";

export type ConfigFetcher = (url: string) => Promise<unknown>;

export const httpFetcher: ConfigFetcher = async (url) => {
  const response = await axios.get<unknown>(url);
  return response.data;
};

export interface FetchConfigOptions {
  log: Logger;
  fetcher?: ConfigFetcher;
  retryDelayMs?: number;
  maxAttempts?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(obj: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = obj[key];
  if (!isRecord(value)) throw new ParseError(`config.${key} must be an object`);
  return value;
}

function num(obj: Record<string, unknown>, key: string, path: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ParseError(`${path}.${key} must be a number`);
  }
  return value;
}

function str(obj: Record<string, unknown>, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== "string") throw new ParseError(`${path}.${key} must be a string`);
  return value;
}

function penalty(obj: Record<string, unknown>, key: string): PenaltyConfig {
  const value = obj[key];
  if (!isRecord(value)) throw new ParseError(`config.simulation.${key} must be an object`);
  const path = `config.simulation.${key}`;
  return {
    waterLevel: num(value, "waterLevel", path),
    dissolvedOxygen: num(value, "dissolvedOxygen", path),
  };
}

/** @throws {ParseError} when the body does not match {@link RemoteConfig} */
export function parseRemoteConfig(data: unknown): RemoteConfig {
  if (!isRecord(data)) throw new ParseError("config must be an object");

  const settings = section(data, "settings");
  const t = section(data, "thresholds");
  const sim = section(data, "simulation");

  const thresholds: ThresholdConfig = {
    do_low: num(t, "do_low", "config.thresholds"),
    ammonia_high: num(t, "ammonia_high", "config.thresholds"),
    water_level_low: num(t, "water_level_low", "config.thresholds"),
    temp_high: num(t, "temp_high", "config.thresholds"),
    ph_low: num(t, "ph_low", "config.thresholds"),
  };
  const simulation: SimulationConfig = {
    publish_interval_ms: num(sim, "publish_interval_ms", "config.simulation"),
    failure: penalty(sim, "failure"),
    pump_off: penalty(sim, "pump_off"),
  };

  return {
    settings: {
      system_name: str(settings, "system_name", "config.settings"),
    },
    thresholds,
    simulation,
  };
}

/**
 * Polls the config service until it answers. Unreachable service: retry
 * after `retryDelayMs`. Malformed body: throw, retrying would not help.
 */
export async function fetchConfigWithRetry(
  url: string,
  options: FetchConfigOptions,
): Promise<RemoteConfig> {
  const { log } = options;
  const fetcher = options.fetcher ?? httpFetcher;
  const retryDelayMs = options.retryDelayMs ?? CONFIG_RETRY_DELAY_MS;
  const maxAttempts = options.maxAttempts ?? Infinity;

  let attempts = 0;
  while (true) {
    let data: unknown;
    try {
      data = await fetcher(url);
    } catch (error) {
      attempts++;
      if (attempts >= maxAttempts) {
        throw new ConfigurationError(
          `Config service unreachable after ${attempts} attempts: ${describeError(error)}`,
          { cause: error },
        );
      }
      log.warn(
        `⚠️ Config Service unreachable (Attempt ${attempts}). Retrying in ${retryDelayMs / 1000}s...`,
      );
      await new Promise((resolve) => setTimeout(resolve, retryDelayMs));
      continue;
    }

    const remote = parseRemoteConfig(data);
    log.info(`📥 Configuration received from Config Service (${remote.settings.system_name}).`);
    return remote;
  }
}

export interface RuntimeSettings {
  thresholds: ThresholdConfig;
  simulation: SimulationConfig;
}

/** Remote knowledge when CONFIG_SERVICE_URL is set, local env otherwise. */
export async function resolveRuntimeSettings(
  config: AppConfig,
  options: FetchConfigOptions,
): Promise<RuntimeSettings> {
  if (!config.CONFIG_SERVICE_URL) {
    return { thresholds: config.THRESHOLDS, simulation: config.SIMULATION };
  }
  const remote = await fetchConfigWithRetry(config.CONFIG_SERVICE_URL, {
    ...options,
    maxAttempts: options.maxAttempts ?? (config.CONFIG_MAX_ATTEMPTS || Infinity),
  });
  return { thresholds: remote.thresholds, simulation: remote.simulation };
}
