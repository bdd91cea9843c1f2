import {
  TOPIC_CONTROL_LIGHT,
  TOPIC_CONTROL_PUMP,
  TOPIC_CONTROL_SIMULATE,
} from "../constants";
import { ParseError, UnrecognizedCommandValue } from "../errors";
import {
  ControlCommand,
  LightState,
  LightStatus,
  NumericSensorField,
  PumpState,
  PumpStatus,
  SensorSnapshot,
} from "../types";

// ==========================================
// TELEMETRY - aquaponics/sensors/*
// ==========================================

/**
 * Values used when a sensor field is absent from an inbound payload.
 * Each one keeps the diagnosis rules and alerts quiet.
 */
export const READING_DEFAULTS: Omit<SensorSnapshot, "timestamp" | "reading_id"> = {
  water_temp_C: 20,
  air_temp_C: 20,
  pH: 7,
  ammonia_mgL: 0,
  dissolved_oxygen_mgL: 10,
  ec_uScm: 900,
  water_level_percent: 100,
  humidity_percent: 60,
  light_lux: 0,
  pump_status: "ON",
  light_status: "OFF",
};

const NUMERIC_FIELDS: readonly NumericSensorField[] = [
  "water_temp_C",
  "air_temp_C",
  "pH",
  "ammonia_mgL",
  "dissolved_oxygen_mgL",
  "ec_uScm",
  "water_level_percent",
  "humidity_percent",
  "light_lux",
];

const PUMP_STATUSES: readonly PumpStatus[] = ["ON", "OFF", "FAILURE"];
const LIGHT_STATUSES: readonly LightStatus[] = ["ON", "OFF"];

export const PUMP_STATES: readonly PumpState[] = ["on", "off", "toggle"];
export const LIGHT_STATES: readonly LightState[] = ["on", "off", "toggle", "auto"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonObject(raw: string | Buffer): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.toString());
  } catch (err) {
    throw new ParseError("Payload is not valid JSON", { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new ParseError("Payload must be a JSON object");
  }
  return parsed;
}

function oneOf<T extends string>(allowed: readonly T[], value: string): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function readNumber(obj: Record<string, unknown>, field: NumericSensorField): number {
  const value = obj[field];
  if (value === undefined || value === null) return READING_DEFAULTS[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ParseError(`${field} must be a finite number`);
  }
  return value;
}

function readEnum<T extends string>(
  obj: Record<string, unknown>,
  field: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const value = obj[field];
  if (value === undefined || value === null) return fallback;
  const match = typeof value === "string" ? oneOf(allowed, value) : undefined;
  if (match === undefined) {
    throw new ParseError(`${field} must be one of ${allowed.join(", ")}`);
  }
  return match;
}

/**
 * Decodes a combined telemetry payload. `timestamp` and `reading_id` are
 * required; missing sensor fields take {@link READING_DEFAULTS}. A
 * `diagnosis` sent by the producer is ignored.
 *
 * @throws {ParseError}
 */
export function decodeReading(raw: string | Buffer): SensorSnapshot {
  const obj = parseJsonObject(raw);

  const timestamp = obj.timestamp;
  if (typeof timestamp !== "string" || Number.isNaN(Date.parse(timestamp))) {
    throw new ParseError("timestamp must be an ISO-8601 string");
  }
  const readingId = obj.reading_id;
  if (typeof readingId !== "number" || !Number.isInteger(readingId) || readingId < 1) {
    throw new ParseError("reading_id must be a positive integer");
  }

  const snapshot: SensorSnapshot = {
    ...READING_DEFAULTS,
    timestamp,
    reading_id: readingId,
    pump_status: readEnum(obj, "pump_status", PUMP_STATUSES, READING_DEFAULTS.pump_status),
    light_status: readEnum(obj, "light_status", LIGHT_STATUSES, READING_DEFAULTS.light_status),
  };
  for (const field of NUMERIC_FIELDS) {
    snapshot[field] = readNumber(obj, field);
  }
  return snapshot;
}

export function encodeReading(snapshot: SensorSnapshot): string {
  const payload: SensorSnapshot = {
    timestamp: snapshot.timestamp,
    water_temp_C: snapshot.water_temp_C,
    air_temp_C: snapshot.air_temp_C,
    pH: snapshot.pH,
    ammonia_mgL: snapshot.ammonia_mgL,
    dissolved_oxygen_mgL: snapshot.dissolved_oxygen_mgL,
    ec_uScm: snapshot.ec_uScm,
    water_level_percent: snapshot.water_level_percent,
    humidity_percent: snapshot.humidity_percent,
    light_lux: snapshot.light_lux,
    pump_status: snapshot.pump_status,
    light_status: snapshot.light_status,
    reading_id: snapshot.reading_id,
  };
  return JSON.stringify(payload);
}

export function encodeSensorValue(value: number, timestamp: string): string {
  return JSON.stringify({ value, timestamp });
}

// ==========================================
// CONTROL - aquaponics/control/*
// ==========================================

export function pumpCommand(state: string): ControlCommand {
  const match = oneOf(PUMP_STATES, state);
  if (match === undefined) throw new UnrecognizedCommandValue("pump state", state);
  return { action: "pump", state: match };
}

export function lightCommand(state: string): ControlCommand {
  const match = oneOf(LIGHT_STATES, state);
  if (match === undefined) throw new UnrecognizedCommandValue("light state", state);
  return { action: "light", state: match };
}

export function controlTopic(command: ControlCommand): string {
  switch (command.action) {
    case "pump":
      return TOPIC_CONTROL_PUMP;
    case "light":
      return TOPIC_CONTROL_LIGHT;
    case "simulate_failure":
      return TOPIC_CONTROL_SIMULATE;
  }
}

export function encodeControl(command: ControlCommand): { topic: string; payload: string } {
  return { topic: controlTopic(command), payload: JSON.stringify(command) };
}

const ACTION_BY_TOPIC: Record<string, ControlCommand["action"]> = {
  [TOPIC_CONTROL_PUMP]: "pump",
  [TOPIC_CONTROL_LIGHT]: "light",
  [TOPIC_CONTROL_SIMULATE]: "simulate_failure",
};

/**
 * Decodes a message received on one of the control topics. A missing
 * `state` means `toggle`; a missing `enable` means `true`.
 *
 * @throws {ParseError} malformed payload, or a topic that is not a control topic
 * @throws {UnrecognizedCommandValue} a `state` string outside the protocol
 */
export function decodeControl(topic: string, raw: string | Buffer): ControlCommand {
  const action = ACTION_BY_TOPIC[topic];
  if (action === undefined) {
    throw new ParseError(`${topic} is not a control topic`);
  }

  const obj = parseJsonObject(raw);
  if (obj.action !== undefined && obj.action !== action) {
    throw new ParseError(`action "${String(obj.action)}" does not match topic ${topic}`);
  }

  if (action === "simulate_failure") {
    const enable = obj.enable ?? true;
    if (typeof enable !== "boolean") {
      throw new ParseError("enable must be a boolean");
    }
    return { action, enable };
  }

  const state = obj.state ?? "toggle";
  if (typeof state !== "string") {
    throw new ParseError("state must be a string");
  }
  return action === "pump" ? pumpCommand(state) : lightCommand(state);
}
