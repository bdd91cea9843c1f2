import { SENSOR_TOPIC_FIELDS, TOPIC_SENSOR_ALL, TOPIC_SENSOR_PREFIX } from "../constants";
import { ParseError, UnrecognizedCommandValue } from "../errors";
import { Logger } from "../logger";
import { decodeControl, encodeReading, encodeSensorValue } from "../protocol";
import { SensorSnapshot } from "../types";
import { AquaponicsProcessModel } from "./process-model";

export interface TelemetryPublisher {
  publish(topic: string, message: string): unknown;
}

// SENSOR touchpoint: one topic per sensor, then the combined reading
export function publishReading(client: TelemetryPublisher, reading: SensorSnapshot): void {
  for (const [name, field] of Object.entries(SENSOR_TOPIC_FIELDS)) {
    client.publish(
      `${TOPIC_SENSOR_PREFIX}${name}`,
      encodeSensorValue(reading[field], reading.timestamp),
    );
  }
  client.publish(TOPIC_SENSOR_ALL, encodeReading(reading));
}

// ACTUATOR touchpoint: bad commands are logged and ignored
export function handleControlMessage(
  model: AquaponicsProcessModel,
  topic: string,
  payload: string | Buffer,
  log: Logger,
): void {
  try {
    const command = decodeControl(topic, payload);
    log.info(`📥 Received control command on ${topic}`);
    model.applyCommand(command);
  } catch (err) {
    if (err instanceof UnrecognizedCommandValue) {
      log.warn(`⚠️ Ignored command on ${topic}: ${err.message}`);
      return;
    }
    if (err instanceof ParseError) {
      log.warn(`❌ Error processing control message on ${topic}: ${err.message}`);
      return;
    }
    throw err;
  }
}

export function summarize(reading: SensorSnapshot): string {
  return (
    `Reading #${reading.reading_id} | ` +
    `Water ${reading.water_temp_C}°C Air ${reading.air_temp_C}°C | ` +
    `pH ${reading.pH} DO ${reading.dissolved_oxygen_mgL} mg/L | ` +
    `NH3 ${reading.ammonia_mgL} mg/L EC ${reading.ec_uScm} µS/cm | ` +
    `Level ${reading.water_level_percent}% Hum ${reading.humidity_percent}% | ` +
    `Light ${reading.light_lux} lux (${reading.light_status}) Pump ${reading.pump_status}`
  );
}
