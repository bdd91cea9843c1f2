import * as mqtt from "mqtt";
import { TOPIC_SENSOR_ALL, TOPIC_SENSOR_PREFIX, TOPIC_SENSOR_WILDCARD } from "../constants";
import { AquaponicsContext } from "../context";
import { createServiceLogger, Logger } from "../logger";

/**
 * Routes one telemetry message. Only the combined topic is ingested; the
 * per-sensor topics duplicate its values.
 */
export function handleTelemetryMessage(
  ctx: AquaponicsContext,
  topic: string,
  payload: string | Buffer,
  log: Logger,
): void {
  if (topic === TOPIC_SENSOR_ALL) {
    ctx.ingest(payload);
  } else if (topic.startsWith(TOPIC_SENSOR_PREFIX)) {
    log.debug(`📡 ${topic}: ${payload.toString()}`);
  }
}

/**
 * Subscribes the manager's client to the telemetry topics. Messages are
 * ingested one at a time, in the order the client delivers them.
 */
export function startMonitor(
  client: mqtt.MqttClient,
  ctx: AquaponicsContext,
  log: Logger = createServiceLogger("monitor"),
): void {
  client.on("connect", () => {
    log.info("✅ Connected to broker");
    client.subscribe(TOPIC_SENSOR_WILDCARD, (err) => {
      if (err) {
        log.error(`❌ Subscribe to ${TOPIC_SENSOR_WILDCARD} failed: ${err.message}`);
      } else {
        log.info(`👂 Listening on ${TOPIC_SENSOR_WILDCARD}`);
      }
    });
  });

  client.on("offline", () => log.warn("⚠️ Broker offline, waiting for reconnect"));
  client.on("error", (err) => log.error(`❌ MQTT error: ${err.message}`));

  client.on("message", (topic, message) => {
    handleTelemetryMessage(ctx, topic, message, log);
  });
}
