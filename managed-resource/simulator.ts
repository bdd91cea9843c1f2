import * as mqtt from "mqtt";
import { loadConfig } from "../config";
import { resolveRuntimeSettings } from "../config-service/client";
import { CONTROL_TOPICS } from "../constants";
import { describeError } from "../errors";
import { createServiceLogger } from "../logger";
import { AquaponicsProcessModel } from "./process-model";
import { handleControlMessage, publishReading, summarize } from "./touchpoints";

const log = createServiceLogger("simulator");

async function startSimulator(): Promise<void> {
  log.info("🌱 Starting Aquaponics Digital Twin...");

  const config = loadConfig();
  const { simulation } = await resolveRuntimeSettings(config, { log });

  const model = new AquaponicsProcessModel({
    failure: simulation.failure,
    pumpOff: simulation.pump_off,
    log,
  });

  const client = mqtt.connect(config.MQTT_BROKER_URL, {
    clientId: config.SIMULATOR_CLIENT_ID,
  });
  let loop: NodeJS.Timeout | undefined;

  client.on("connect", () => {
    log.info(`✅ Connected to ${config.MQTT_BROKER_URL}`);

    // ACTUATOR touchpoint
    client.subscribe([...CONTROL_TOPICS], (err) => {
      if (err) {
        log.error(`❌ Subscribe to control topics failed: ${err.message}`);
      } else {
        log.info(`👂 Listening for commands on ${CONTROL_TOPICS.join(", ")}`);
      }
    });

    // Reconnects re-fire "connect"; the loop only starts once
    if (!loop) {
      loop = setInterval(() => {
        const reading = model.generateReading(new Date());
        publishReading(client, reading);
        log.info(`📡 ${summarize(reading)}`);
      }, simulation.publish_interval_ms);
    }
  });

  client.on("error", (err) => log.error(`❌ MQTT error: ${err.message}`));

  client.on("message", (topic, message) => {
    handleControlMessage(model, topic, message, log);
  });

  const shutdown = () => {
    log.info("🛑 Stopping sensor simulation...");
    if (loop) clearInterval(loop);
    client.end(false, {}, () => {
      log.info("👋 Disconnected from broker.");
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

startSimulator().catch((err: unknown) => {
  log.error(`❌ Simulator failed to start: ${describeError(err)}`);
  process.exitCode = 1;
});
