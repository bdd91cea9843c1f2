import * as mqtt from "mqtt";
import { createApiApp } from "./api/app";
import { loadConfig } from "./config";
import { resolveRuntimeSettings } from "./config-service/client";
import { AquaponicsContext } from "./context";
import { describeError } from "./errors";
import { Dispatcher } from "./executor";
import { createServiceLogger } from "./logger";
import { startMonitor } from "./monitor";
import { TelemetryStore } from "./monitor/telemetry-store";
import { CsvRecorder } from "./recorder/csv-recorder";

const log = createServiceLogger("manager");

async function startManager(): Promise<void> {
  log.info("🧠 Starting Manager (telemetry store, alerts, control)...");

  const config = loadConfig();
  const { thresholds } = await resolveRuntimeSettings(config, { log });

  const recorder = new CsvRecorder(config.CSV_FILE);
  recorder.init();

  const client = mqtt.connect(config.MQTT_BROKER_URL, {
    clientId: config.MANAGER_CLIENT_ID,
  });

  const ctx = new AquaponicsContext({
    brokerUrl: config.MQTT_BROKER_URL,
    thresholds,
    store: new TelemetryStore(thresholds, config.MAX_READINGS),
    dispatcher: new Dispatcher(client),
    recorder,
  });

  startMonitor(client, ctx);

  const server = createApiApp(ctx, { csvFile: config.CSV_FILE }).listen(config.API_PORT, () => {
    log.info(`✅ API listening on http://localhost:${config.API_PORT}`);
  });

  const shutdown = () => {
    log.info("🛑 Shutting down...");
    server.close();
    client.end(false, {}, () => {
      log.info("🔌 MQTT client stopped");
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

startManager().catch((err: unknown) => {
  log.error(`❌ Manager failed to start: ${describeError(err)}`);
  process.exitCode = 1;
});
