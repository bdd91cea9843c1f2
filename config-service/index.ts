import { loadConfig } from "../config";
import { createServiceLogger } from "../logger";
import { createConfigApp } from "./app";

const log = createServiceLogger("config-service");
const config = loadConfig();

log.info(`Starting service on port ${config.CONFIG_SERVICE_PORT}...`);

createConfigApp(config).listen(config.CONFIG_SERVICE_PORT, () => {
  log.info(`✅ Listening on http://localhost:${config.CONFIG_SERVICE_PORT}`);
});
