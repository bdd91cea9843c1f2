import request from "supertest";
import { loadConfig } from "../../config";
import { buildRemoteConfig, createConfigApp } from "../../config-service/app";
import { parseRemoteConfig } from "../../config-service/client";

describe("Config service", () => {
  const config = loadConfig({ THRESHOLD_TEMP_HIGH: "27", PUMP_OFF_DO_PENALTY: "1.5" });

  test("GET /config should serve the shared knowledge", async () => {
    const res = await request(createConfigApp(config)).get("/config").expect(200);

    expect(res.body).toEqual(buildRemoteConfig(config));
    expect(res.body.thresholds.temp_high).toBe(27);
    expect(res.body.simulation.pump_off).toEqual({ waterLevel: 5, dissolvedOxygen: 1.5 });
  });

  test("the served body should pass client validation", async () => {
    const res = await request(createConfigApp(config)).get("/config").expect(200);
    expect(parseRemoteConfig(res.body)).toEqual(buildRemoteConfig(config));
  });
});
