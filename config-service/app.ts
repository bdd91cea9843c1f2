import express, { Express, Request, Response } from "express";
import cors from "cors";
import { AppConfig } from "../config";
import { SimulationConfig, ThresholdConfig } from "../types";

export interface RemoteConfig {
  settings: {
    system_name: string;
  };
  // KNOWLEDGE shared by the manager (alerts) and the simulator (penalties)
  thresholds: ThresholdConfig;
  simulation: SimulationConfig;
}

export function buildRemoteConfig(config: AppConfig): RemoteConfig {
  return {
    settings: {
      system_name: "Aquaponics IoT - Telemetry & Control",
    },
    thresholds: config.THRESHOLDS,
    simulation: config.SIMULATION,
  };
}

export function createConfigApp(config: AppConfig): Express {
  const app = express();
  const configuration = buildRemoteConfig(config);

  app.use(cors());

  app.get("/config", (req: Request, res: Response) => {
    res.json(configuration);
  });

  return app;
}
