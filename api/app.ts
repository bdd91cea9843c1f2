import express, { Express, Request, Response } from "express";
import cors from "cors";
import * as fs from "node:fs";
import * as path from "node:path";
import { DEFAULT_HISTORY_LIMIT } from "../constants";
import { AquaponicsContext } from "../context";
import { ParseError } from "../errors";
import { lightCommand, pumpCommand } from "../protocol";
import { ControlCommand } from "../types";
import { errorHandler } from "./error-handler";

export interface ApiOptions {
  csvFile?: string;
}

function queryString(req: Request, name: string, fallback: string): string {
  const value = req.query[name];
  if (value === undefined || value === "") return fallback;
  if (typeof value !== "string") throw new ParseError(`${name} must be a single value`);
  return value;
}

function parseLimit(raw: string): number {
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ParseError("limit must be a non-negative integer");
  }
  return limit;
}

function parseEnable(raw: string): boolean {
  switch (raw.toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      throw new ParseError("enable must be true or false");
  }
}

function controlMessage(command: ControlCommand): string {
  switch (command.action) {
    case "pump":
      return `Pump command sent: ${command.state}`;
    case "light":
      return `Light command sent: ${command.state}`;
    case "simulate_failure":
      return `Pump failure simulation ${command.enable ? "enabled" : "disabled"}`;
  }
}

/** HTTP surface over the manager context. */
export function createApiApp(ctx: AquaponicsContext, options: ApiOptions = {}): Express {
  const app = express();

  app.use(cors());

  app.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Welcome to Aquaponics IoT API",
      endpoints: {
        "/latest": "Get latest sensor reading",
        "/data": "Get historical readings",
        "/status": "System status",
        "/alerts": "Current alerts",
        "/download-csv": "Download all recorded data as CSV",
      },
    });
  });

  app.get("/latest", (req: Request, res: Response) => {
    const latest = ctx.latest();
    if (!latest) {
      res.json({ message: "No data yet. Is the simulator publishing?" });
      return;
    }
    res.json(latest);
  });

  app.get("/data", (req: Request, res: Response) => {
    const limit = parseLimit(queryString(req, "limit", String(DEFAULT_HISTORY_LIMIT)));
    const readings = ctx.history(limit);
    res.json({ count: readings.length, readings });
  });

  app.get("/status", (req: Request, res: Response) => {
    res.json(ctx.status());
  });

  app.get("/alerts", (req: Request, res: Response) => {
    const report = ctx.alerts();
    if (!report) {
      res.json({ alerts: [], message: "No data available" });
      return;
    }
    res.json({
      alerts: report.alerts,
      alert_count: report.alerts.length,
      diagnosis: report.diagnosis,
    });
  });

  const sendControl = (res: Response, command: ControlCommand) => {
    if (ctx.sendControl(command)) {
      res.json({ success: true, message: controlMessage(command) });
    } else {
      res.status(503).json({ success: false, message: "MQTT not connected" });
    }
  };

  app.post("/control/pump", (req: Request, res: Response) => {
    sendControl(res, pumpCommand(queryString(req, "state", "toggle")));
  });

  app.post("/control/light", (req: Request, res: Response) => {
    sendControl(res, lightCommand(queryString(req, "state", "toggle")));
  });

  app.post("/control/simulate-failure", (req: Request, res: Response) => {
    const enable = parseEnable(queryString(req, "enable", "true"));
    sendControl(res, { action: "simulate_failure", enable });
  });

  app.get("/download-csv", (req: Request, res: Response) => {
    const csvFile = options.csvFile;
    if (!csvFile || !fs.existsSync(csvFile)) {
      res.json({ message: "No CSV file yet. Wait for some sensor readings." });
      return;
    }
    res.download(path.resolve(csvFile), "aquaponics_sensor_data.csv");
  });

  app.use(errorHandler);

  return app;
}
