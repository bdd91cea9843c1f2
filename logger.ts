import * as winston from "winston";
import dotenv from "dotenv";

dotenv.config();

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf((info) => {
    const service = typeof info.service === "string" ? info.service : "APP";
    return `${String(info.timestamp)} [${service}] ${info.level}: ${String(info.message)}`;
  }),
);

const transports: winston.transport[] = [
  new winston.transports.Console({ format: consoleFormat }),
];

if (process.env.LOG_FILE) {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      format: winston.format.json(),
    }),
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.NODE_ENV === "test",
  format: winston.format.timestamp(),
  transports,
});

export type Logger = winston.Logger;

export function createServiceLogger(service: string): Logger {
  return logger.child({ service: service.toUpperCase() });
}
