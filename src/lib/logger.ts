/**
 * Winston logging
 * Everything goes to stderr: with the stdio transport, stdout carries JSON-RPC.
 */

import winston from "winston";
import { getConfig } from "./config.ts";

const STDERR_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ""} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  }),
);

export const logger = winston.createLogger({
  level: getConfig().logLevel,
  format: consoleFormat,
  silent: process.env.NODE_ENV === "test",
  transports: [new winston.transports.Console({ stderrLevels: STDERR_LEVELS })],
});

/** Logger tagged with a component name */
export function createServiceLogger(service: string): winston.Logger {
  return logger.child({ service });
}
