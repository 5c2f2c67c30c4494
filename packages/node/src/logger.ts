/**
 * packages/node/src/logger.ts — winston logger for a full-screen session.
 *
 * stdout belongs to the renderer, so nothing is ever logged there. With a log
 * file configured lines go to that file; otherwise the logger is silent.
 */

import type { SessionLogger } from "@cellterm/core";
import winston from "winston";
import type { EnvConfig } from "./config.js";

const { format } = winston;

const fileFormat = format.combine(
  format.timestamp(),
  format.align(),
  format.printf((info) => `[${String(info["timestamp"])}] ${info.level}: ${String(info.message)}`),
);

export function createLogger(config: EnvConfig): winston.Logger {
  if (config.logFile === undefined) {
    return winston.createLogger({
      level: config.logLevel,
      silent: true,
      transports: [new winston.transports.Console({ silent: true })],
    });
  }

  return winston.createLogger({
    level: config.logLevel,
    format: fileFormat,
    transports: [new winston.transports.File({ filename: config.logFile })],
  });
}

export function toSessionLogger(logger: winston.Logger): SessionLogger {
  return Object.freeze({
    debug: (message: string) => {
      logger.debug(message);
    },
    warn: (message: string) => {
      logger.warn(message);
    },
  });
}

/** Resolves once the transports have been told to finish writing. */
export function closeLogger(logger: winston.Logger): Promise<void> {
  return new Promise((resolve) => {
    logger.once("finish", () => resolve());
    logger.end();
  });
}
