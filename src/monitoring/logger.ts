/**
 * Structured Logger (Pino)
 *
 * All modules import { logger } from this file instead of using console.log.
 * Produces JSON logs in production and pretty-printed logs in development.
 * Logs go to stderr: stdout belongs to the CLI's extraction output.
 *
 * Every log entry includes:
 * - service: "viking-link-extractor" (for log aggregation)
 * - pid: process ID
 * - Contextual fields passed as the first argument object
 */
import pino from "pino";
import config from "../config";

const options: pino.LoggerOptions = {
  level: config.logLevel,
  base: {
    service: "viking-link-extractor",
    pid: process.pid,
  },
};

export const logger =
  config.env === "development"
    ? pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, destination: 2 },
        },
      })
    : pino(options, pino.destination(2));
