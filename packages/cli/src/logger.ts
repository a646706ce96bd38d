/**
 * Structured logging.
 *
 * One pino logger per run, writing to stderr so stdout carries only
 * the report. Pretty-printed in development.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { EnvConfig } from "./config.js";

export function createLogger(
  config: Pick<EnvConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}
