import pino from "pino";
import type { Logger } from "pino";
import type { LogLevel } from "../config/index.js";

export type { Logger } from "pino";

/**
 * Structured logger on stderr; stdout carries command output only.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({ name: "relay", level }, pino.destination(2));
}
