import { pino } from "pino";
import type { DestinationStream, Logger, LoggerOptions } from "pino";

export type { Logger } from "pino";

/** Keys that may carry key material or credentials. */
const REDACTION_PATHS = [
  "secretKey",
  "privateKey",
  "*.secretKey",
  "*.privateKey",
  "keypair",
  "*.keypair"
];

/**
 * Structured JSON logger. Level comes from LOG_LEVEL unless the options say
 * otherwise; pass a destination to capture output (tests do).
 */
export function createLogger(
  options: LoggerOptions = {},
  destination?: DestinationStream
): Logger {
  const merged: LoggerOptions = {
    level: process.env.LOG_LEVEL?.trim() || "info",
    redact: { paths: REDACTION_PATHS, censor: "[REDACTED]" },
    // bigint amounts are not JSON-serializable
    formatters: {
      log: (object) => stringifyBigints(object)
    },
    ...options
  };
  return destination ? pino(merged, destination) : pino(merged);
}

export const silentLogger: Logger = pino({ level: "silent" });

function stringifyBigints(object: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(object)) {
    if (typeof value === "bigint") {
      result[key] = value.toString();
    } else if (value && typeof value === "object" && !Array.isArray(value) && !(value instanceof Error)) {
      result[key] = stringifyBigints(Object.fromEntries(Object.entries(value)));
    } else {
      result[key] = value;
    }
  }
  return result;
}
