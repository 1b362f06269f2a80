/**
 * Structured Logger
 *
 * One JSON object per line, prefixed with a context identifier.
 * Warnings and errors are also forwarded to the error reporter.
 */

import type { Logger } from "@tierline/contracts";
import { captureMessage } from "./index.js";

export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      console.log(
        JSON.stringify({ level: "info", context, message, ...data })
      );
    },
    warn(message, data) {
      console.warn(
        JSON.stringify({ level: "warn", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      console.error(
        JSON.stringify({ level: "error", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (process.env.NODE_ENV !== "production") {
        console.debug(
          JSON.stringify({ level: "debug", context, message, ...data })
        );
      }
    },
  };
}

/** Discards everything. For tests and scripts that print their own output. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
};
