/**
 * Operation logging.
 *
 * Uses pino for JSON-structured records. Each terminal session gets its
 * own timestamped log file; with file logging off, records go to stderr.
 */

import path from "node:path";
import { destination, pino, stdTimeFunctions } from "pino";
import type { Logger, LoggerOptions } from "pino";
import type { AppConfig } from "./config.js";

export type LoggerConfig = Pick<AppConfig, "LOG_LEVEL" | "LOG_DIR" | "LOG_TO_FILE" | "NODE_ENV">;

export interface SessionLogger {
  readonly logger: Logger;
  /** Path of the session log file, when logging to a file. */
  readonly file: string | undefined;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * "terminal_20260119_093005.log", in local time.
 */
export function logFileName(now: Date): string {
  const date = `${String(now.getFullYear())}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `terminal_${date}_${time}.log`;
}

/**
 * Create the session logger.
 *
 * File records are written synchronously so nothing is lost when the
 * session ends with process exit.
 */
export function createLogger(config: LoggerConfig, now: Date = new Date()): SessionLogger {
  const options: LoggerOptions = {
    level: config.LOG_LEVEL,
    base: { component: "terminal" },
    timestamp: stdTimeFunctions.isoTime,
  };

  if (config.LOG_TO_FILE) {
    const file = path.join(config.LOG_DIR, logFileName(now));
    const sink = destination({ dest: file, mkdir: true, sync: true });
    return { logger: pino(options, sink), file };
  }

  if (config.NODE_ENV === "development") {
    return {
      logger: pino({
        ...options,
        transport: { target: "pino-pretty", options: { destination: 2 } },
      }),
      file: undefined,
    };
  }

  return { logger: pino(options, destination(2)), file: undefined };
}
