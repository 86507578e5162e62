import path from "node:path";
import pino from "pino";

import type { LogLevel } from "./config.js";

export interface LoggerOptions {
  level: LogLevel;
  /** Directory for the per-run log file; omitted means console only */
  dir?: string;
  /** Defaults to the current time */
  startedAt?: Date;
}

/**
 * `workflow_YYYYMMDD_HHMMSS.log`, stamped in local time.
 */
export function runLogFileName(startedAt: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const date = `${startedAt.getFullYear()}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}`;
  const time = `${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`;
  return `workflow_${date}_${time}.log`;
}

/**
 * Creates the pino logger for a run: pretty output on stdout and, when a
 * directory is given, a JSON trail in `<dir>/workflow_<timestamp>.log`.
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  if (options.level === "silent") {
    return pino({ level: "silent" });
  }

  const targets: pino.TransportTargetOptions[] = [
    {
      target: "pino-pretty",
      level: options.level,
      options: { destination: 1, translateTime: "SYS:yyyy-mm-dd HH:MM:ss", ignore: "pid,hostname" },
    },
  ];

  if (options.dir) {
    targets.push({
      target: "pino/file",
      level: options.level,
      options: {
        destination: path.join(options.dir, runLogFileName(options.startedAt ?? new Date())),
        mkdir: true,
      },
    });
  }

  return pino({ level: options.level, timestamp: pino.stdTimeFunctions.isoTime }, pino.transport({ targets }));
}
