import { mkdirSync, readdirSync, unlinkSync } from "fs";
import { join } from "path";
import pino from "pino";
import { createLogger, type Logger } from "@tickbench/core";
import { getLogsDir } from "./paths.js";

const DAILY_LOG = /^tickbench-\d{4}-\d{2}-\d{2}\.log$/;

export const MAX_LOG_FILES = 10;

export function dailyLogName(day: Date): string {
  return `tickbench-${day.toISOString().slice(0, 10)}.log`;
}

/**
 * Logger appending to one file per UTC day under ~/.tickbench/logs. Older
 * daily files beyond MAX_LOG_FILES, today's included, are deleted.
 */
export function createFileLogger(level: string = "info", now: Date = new Date()): Logger {
  const logsDir = getLogsDir();
  mkdirSync(logsDir, { recursive: true, mode: 0o700 });

  const current = dailyLogName(now);
  // ISO dates sort chronologically as plain strings.
  const older = readdirSync(logsDir)
    .filter((name) => DAILY_LOG.test(name) && name !== current)
    .sort();
  for (const name of older.slice(0, Math.max(older.length - (MAX_LOG_FILES - 1), 0))) {
    unlinkSync(join(logsDir, name));
  }

  return createLogger({
    level,
    service: "tickbench-cli",
    destination: pino.destination({ dest: join(logsDir, current), sync: true })
  });
}
