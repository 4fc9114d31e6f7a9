import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
  service?: string;
  destination?: pino.DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = process.env.LOG_LEVEL ?? "info", service = "tickbench", destination } = options;
  const config: pino.LoggerOptions = {
    level,
    base: { service },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  return destination ? pino(config, destination) : pino(config);
}
