import "dotenv/config";

import pino, { type Logger, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";

export type RunLogger = Logger;

// Every line carries an ISO-8601 time and the level label
export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
};

// Process-wide logger for messages emitted before a run log is open
export const logger = pino(loggerOptions);

export interface RunLoggerOptions {
  logFile: string;
  level: string;
  dataset: string;
  // Mirror run log lines to stdout (disabled in tests)
  stdout?: boolean;
}

/**
 * Create the append-only logger for one run.
 *
 * The file destination is synchronous so a line is on disk when the call
 * returns; a killed run keeps everything it logged.
 */
export function createRunLogger(options: RunLoggerOptions): RunLogger {
  const fileStream = pino.destination({
    dest: options.logFile,
    append: true,
    sync: true,
    mkdir: true,
  });

  const streams: pino.StreamEntry[] = [{ level: "trace", stream: fileStream }];
  if (options.stdout !== false) {
    streams.push({ level: "trace", stream: process.stdout });
  }

  return pino(
    {
      ...loggerOptions,
      level: options.level,
      base: { dataset: options.dataset },
    },
    pino.multistream(streams)
  );
}
