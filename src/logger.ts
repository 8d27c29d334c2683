import * as path from "path";
import pino from "pino";
import type { Logger } from "pino";
import pretty from "pino-pretty";
import type { LogLevel } from "./config";

export const LOGGER_NAME = "extract_data";

export interface LoggerOptions {
  level: LogLevel;
  /** Log file, appended to; its directory is created when missing */
  file: string;
}

const PRETTY_OPTIONS = {
  colorize: false,
  translateTime: "SYS:yyyy-mm-dd HH:MM:ss,l",
  ignore: "pid,hostname",
  sync: true,
};

/**
 * Human-readable log lines to stdout and to the log file:
 * `[timestamp] LEVEL (name): message`
 */
export function createLogger(options: LoggerOptions): Logger {
  const streams = pino.multistream([
    { level: options.level, stream: pretty({ ...PRETTY_OPTIONS, destination: 1 }) },
    {
      level: options.level,
      stream: pretty({
        ...PRETTY_OPTIONS,
        destination: path.resolve(options.file),
        append: true,
        mkdir: true,
      }),
    },
  ]);

  return pino({ name: LOGGER_NAME, level: options.level }, streams);
}
