import winston from "winston";
import {Logger, LogLevel} from "@slashwatch/utils";
import {getEmptyLogger} from "./empty.js";
import {LogFormat, TimestampFormatCode, logFormats} from "./interface.js";
import {createWinstonLogger} from "./winston.js";

export function getEnvLogLevel(): LogLevel | null {
  const level = process.env.LOG_LEVEL;
  if (level) {
    const logLevel = Object.values(LogLevel).find((item) => item === level);
    if (logLevel === undefined) {
      throw Error(`Unknown LOG_LEVEL '${level}'`);
    }
    return logLevel;
  }
  if (process.env.DEBUG) return LogLevel.debug;
  if (process.env.VERBOSE) return LogLevel.verbose;
  return null;
}

/**
 * Console logger configured from `LOG_LEVEL`, `DEBUG`, `VERBOSE` and `LOG_FORMAT`,
 * or a logger that discards everything when none is set. Meant for tests and scripts.
 */
export function getEnvLogger(opts?: {module?: string}): Logger {
  const level = getEnvLogLevel();
  if (level == null) {
    return getEmptyLogger();
  }

  const envFormat = process.env.LOG_FORMAT;
  const format = logFormats.find((f): f is LogFormat => f === envFormat);

  return createWinstonLogger(
    {
      level,
      module: opts?.module,
      format,
      timestampFormat: {format: TimestampFormatCode.Hidden},
    },
    [new winston.transports.Console({debugStdout: true})]
  );
}
