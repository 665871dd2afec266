import {LogFormat, LogLevel, LogLevels, TimestampFormatCode, logFormats} from "@slashwatch/logger";
import type {LoggerNodeOpts} from "@slashwatch/logger/node";
import {LogArgs} from "../options/logOptions.js";
import {YargsError} from "./errors.js";

/**
 * Setup the CLI logger, console output plus an optional log file
 */
export function parseLoggerArgs(args: LogArgs, opts?: {hideTimestamp?: boolean}): LoggerNodeOpts {
  return {
    level: parseLogLevel(args.logLevel),
    file:
      args.logFile === undefined
        ? undefined
        : {
            filepath: args.logFile,
            level: parseLogLevel(args.logFileLevel),
            dailyRotate: args.logFileDailyRotate,
          },
    module: args.logPrefix,
    format: args.logFormat !== undefined ? parseLogFormat(args.logFormat) : undefined,
    levelModule: args.logLevelModule !== undefined ? parseLogLevelModule(args.logLevelModule) : undefined,
    timestampFormat: opts?.hideTimestamp
      ? {format: TimestampFormatCode.Hidden}
      : {format: TimestampFormatCode.DateRegular},
  };
}

function parseLogFormat(format: string): LogFormat {
  const logFormat = logFormats.find((item) => item === format);
  if (logFormat === undefined) {
    throw new YargsError(`Unknown log format '${format}'`);
  }
  return logFormat;
}

function parseLogLevel(level: string): LogLevel {
  const logLevel = LogLevels.find((item) => item === level);
  if (logLevel === undefined) {
    throw new YargsError(`Unknown log level '${level}'`);
  }
  return logLevel;
}

function parseLogLevelModule(logLevelModuleArr: string[]): Record<string, LogLevel> {
  const levelModule: Record<string, LogLevel> = {};
  for (const logLevelModule of logLevelModuleArr) {
    const [module, levelStr] = logLevelModule.split("=");
    if (!module || levelStr === undefined) {
      throw new YargsError(`Invalid module log level '${logLevelModule}', expected 'module=level'`);
    }
    levelModule[module] = parseLogLevel(levelStr);
  }
  return levelModule;
}
