import winston from "winston";
import type {Logger as Winston} from "winston";
import {LogData} from "@slashwatch/utils";
import {Logger, LoggerOptions, LoggerChildOpts, LogLevel, logLevelNum} from "./interface.js";
import {getFormat} from "./utils/format.js";

// Log level is configured by transport only. Transports are shared between child loggers, so
// per-module levels are resolved by the custom console transport, see `ConsoleDynamicLevel`.

interface DefaultMeta {
  module: string;
}

export function createWinstonLogger(options: Partial<LoggerOptions> = {}, transports?: winston.transport[]): Logger {
  return WinstonLogger.fromOpts(options, transports);
}

export class WinstonLogger implements Logger {
  constructor(protected readonly winston: Winston) {}

  static fromOpts(options: Partial<LoggerOptions> = {}, transports?: winston.transport[]): WinstonLogger {
    return new WinstonLogger(WinstonLogger.createWinstonInstance(options, transports));
  }

  static createWinstonInstance(options: Partial<LoggerOptions>, transports?: winston.transport[]): Winston {
    const defaultMeta: DefaultMeta = {module: options.module || ""};

    return winston.createLogger({
      // Do not set level at the logger level, unless explicitly requested. Always control by Transport
      level: options.level,
      defaultMeta,
      format: getFormat(options),
      transports,
      exitOnError: false,
      levels: logLevelNum,
    });
  }

  error(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.info, message, context, error);
  }

  verbose(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.verbose, message, context, error);
  }

  debug(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.debug, message, context, error);
  }

  trace(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.trace, message, context, error);
  }

  child(options: LoggerChildOpts): WinstonLogger {
    return new WinstonLogger(this.createChildWinston(options));
  }

  protected createChildWinston(options: LoggerChildOpts): Winston {
    const parentMeta = this.winston.defaultMeta as DefaultMeta | undefined;
    const childModule = [parentMeta?.module, options.module].filter(Boolean).join("/");
    const defaultMeta: DefaultMeta = {module: childModule};

    // Winston's own .child merges info objects with the parent taking precedence, so a child could
    // never overwrite 'module'. Clone the instance and replace defaultMeta instead.
    const childWinston = Object.create(this.winston) as Winston;
    childWinston.defaultMeta = defaultMeta;
    return childWinston;
  }

  private createLogEntry(level: LogLevel, message: string, context?: LogData, error?: Error): void {
    // Forward a single object so winston skips its "splat" handling and the custom format gets
    // context and error untouched
    this.winston.log(level, {message, context, error});
  }
}
