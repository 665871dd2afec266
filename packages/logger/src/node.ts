import path from "node:path";
import DailyRotateFile from "winston-daily-rotate-file";
import TransportStream from "winston-transport";
import winston from "winston";
import type {Logger as Winston} from "winston";
import {Logger, LoggerChildOpts, LogLevel, TimestampFormat} from "./interface.js";
import {ConsoleDynamicLevel} from "./utils/consoleTransport.js";
import {WinstonLogger} from "./winston.js";

const DATE_PATTERN = "YYYY-MM-DD";

export type LoggerNodeOpts = {
  level: LogLevel;
  /**
   * Enable file output transport if set
   */
  file?: {
    filepath: string;
    /**
     * Log level for file output transport
     */
    level: LogLevel;
    /**
     * Number of daily rotated files to keep, 0 or undefined writes a single file
     */
    dailyRotate?: number;
  };
  /**
   * Module prefix for all logs
   */
  module?: string;
  /**
   * Rendering format for logs, defaults to "human"
   */
  format?: "human" | "json";
  /**
   * Set specific log levels by module
   */
  levelModule?: Record<string, LogLevel>;
  timestampFormat?: TimestampFormat;
};

export type LoggerNode = Logger & {
  toOpts(): LoggerNodeOpts;
  child(opts: LoggerChildOpts): LoggerNode;
};

/**
 * Setup a CLI logger, writes to the console and optionally to a file
 */
export function getNodeLogger(opts: LoggerNodeOpts): LoggerNode {
  return WinstonLoggerNode.fromNewTransports(opts);
}

function getNodeLoggerTransports(opts: LoggerNodeOpts): winston.transport[] {
  const consoleTransport = new ConsoleDynamicLevel({
    // Set defaultLevel, not level for dynamic level setting of ConsoleDynamicLevel
    defaultLevel: opts.level,
    debugStdout: true,
    handleExceptions: true,
  });

  if (opts.levelModule) {
    for (const [module, level] of Object.entries(opts.levelModule)) {
      consoleTransport.setModuleLevel(module, level);
    }
  }

  const transports: TransportStream[] = [consoleTransport];

  if (opts.file) {
    const filename = opts.file.filepath;

    // `--logFileDailyRotate 10` -> keep 10 daily files
    // `--logFileDailyRotate 0` -> disable daily rotate and accumulate in same file
    const enableDailyRotate = opts.file.dailyRotate != null && opts.file.dailyRotate > 0;

    transports.push(
      enableDailyRotate
        ? new DailyRotateFile({
            level: opts.file.level,
            // insert the date pattern in filename before the file extension
            filename: filename.replace(/\.(?=[^.]*$)|$/, "-%DATE%$&"),
            datePattern: DATE_PATTERN,
            handleExceptions: true,
            maxFiles: opts.file.dailyRotate,
            auditFile: path.join(path.dirname(filename), ".log_rotate_audit.json"),
          })
        : new winston.transports.File({
            level: opts.file.level,
            filename: filename,
            handleExceptions: true,
          })
    );
  }

  return transports;
}

export class WinstonLoggerNode extends WinstonLogger implements LoggerNode {
  constructor(
    winston: Winston,
    private readonly opts: LoggerNodeOpts
  ) {
    super(winston);
  }

  static fromNewTransports(opts: LoggerNodeOpts): WinstonLoggerNode {
    const winstonOpts = {
      module: opts.module,
      format: opts.format,
      timestampFormat: opts.timestampFormat,
      // Let every entry reach the transports, each one gates by its own level
      level: LogLevel.trace,
    };
    return new WinstonLoggerNode(WinstonLogger.createWinstonInstance(winstonOpts, getNodeLoggerTransports(opts)), opts);
  }

  child(opts: LoggerChildOpts): WinstonLoggerNode {
    const childWinston = this.createChildWinston(opts);
    const module = [this.opts.module, opts.module].filter(Boolean).join("/");
    return new WinstonLoggerNode(childWinston, {...this.opts, module});
  }

  toOpts(): LoggerNodeOpts {
    return this.opts;
  }
}
