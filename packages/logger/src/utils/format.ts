import winston from "winston";
import {SlashwatchError, isEmptyObject, logCtxToJson, logCtxToString, LogData} from "@slashwatch/utils";
import {LoggerOptions, TimestampFormatCode} from "../interface.js";

type Format = ReturnType<typeof winston.format.combine>;

// npm levels ship with colors, trace is ours
winston.addColors({trace: "magenta"});

type WinstonInfoArg = {
  level: string;
  message: string;
  module?: string;
  timestamp?: string;
  context?: LogData;
  error?: Error;
};

export function getFormat(opts: LoggerOptions): Format {
  switch (opts.format) {
    case "json":
      return jsonLogFormat(opts);
    case "human":
    default:
      return humanReadableLogFormat(opts);
  }
}

function isTimestampHidden(opts: LoggerOptions): boolean {
  return opts.timestampFormat?.format === TimestampFormatCode.Hidden;
}

function humanReadableLogFormat(opts: LoggerOptions): Format {
  return winston.format.combine(
    ...(isTimestampHidden(opts) ? [] : [winston.format.timestamp({format: "MMM-DD HH:mm:ss.SSS"})]),
    winston.format.colorize(),
    winston.format.printf((info) => humanReadableTemplateFn(info as WinstonInfoArg))
  );
}

function jsonLogFormat(opts: LoggerOptions): Format {
  return winston.format.combine(
    ...(isTimestampHidden(opts) ? [] : [winston.format.timestamp()]),
    winston.format((info) => {
      info.context = logCtxToJson(info.context);
      info.error = logCtxToJson(info.error);
      return info;
    })(),
    winston.format.json()
  );
}

/**
 * Winston template function print a human readable string given a log object
 */
function humanReadableTemplateFn(info: WinstonInfoArg): string {
  const paddingBetweenInfo = 30;

  const infoString = info.module || "";
  const infoPad = paddingBetweenInfo - infoString.length;

  let str = "";

  if (info.timestamp) str += info.timestamp;

  str += `[${infoString}] ${info.level.padStart(infoPad)}: ${info.message}`;

  if (info.context !== undefined && !isEmptyObject(info.context)) str += " " + logCtxToString(info.context);
  if (info.error !== undefined) {
    str +=
      // SlashwatchError is formatted in the same way as context, it is either appended to
      // the log message (" ") or extends existing context properties (", "). For any other
      // error, the message is printed out and clearly separated from the log message (" - ").
      (info.error instanceof SlashwatchError ? (isEmptyObject(info.context) ? " " : ", ") : " - ") +
      logCtxToString(info.error);
  }

  return str;
}
