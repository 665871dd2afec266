import {LogLevel, LogLevels, logFormats} from "@slashwatch/logger";
import {CliCommandOptions} from "@slashwatch/utils";

export type LogArgs = {
  logLevel: LogLevel;
  logFile?: string;
  logFileLevel: LogLevel;
  logFileDailyRotate: number;
  logPrefix?: string;
  logFormat?: string;
  logLevelModule?: string[];
};

export const logOptions: CliCommandOptions<LogArgs> = {
  logLevel: {
    choices: LogLevels,
    description: "Logging verbosity level for emitting logs to terminal",
    default: LogLevel.info,
    type: "string",
  },

  logFile: {
    description: "Path to output all logs to a persistent log file",
    type: "string",
  },

  logFileLevel: {
    choices: LogLevels,
    description: "Logging verbosity level for emitting logs to file",
    default: LogLevel.debug,
    type: "string",
  },

  logFileDailyRotate: {
    description:
      "Daily rotate log files, set to an integer to limit the file count, set to 0 (zero) to disable rotation",
    default: 0,
    type: "number",
  },

  logPrefix: {
    hidden: true,
    description: "Logger prefix module field with a string ID",
    type: "string",
  },

  logFormat: {
    description: "Log format used when emitting logs to the terminal and / or file",
    choices: logFormats,
    type: "string",
  },

  logLevelModule: {
    description: "Set log level for a specific module by name: 'fuzz=debug' or 'fuzz=debug,slasher=verbose'",
    type: "array",
    string: true,
    coerce: (args: string[]) => args.flatMap((item) => item.split(",")),
  },
};
