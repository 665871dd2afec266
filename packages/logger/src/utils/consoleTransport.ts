import winston from "winston";
import {LEVEL, LogLevel, WinstonLogInfo, logLevelNum} from "../interface.js";

/**
 * Console transport whose level is resolved per log entry from its `module`, so child loggers
 * sharing the transport can log at different levels.
 */
export class ConsoleDynamicLevel extends winston.transports.Console {
  private readonly levelByModule = new Map<string, LogLevel>();
  private readonly defaultLevel: LogLevel;

  constructor(opts: {defaultLevel: LogLevel} & winston.transports.ConsoleTransportOptions) {
    super(opts);

    this.defaultLevel = opts.defaultLevel;

    // Set level to undefined so that underlying transport logs everything
    this.level = undefined;
  }

  setModuleLevel(module: string, level: LogLevel): void {
    this.levelByModule.set(module, level);
  }

  deleteModuleLevel(module: string): boolean {
    return this.levelByModule.delete(module);
  }

  /**
   * Most specific level configured for `module`: `a/b/c` falls back to `a/b`, then `a`, then the default
   */
  getModuleLevel(module: string): LogLevel {
    let current = module;
    for (;;) {
      const level = this.levelByModule.get(current);
      if (level !== undefined) return level;
      const slash = current.lastIndexOf("/");
      if (slash < 0) return this.defaultLevel;
      current = current.slice(0, slash);
    }
  }

  _write(info: WinstonLogInfo, enc: BufferEncoding, callback: (error?: Error | null) => void): void {
    // Min number is highest prio log level
    // levels = {error: 0, warn: 1, info: 2, ...}
    if (logLevelNum[this.getModuleLevel(info.module)] >= logLevelNum[info[LEVEL]]) {
      super._write(info, enc, callback);
    } else {
      callback(null);
    }
  }
}
