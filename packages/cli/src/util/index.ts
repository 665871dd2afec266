export * from "./csvEventSink.js";
export * from "./errors.js";
export * from "./file.js";
export * from "./logger.js";
