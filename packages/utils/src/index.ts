export * from "./binarySearch.js";
export * from "./command.js";
export * from "./err.js";
export * from "./errors.js";
export * from "./format.js";
export * from "./json.js";
export * from "./logger.js";
export * from "./math.js";
export * from "./objects.js";
export * from "./random.js";
