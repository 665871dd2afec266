export * from "./failure.js";
export * from "./runFuzz.js";
export * from "./sequence.js";
export * from "./sink.js";
export * from "./stats.js";
export * from "./trace.js";
