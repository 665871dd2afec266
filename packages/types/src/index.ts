export * from "./primitive.js";
export * from "./slashing.js";
