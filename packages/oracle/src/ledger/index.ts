export * from "./interface.js";
export * from "./shadowLedger.js";
