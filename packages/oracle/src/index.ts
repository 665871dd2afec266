export * from "./actions/index.js";
export * from "./capacity.js";
export * from "./driver/index.js";
export * from "./errors.js";
export * from "./invariants/index.js";
export * from "./ledger/index.js";
