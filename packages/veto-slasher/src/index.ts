export {Checkpoints} from "./checkpoints.js";
export {ManualClock} from "./clock.js";
export * from "./errors.js";
export {VetoSlasher, createVetoSlasher, type VetoSlasherOpts} from "./vetoSlasher.js";
