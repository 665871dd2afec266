import {SECONDS_PER_MINUTE} from "../constants.js";
import {SlashingParams} from "../interface.js";

/**
 * Small amounts and short durations, windows are crossed within few flows
 */
export const minimalPreset: SlashingParams = {
  NETWORK_CAPACITY: BigInt(100_000),
  // [customized] minutes instead of days
  VETO_DURATION: 3 * SECONDS_PER_MINUTE,
  EPOCH_DURATION: 14 * SECONDS_PER_MINUTE,
  WARM_UP_DURATION: 11 * SECONDS_PER_MINUTE,

  CAPTURE_EDGE_BIAS: 0.05,
  AMOUNT_EDGE_BIAS: 0.15,
};
