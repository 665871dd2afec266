import {SECONDS_PER_DAY, WEI_PER_TOKEN} from "../constants.js";
import {SlashingParams} from "../interface.js";

export const mainnetPreset: SlashingParams = {
  // 100_000 tokens
  NETWORK_CAPACITY: BigInt(100_000) * WEI_PER_TOKEN,
  VETO_DURATION: 3 * SECONDS_PER_DAY,
  EPOCH_DURATION: 14 * SECONDS_PER_DAY,
  // EPOCH_DURATION - VETO_DURATION, the whole capture window is after genesis from the first flow
  WARM_UP_DURATION: 11 * SECONDS_PER_DAY,

  CAPTURE_EDGE_BIAS: 0.05,
  AMOUNT_EDGE_BIAS: 0.15,
};
