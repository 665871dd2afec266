export type SlashingParams = {
  /** Stake the network allows to be slashed, also the activated stake of the slashed operator */
  NETWORK_CAPACITY: bigint;
  /** Seconds a request must wait before it can be executed */
  VETO_DURATION: number;
  /** Seconds a capture timestamp stays slashable */
  EPOCH_DURATION: number;
  /** Seconds the clock is advanced at sequence start, before the first action */
  WARM_UP_DURATION: number;
  /** Probability of sampling an edge of the admissible capture window */
  CAPTURE_EDGE_BIAS: number;
  /** Probability of sampling an edge of the admissible amount range */
  AMOUNT_EDGE_BIAS: number;
};

export type SlashingParamKey = keyof SlashingParams;

export const slashingParamTypes: {[K in SlashingParamKey]: SlashingParams[K] extends bigint ? "bigint" : "number"} = {
  NETWORK_CAPACITY: "bigint",
  VETO_DURATION: "number",
  EPOCH_DURATION: "number",
  WARM_UP_DURATION: "number",
  CAPTURE_EDGE_BIAS: "number",
  AMOUNT_EDGE_BIAS: "number",
};
