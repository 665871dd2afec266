import {ParamsError, ParamsErrorCode} from "./errors.js";
import {SlashingParams} from "./interface.js";

/**
 * Width of the admissible capture window of a new request: a request captured earlier could not
 * outlive its veto period before the capture expires
 */
export function captureWindow(params: SlashingParams): number {
  return params.EPOCH_DURATION - params.VETO_DURATION;
}

function inconsistent(reason: string): ParamsError {
  return new ParamsError({code: ParamsErrorCode.INCONSISTENT, reason});
}

export function validateSlashingParams(params: SlashingParams): void {
  if (params.NETWORK_CAPACITY <= BigInt(0)) {
    throw inconsistent("NETWORK_CAPACITY must be positive");
  }

  for (const key of ["VETO_DURATION", "EPOCH_DURATION", "WARM_UP_DURATION"] as const) {
    if (!Number.isSafeInteger(params[key]) || params[key] <= 0) {
      throw inconsistent(`${key} must be a positive integer`);
    }
  }

  if (params.VETO_DURATION >= params.EPOCH_DURATION) {
    throw inconsistent("VETO_DURATION must be lower than EPOCH_DURATION");
  }

  // Capture timestamps before the warm-up start have no stake
  if (params.WARM_UP_DURATION < captureWindow(params)) {
    throw inconsistent("WARM_UP_DURATION must cover EPOCH_DURATION - VETO_DURATION");
  }

  for (const key of ["CAPTURE_EDGE_BIAS", "AMOUNT_EDGE_BIAS"] as const) {
    if (!(params[key] >= 0 && params[key] <= 1)) {
      throw inconsistent(`${key} must be within [0, 1]`);
    }
  }
}
