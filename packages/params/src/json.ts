import {ParamsError, ParamsErrorCode} from "./errors.js";
import {SlashingParamKey, SlashingParams, slashingParamTypes} from "./interface.js";

function isParamKey(key: string): key is SlashingParamKey {
  return Object.prototype.hasOwnProperty.call(slashingParamTypes, key);
}

/**
 * Render SlashingParams to JSON strings
 * - bigint and numbers: decimal string
 */
export function paramsToJson(params: SlashingParams): Record<SlashingParamKey, string> {
  return {
    NETWORK_CAPACITY: params.NETWORK_CAPACITY.toString(10),
    VETO_DURATION: String(params.VETO_DURATION),
    EPOCH_DURATION: String(params.EPOCH_DURATION),
    WARM_UP_DURATION: String(params.WARM_UP_DURATION),
    CAPTURE_EDGE_BIAS: String(params.CAPTURE_EDGE_BIAS),
    AMOUNT_EDGE_BIAS: String(params.AMOUNT_EDGE_BIAS),
  };
}

/**
 * Parse param overrides from a JSON or YAML document. Values may be numbers or decimal strings,
 * amounts above `Number.MAX_SAFE_INTEGER` must be strings.
 */
export function paramsFromJson(json: Record<string, unknown>): Partial<SlashingParams> {
  const params: Partial<SlashingParams> = {};

  for (const [key, value] of Object.entries(json)) {
    if (!isParamKey(key)) {
      throw new ParamsError({code: ParamsErrorCode.UNKNOWN_PARAM, param: key});
    }
    if (value === undefined || value === null) {
      continue;
    }

    if (key === "NETWORK_CAPACITY") {
      params[key] = deserializeBigInt(key, value);
    } else {
      params[key] = deserializeNumber(key, value);
    }
  }

  return params;
}

function deserializeBigInt(key: SlashingParamKey, value: unknown): bigint {
  if (typeof value === "bigint") {
    return value;
  }
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  throw new ParamsError({code: ParamsErrorCode.INVALID_VALUE, param: key, value: String(value)});
}

function deserializeNumber(key: SlashingParamKey, value: unknown): number {
  const num = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isFinite(num)) {
    throw new ParamsError({code: ParamsErrorCode.INVALID_VALUE, param: key, value: String(value)});
  }
  return num;
}
