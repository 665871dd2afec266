import {SlashwatchError} from "@slashwatch/utils";

export enum ParamsErrorCode {
  UNKNOWN_PRESET = "PARAMS_ERROR_UNKNOWN_PRESET",
  UNKNOWN_PARAM = "PARAMS_ERROR_UNKNOWN_PARAM",
  INVALID_VALUE = "PARAMS_ERROR_INVALID_VALUE",
  INCONSISTENT = "PARAMS_ERROR_INCONSISTENT",
}

export type ParamsErrorType =
  | {code: ParamsErrorCode.UNKNOWN_PRESET; preset: string}
  | {code: ParamsErrorCode.UNKNOWN_PARAM; param: string}
  | {code: ParamsErrorCode.INVALID_VALUE; param: string; value: string}
  | {code: ParamsErrorCode.INCONSISTENT; reason: string};

export class ParamsError extends SlashwatchError<ParamsErrorType> {}
