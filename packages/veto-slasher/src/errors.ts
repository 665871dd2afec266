import {SlashwatchError} from "@slashwatch/utils";

/**
 * Reasons a command is rejected with, carried by the `Err` the slasher returns
 */
export enum RejectionReason {
  UNKNOWN_SUBJECT = "UNKNOWN_SUBJECT",
  INVALID_CAPTURE_TIMESTAMP = "INVALID_CAPTURE_TIMESTAMP",
  INSUFFICIENT_SLASH = "INSUFFICIENT_SLASH",
  SLASH_REQUEST_NOT_EXIST = "SLASH_REQUEST_NOT_EXIST",
  VETO_PERIOD_NOT_ENDED = "VETO_PERIOD_NOT_ENDED",
  SLASH_PERIOD_ENDED = "SLASH_PERIOD_ENDED",
  SLASH_REQUEST_COMPLETED = "SLASH_REQUEST_COMPLETED",
  OUTDATED_CAPTURE_TIMESTAMP = "OUTDATED_CAPTURE_TIMESTAMP",
}

export enum VetoSlasherErrorCode {
  INVALID_TIME_ADVANCE = "VETO_SLASHER_ERROR_INVALID_TIME_ADVANCE",
  UNORDERED_CHECKPOINT = "VETO_SLASHER_ERROR_UNORDERED_CHECKPOINT",
  INVALID_OPTIONS = "VETO_SLASHER_ERROR_INVALID_OPTIONS",
}

export type VetoSlasherErrorType =
  | {code: VetoSlasherErrorCode.INVALID_TIME_ADVANCE; by: number}
  | {code: VetoSlasherErrorCode.UNORDERED_CHECKPOINT; key: number; lastKey: number}
  | {code: VetoSlasherErrorCode.INVALID_OPTIONS; reason: string};

export class VetoSlasherError extends SlashwatchError<VetoSlasherErrorType> {}
