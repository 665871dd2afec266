import {SlashwatchError} from "@slashwatch/utils";

export enum OracleErrorCode {
  /** System accepted a command expected to be rejected, or the reverse */
  OUTCOME_MISMATCH = "ORACLE_ERROR_OUTCOME_MISMATCH",
  /** Executed amount differs from the expected one */
  AMOUNT_MISMATCH = "ORACLE_ERROR_AMOUNT_MISMATCH",
  SLASH_INDEX_MISMATCH = "ORACLE_ERROR_SLASH_INDEX_MISMATCH",
  /** A query of the system disagrees with the shadow ledger */
  QUERY_MISMATCH = "ORACLE_ERROR_QUERY_MISMATCH",
  WINDOW_CAPACITY_EXCEEDED = "ORACLE_ERROR_WINDOW_CAPACITY_EXCEEDED",
  LOOKUP_BRACKET_VIOLATION = "ORACLE_ERROR_LOOKUP_BRACKET_VIOLATION",
  EXECUTION_ORDER_VIOLATION = "ORACLE_ERROR_EXECUTION_ORDER_VIOLATION",
  REQUEST_ALREADY_EXECUTED = "ORACLE_ERROR_REQUEST_ALREADY_EXECUTED",
  UNKNOWN_REQUEST = "ORACLE_ERROR_UNKNOWN_REQUEST",
  INVALID_OPTIONS = "ORACLE_ERROR_INVALID_OPTIONS",
}

export type OracleErrorType =
  | {code: OracleErrorCode.OUTCOME_MISMATCH; action: string; expected: string; actual: string; reason: string | null}
  | {code: OracleErrorCode.AMOUNT_MISMATCH; slashIndex: number; expected: string; actual: string}
  | {code: OracleErrorCode.SLASH_INDEX_MISMATCH; expected: number; actual: number}
  | {code: OracleErrorCode.QUERY_MISMATCH; query: string; time: number | null; expected: string; actual: string}
  | {
      code: OracleErrorCode.WINDOW_CAPACITY_EXCEEDED;
      basis: string;
      windowStart: number;
      windowEnd: number;
      total: string;
      capacity: string;
    }
  | {code: OracleErrorCode.LOOKUP_BRACKET_VIOLATION; time: number; index: number; basis: string}
  | {code: OracleErrorCode.EXECUTION_ORDER_VIOLATION; basis: string; time: number; lastTime: number}
  | {code: OracleErrorCode.REQUEST_ALREADY_EXECUTED; slashIndex: number}
  | {code: OracleErrorCode.UNKNOWN_REQUEST; slashIndex: number}
  | {code: OracleErrorCode.INVALID_OPTIONS; reason: string};

/**
 * Correctness violation: the system under test or the shadow ledger broke an expectation. Always fatal.
 */
export class OracleError extends SlashwatchError<OracleErrorType> {}
