import type {Result} from "@slashwatch/utils";
import type {Amount, Duration, SlashIndex, Timestamp} from "./primitive.js";

/**
 * Pair every query and command of the slasher is scoped to
 */
export type SlashSubject = {
  subnetwork: string;
  operator: string;
};

export type RequestReceipt = {
  slashIndex: SlashIndex;
  /** Time the request was included at */
  timestamp: Timestamp;
};

export type ExecutionReceipt = {
  slashedAmount: Amount;
  /** Time the execution was included at */
  timestamp: Timestamp;
};

/** A command the system under test declined */
export type Rejection = {
  reason: string;
};

/**
 * Capabilities the oracle needs from a slashing system under test. Commands return an `Err` when
 * the system rejects them, any thrown error is a harness failure.
 */
export interface SlashingSystem {
  currentTime(): Promise<Timestamp>;
  /** Move the clock forward, `by` must not be negative */
  advanceTime(by: Duration): Promise<void>;

  /** Total amount slashed so far */
  queryCumulativeSlash(subject: SlashSubject): Promise<Amount>;
  /** Total amount slashed by executions included at or before `time` */
  queryCumulativeSlashAt(subject: SlashSubject, time: Timestamp): Promise<Amount>;
  /** Stake backing `subject` at `time` */
  queryStakeAt(subject: SlashSubject, time: Timestamp): Promise<Amount>;
  /** Stake that a request captured at `captureTime` could still slash now */
  querySlashable(subject: SlashSubject, captureTime: Timestamp): Promise<Amount>;

  submitRequest(
    subject: SlashSubject,
    amount: Amount,
    captureTime: Timestamp
  ): Promise<Result<RequestReceipt, Rejection>>;
  submitExecution(subject: SlashSubject, slashIndex: SlashIndex): Promise<Result<ExecutionReceipt, Rejection>>;
}
