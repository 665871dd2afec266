import type {Amount, SlashIndex, Timestamp} from "@slashwatch/types";

export type SlashRequest = {
  captureTime: Timestamp;
  requestTime: Timestamp;
  amount: Amount;
  executed: boolean;
};

export type SlashExecution = {
  slashIndex: SlashIndex;
  captureTime: Timestamp;
  requestTime: Timestamp;
  execTime: Timestamp;
  /** Sum of `amount` of this execution and every previous one */
  cumulativeSlash: Amount;
  amount: Amount;
};

/**
 * Timestamp of an execution a lookup or a window is keyed by
 */
export enum TimeBasis {
  capture = "capture",
  request = "request",
  execution = "execution",
}

/** Bases executions are sorted by, the only ones `cumulativeSlashAt` can search */
export type LookupBasis = TimeBasis.capture | TimeBasis.execution;

export function executionTime(execution: SlashExecution, basis: TimeBasis): Timestamp {
  switch (basis) {
    case TimeBasis.capture:
      return execution.captureTime;
    case TimeBasis.request:
      return execution.requestTime;
    case TimeBasis.execution:
      return execution.execTime;
  }
}
