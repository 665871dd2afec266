import type {Amount, SlashIndex, Timestamp} from "@slashwatch/types";
import {upperBound} from "@slashwatch/utils";
import {OracleError, OracleErrorCode} from "../errors.js";
import {LookupBasis, SlashExecution, SlashRequest, TimeBasis, executionTime} from "./interface.js";

export type PendingRequest = {
  slashIndex: SlashIndex;
  request: Readonly<SlashRequest>;
};

/**
 * Independent record of the slash requests and executions a sequence made, the model every value
 * returned by the system under test is checked against.
 *
 * Executions are appended in non-decreasing order of both execution and capture time: they happen at
 * the current time, and a capture older than the latest executed one is never slashable.
 */
export class ShadowLedger {
  private readonly slashRequests: SlashRequest[] = [];
  private readonly slashExecutions: SlashExecution[] = [];

  get requests(): readonly Readonly<SlashRequest>[] {
    return this.slashRequests;
  }

  get executions(): readonly Readonly<SlashExecution>[] {
    return this.slashExecutions;
  }

  /**
   * Record an accepted request, returns its slash index
   */
  recordRequest(captureTime: Timestamp, requestTime: Timestamp, amount: Amount): SlashIndex {
    this.slashRequests.push({captureTime, requestTime, amount, executed: false});
    return this.slashRequests.length - 1;
  }

  /**
   * Mark request `slashIndex` executed at `execTime` for `amount`, and append the execution
   */
  recordExecution(slashIndex: SlashIndex, execTime: Timestamp, amount: Amount): Readonly<SlashExecution> {
    const request = this.getMutableRequest(slashIndex);
    if (request.executed) {
      throw new OracleError({code: OracleErrorCode.REQUEST_ALREADY_EXECUTED, slashIndex});
    }

    const last = this.slashExecutions.at(-1);
    if (last !== undefined) {
      if (execTime < last.execTime) {
        throw new OracleError({
          code: OracleErrorCode.EXECUTION_ORDER_VIOLATION,
          basis: TimeBasis.execution,
          time: execTime,
          lastTime: last.execTime,
        });
      }
      if (request.captureTime < last.captureTime) {
        throw new OracleError({
          code: OracleErrorCode.EXECUTION_ORDER_VIOLATION,
          basis: TimeBasis.capture,
          time: request.captureTime,
          lastTime: last.captureTime,
        });
      }
    }

    request.executed = true;
    const execution: SlashExecution = {
      slashIndex,
      captureTime: request.captureTime,
      requestTime: request.requestTime,
      execTime,
      cumulativeSlash: this.lastCumulativeSlash() + amount,
      amount,
    };
    this.slashExecutions.push(execution);
    return execution;
  }

  getRequest(slashIndex: SlashIndex): Readonly<SlashRequest> {
    return this.getMutableRequest(slashIndex);
  }

  /**
   * Cumulative slash of the last execution whose `basis` timestamp is at or before `time`, 0 if there is none.
   *
   * Executions sharing the timestamp `time` all count, the search is an upper bound.
   */
  cumulativeSlashAt(time: Timestamp, basis: LookupBasis = TimeBasis.execution): Amount {
    const executions = this.slashExecutions;
    const getter = (execution: SlashExecution): Timestamp => executionTime(execution, basis);
    const index = upperBound(executions, time, getter);

    const predecessorAfter = index > 0 && getter(executions[index - 1]) > time;
    const successorBefore = index < executions.length && getter(executions[index]) < time;
    if (predecessorAfter || successorBefore) {
      throw new OracleError({code: OracleErrorCode.LOOKUP_BRACKET_VIOLATION, time, index, basis});
    }

    return index > 0 ? executions[index - 1].cumulativeSlash : BigInt(0);
  }

  lastCumulativeSlash(): Amount {
    return this.slashExecutions.at(-1)?.cumulativeSlash ?? BigInt(0);
  }

  /** Capture time of the latest execution, 0 if there is none */
  lastCaptureTime(): Timestamp {
    // Executions are sorted by capture time
    return this.slashExecutions.at(-1)?.captureTime ?? 0;
  }

  pendingRequests(): PendingRequest[] {
    const pending: PendingRequest[] = [];
    for (const [slashIndex, request] of this.slashRequests.entries()) {
      if (!request.executed) pending.push({slashIndex, request});
    }
    return pending;
  }

  private getMutableRequest(slashIndex: SlashIndex): SlashRequest {
    const request = this.slashRequests[slashIndex];
    if (request === undefined) {
      throw new OracleError({code: OracleErrorCode.UNKNOWN_REQUEST, slashIndex});
    }
    return request;
  }
}
