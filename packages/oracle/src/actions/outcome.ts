import type {Rejection, Timestamp} from "@slashwatch/types";
import {recordOutcome} from "../driver/stats.js";
import {OracleError, OracleErrorCode} from "../errors.js";
import {ActionContext, ActionName, ActionOutcome} from "./interface.js";

/**
 * Count the outcome and report it to the sink
 */
export function settle(ctx: ActionContext, action: ActionName, outcome: ActionOutcome): ActionOutcome {
  const count = recordOutcome(ctx.stats, action, outcome);
  ctx.step.outcome = outcome;
  if (outcome !== "skipped") {
    ctx.sink.write({
      type: "outcome",
      sequence: ctx.sequence,
      flow: ctx.flow,
      action,
      success: outcome === "success",
      count,
    });
  }
  return outcome;
}

export function emitTransaction(
  ctx: ActionContext,
  action: ActionName,
  command: string,
  timestamp: Timestamp,
  returnValue: string,
  success: boolean
): void {
  ctx.sink.write({
    type: "transaction",
    sequence: ctx.sequence,
    flow: ctx.flow,
    action,
    command,
    timestamp,
    from: ctx.subject.subnetwork,
    to: ctx.subject.operator,
    returnValue,
    success,
  });
}

export function outcomeMismatch(action: ActionName, expectSuccess: boolean, rejection: Rejection | null): OracleError {
  return new OracleError({
    code: OracleErrorCode.OUTCOME_MISMATCH,
    action,
    expected: expectSuccess ? "success" : "failure",
    actual: expectSuccess ? "failure" : "success",
    reason: rejection?.reason ?? null,
  });
}
