import {bigIntMin, isErr, prettyInt} from "@slashwatch/utils";
import {OracleError, OracleErrorCode} from "../errors.js";
import {crossCheckSystem} from "./checks.js";
import {ActionContext, ActionName, ActionOutcome} from "./interface.js";
import {emitTransaction, outcomeMismatch, settle} from "./outcome.js";

const action = ActionName.executeSlash;

/**
 * Execute a random recorded request, executed ones included, once its veto period is over. The system
 * must execute exactly `min(slashable, request amount)`, or reject requests that are executed, expired,
 * superseded or have nothing left to slash.
 */
export async function executeSlash(ctx: ActionContext): Promise<ActionOutcome> {
  const {system, subject, ledger, oracle, params, rng, step, logger} = ctx;

  if (ledger.requests.length === 0) {
    return settle(ctx, action, "skipped");
  }

  const slashIndex = rng.intBetween(0, ledger.requests.length - 1);
  const request = ledger.getRequest(slashIndex);
  step.params.slashIndex = slashIndex;

  let now = await system.currentTime();
  if (now < request.requestTime + params.VETO_DURATION) {
    await system.advanceTime(params.VETO_DURATION);
    now = await system.currentTime();
    step.params.advancedBy = params.VETO_DURATION;
  }
  step.params.now = now;

  const slashable = await crossCheckSystem(ctx, request.captureTime, now);
  const expectedAmount = bigIntMin(slashable, request.amount);
  const expectSuccess = !(
    request.executed ||
    request.amount === BigInt(0) ||
    oracle.isExpired(request.captureTime, now) ||
    slashable === BigInt(0)
  );
  logger.debug("Executing slash", {slashIndex, expectedAmount: prettyInt(expectedAmount), expectSuccess});

  const result = await system.submitExecution(subject, slashIndex);

  if (isErr(result)) {
    emitTransaction(ctx, action, "executeSlash", now, result.error.reason, false);
    if (expectSuccess) {
      throw outcomeMismatch(action, expectSuccess, result.error);
    }
    logger.debug("Slash execution rejected", {reason: result.error.reason});
    return settle(ctx, action, "failure");
  }

  emitTransaction(ctx, action, "executeSlash", result.timestamp, result.slashedAmount.toString(), true);
  if (!expectSuccess) {
    throw outcomeMismatch(action, expectSuccess, null);
  }

  if (result.slashedAmount !== expectedAmount) {
    throw new OracleError({
      code: OracleErrorCode.AMOUNT_MISMATCH,
      slashIndex,
      expected: expectedAmount.toString(),
      actual: result.slashedAmount.toString(),
    });
  }

  ledger.recordExecution(slashIndex, result.timestamp, result.slashedAmount);
  step.params.slashedAmount = result.slashedAmount.toString();
  return settle(ctx, action, "success");
}
