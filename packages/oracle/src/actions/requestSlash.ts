import {captureWindow} from "@slashwatch/params";
import {isErr, prettyInt, sampleBigInt, sampleInt} from "@slashwatch/utils";
import {OracleError, OracleErrorCode} from "../errors.js";
import {crossCheckSystem} from "./checks.js";
import {ActionContext, ActionName, ActionOutcome} from "./interface.js";
import {emitTransaction, outcomeMismatch, settle} from "./outcome.js";

const action = ActionName.requestSlash;

/**
 * Request a slash at a random capture time of the admissible window, for a random amount up to the
 * slashable stake. The system must accept it iff the amount is positive.
 */
export async function requestSlash(ctx: ActionContext): Promise<ActionOutcome> {
  const {system, subject, ledger, params, rng, step, logger} = ctx;

  const now = await system.currentTime();
  // Not older than the capture window, not older than the latest executed capture
  const minCaptureTime = Math.max(now - captureWindow(params) + 1, ledger.lastCaptureTime() + 1);
  const maxCaptureTime = now - 1;
  step.params.now = now;

  if (minCaptureTime > maxCaptureTime) {
    logger.debug("Empty capture window", {minCaptureTime, maxCaptureTime});
    return settle(ctx, action, "skipped");
  }

  const captureTime = sampleInt(rng, minCaptureTime, maxCaptureTime, params.CAPTURE_EDGE_BIAS);
  step.params.captureTime = captureTime;

  const slashable = await crossCheckSystem(ctx, captureTime, now);
  const amount = slashable > BigInt(0) ? sampleBigInt(rng, BigInt(0), slashable, params.AMOUNT_EDGE_BIAS) : BigInt(0);
  step.params.amount = amount.toString();

  const expectSuccess = amount > BigInt(0);
  logger.debug("Requesting slash", {captureTime, amount: prettyInt(amount), expectSuccess});

  const result = await system.submitRequest(subject, amount, captureTime);

  if (isErr(result)) {
    emitTransaction(ctx, action, "requestSlash", now, result.error.reason, false);
    if (expectSuccess) {
      throw outcomeMismatch(action, expectSuccess, result.error);
    }
    logger.debug("Slash request rejected", {reason: result.error.reason});
    return settle(ctx, action, "failure");
  }

  emitTransaction(ctx, action, "requestSlash", result.timestamp, String(result.slashIndex), true);
  if (!expectSuccess) {
    throw outcomeMismatch(action, expectSuccess, null);
  }

  const expectedIndex = ledger.requests.length;
  if (result.slashIndex !== expectedIndex) {
    throw new OracleError({
      code: OracleErrorCode.SLASH_INDEX_MISMATCH,
      expected: expectedIndex,
      actual: result.slashIndex,
    });
  }

  ledger.recordRequest(captureTime, result.timestamp, amount);
  step.params.slashIndex = result.slashIndex;
  return settle(ctx, action, "success");
}
