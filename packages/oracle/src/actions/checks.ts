import type {Amount, Timestamp} from "@slashwatch/types";
import {prettyInt} from "@slashwatch/utils";
import {OracleError, OracleErrorCode} from "../errors.js";
import {TimeBasis} from "../ledger/index.js";
import {ActionContext} from "./interface.js";

function assertQuery(query: string, time: Timestamp | null, expected: Amount, actual: Amount): void {
  if (expected !== actual) {
    throw new OracleError({
      code: OracleErrorCode.QUERY_MISMATCH,
      query,
      time,
      expected: expected.toString(),
      actual: actual.toString(),
    });
  }
}

/**
 * Compare every query of the system at `captureTime` with the shadow ledger, returns the expected
 * slashable amount
 */
export async function crossCheckSystem(ctx: ActionContext, captureTime: Timestamp, now: Timestamp): Promise<Amount> {
  const {system, subject, ledger, oracle, params, logger} = ctx;

  assertQuery("stakeAt", captureTime, params.NETWORK_CAPACITY, await system.queryStakeAt(subject, captureTime));

  const cumulativeSlashAt = ledger.cumulativeSlashAt(captureTime, TimeBasis.execution);
  assertQuery(
    "cumulativeSlashAt",
    captureTime,
    cumulativeSlashAt,
    await system.queryCumulativeSlashAt(subject, captureTime)
  );

  const cumulativeSlash = ledger.lastCumulativeSlash();
  assertQuery("cumulativeSlash", null, cumulativeSlash, await system.queryCumulativeSlash(subject));

  const slashable = oracle.slashableAt(captureTime, now);
  assertQuery("slashableStake", captureTime, slashable, await system.querySlashable(subject, captureTime));

  logger.debug("Expected values", {
    captureTime,
    cumulativeSlashAt: prettyInt(cumulativeSlashAt),
    cumulativeSlash: prettyInt(cumulativeSlash),
    slashable: prettyInt(slashable),
  });

  return slashable;
}
