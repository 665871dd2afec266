import type {Amount, Duration, Timestamp} from "@slashwatch/types";
import {OracleError, OracleErrorCode} from "../errors.js";
import {SlashExecution, TimeBasis, executionTime} from "../ledger/index.js";

export type WindowBreach = {
  basis: TimeBasis;
  /** Index of the execution the window starts at */
  anchor: number;
  windowStart: Timestamp;
  windowEnd: Timestamp;
  total: Amount;
};

export const windowBases: readonly TimeBasis[] = [TimeBasis.capture, TimeBasis.request, TimeBasis.execution];

/**
 * Sum of executed amounts per window `[t, t + window]`, one window per execution anchored at its time `t`.
 *
 * Any window holding executions holds them in the window anchored at its earliest execution, so checking
 * these windows covers all of them.
 */
export function findWindowBreaches(
  executions: readonly Readonly<SlashExecution>[],
  window: Duration,
  capacity: Amount,
  bases: readonly TimeBasis[] = windowBases
): WindowBreach[] {
  const breaches: WindowBreach[] = [];

  for (const basis of bases) {
    for (const [anchor, execution] of executions.entries()) {
      const windowStart = executionTime(execution, basis);
      const windowEnd = windowStart + window;

      let total = BigInt(0);
      for (const other of executions) {
        const t = executionTime(other, basis);
        if (t >= windowStart && t <= windowEnd) {
          total += other.amount;
        }
      }

      if (total > capacity) {
        breaches.push({basis, anchor, windowStart, windowEnd, total});
      }
    }
  }

  return breaches;
}

/**
 * Throw on the first window holding more slashed stake than `capacity`
 */
export function assertSlashWindows(
  executions: readonly Readonly<SlashExecution>[],
  window: Duration,
  capacity: Amount
): void {
  const [breach] = findWindowBreaches(executions, window, capacity);
  if (breach !== undefined) {
    throw new OracleError({
      code: OracleErrorCode.WINDOW_CAPACITY_EXCEEDED,
      basis: breach.basis,
      windowStart: breach.windowStart,
      windowEnd: breach.windowEnd,
      total: breach.total.toString(),
      capacity: capacity.toString(),
    });
  }
}
