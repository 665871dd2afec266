import type {SlashingParams} from "@slashwatch/params";
import type {Amount, Timestamp} from "@slashwatch/types";
import {bigIntMax} from "@slashwatch/utils";
import {ShadowLedger, TimeBasis} from "./ledger/index.js";

/**
 * Budget left under a replenishing cap: everything slashed after the capture point is consumed,
 * everything slashed before it is not. Never negative.
 */
export function remainingCapacity(
  capacity: Amount,
  cumulativeSlashAtCapture: Amount,
  lastCumulativeSlash: Amount
): Amount {
  return bigIntMax(capacity + cumulativeSlashAtCapture - lastCumulativeSlash, BigInt(0));
}

/**
 * Predicts the stake still slashable for a capture time from the shadow ledger
 */
export class CapacityOracle {
  constructor(
    private readonly ledger: ShadowLedger,
    private readonly params: Pick<SlashingParams, "NETWORK_CAPACITY" | "EPOCH_DURATION">
  ) {}

  /** A capture older than the epoch can't be slashed anymore */
  isExpired(captureTime: Timestamp, now: Timestamp): boolean {
    return now > captureTime + this.params.EPOCH_DURATION;
  }

  /** A capture before the latest executed one was superseded */
  isSuperseded(captureTime: Timestamp): boolean {
    return captureTime < this.ledger.lastCaptureTime();
  }

  slashableAt(captureTime: Timestamp, now: Timestamp): Amount {
    if (this.isExpired(captureTime, now) || this.isSuperseded(captureTime)) {
      return BigInt(0);
    }

    return remainingCapacity(
      this.params.NETWORK_CAPACITY,
      // Cumulative slash is checkpointed at execution time
      this.ledger.cumulativeSlashAt(captureTime, TimeBasis.execution),
      this.ledger.lastCumulativeSlash()
    );
  }
}
