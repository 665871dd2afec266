import type {Duration, Timestamp} from "@slashwatch/types";
import {VetoSlasherError, VetoSlasherErrorCode} from "./errors.js";

/**
 * Clock that only moves when told to
 */
export class ManualClock {
  private now: Timestamp;

  constructor(genesisTime: Timestamp) {
    this.now = genesisTime;
  }

  currentTime(): Timestamp {
    return this.now;
  }

  advance(by: Duration): void {
    if (!Number.isSafeInteger(by) || by < 0) {
      throw new VetoSlasherError({code: VetoSlasherErrorCode.INVALID_TIME_ADVANCE, by});
    }
    this.now += by;
  }
}
