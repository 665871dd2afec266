import {upperBound} from "@slashwatch/utils";
import {VetoSlasherError, VetoSlasherErrorCode} from "./errors.js";

type Checkpoint = {
  key: number;
  value: bigint;
};

/**
 * History of a value keyed by timestamp. Keys are pushed in non-decreasing order, pushing the
 * current last key again overwrites its value.
 */
export class Checkpoints {
  private readonly checkpoints: Checkpoint[] = [];

  get length(): number {
    return this.checkpoints.length;
  }

  push(key: number, value: bigint): void {
    const last = this.checkpoints.at(-1);
    if (last !== undefined) {
      if (key < last.key) {
        throw new VetoSlasherError({code: VetoSlasherErrorCode.UNORDERED_CHECKPOINT, key, lastKey: last.key});
      }
      if (key === last.key) {
        last.value = value;
        return;
      }
    }
    this.checkpoints.push({key, value});
  }

  /** Value of the most recent checkpoint, 0 if empty */
  latest(): bigint {
    return this.checkpoints.at(-1)?.value ?? BigInt(0);
  }

  /** Value of the last checkpoint with a key lower than or equal to `key`, 0 if there is none */
  upperLookupRecent(key: number): bigint {
    const index = upperBound(this.checkpoints, key, (checkpoint) => checkpoint.key);
    return index > 0 ? this.checkpoints[index - 1].value : BigInt(0);
  }
}
