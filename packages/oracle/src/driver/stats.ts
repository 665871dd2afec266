import {ActionName, ActionOutcome, actionNames} from "../actions/interface.js";

export type OutcomeCounts = {[K in ActionOutcome]: number};

export type Stats = {[K in ActionName]: OutcomeCounts};

export function createStats(): Stats {
  return {
    [ActionName.requestSlash]: {success: 0, failure: 0, skipped: 0},
    [ActionName.executeSlash]: {success: 0, failure: 0, skipped: 0},
  };
}

/**
 * Count one more `outcome` of `action`, returns the new count
 */
export function recordOutcome(stats: Stats, action: ActionName, outcome: ActionOutcome): number {
  return ++stats[action][outcome];
}

export function mergeStats(target: Stats, source: Stats): Stats {
  for (const action of actionNames) {
    target[action].success += source[action].success;
    target[action].failure += source[action].failure;
    target[action].skipped += source[action].skipped;
  }
  return target;
}

/**
 * `request_slash: 10 success, 3 failure, 0 skipped; execute_slash: ...`
 */
export function formatStats(stats: Stats): string {
  return actionNames
    .map((action) => {
      const {success, failure, skipped} = stats[action];
      return `${action}: ${success} success, ${failure} failure, ${skipped} skipped`;
    })
    .join("; ");
}
