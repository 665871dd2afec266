import type {SlashingParams} from "@slashwatch/params";
import type {SlashSubject, SlashingSystem} from "@slashwatch/types";
import {Logger, deriveSeed} from "@slashwatch/utils";
import {ActionName, actionNames} from "../actions/interface.js";
import {OracleError, OracleErrorCode} from "../errors.js";
import {NoopSink, EventSink} from "./sink.js";
import {ActionWeights, SequenceReport, runSequence} from "./sequence.js";
import {Stats, createStats, formatStats, mergeStats} from "./stats.js";

export type FuzzOpts = {
  seed: number;
  sequences: number;
  flowsPerSequence: number;
  /** Relative weight of each action, equal by default */
  weights?: Partial<ActionWeights>;
  /** Sequences run at once */
  concurrency?: number;
  /** Run only this sequence index, to replay a failure */
  only?: number;
  params: SlashingParams;
};

export type FuzzModules = {
  /** Deploy or reset a system under test for a sequence */
  createSystem: (sequence: number) => SlashingSystem | Promise<SlashingSystem>;
  subject: SlashSubject;
  logger: Logger;
  sink?: EventSink;
};

export type FuzzReport = {
  seed: number;
  sequences: SequenceReport[];
  stats: Stats;
};

export const defaultActionWeights: ActionWeights = {
  [ActionName.requestSlash]: 1,
  [ActionName.executeSlash]: 1,
};

/** Seeds are 32 bit */
export const MAX_SEED = 0xffffffff;

function invalidOptions(reason: string): OracleError {
  return new OracleError({code: OracleErrorCode.INVALID_OPTIONS, reason});
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function resolveWeights(weights: Partial<ActionWeights> = {}): ActionWeights {
  const resolved = {...defaultActionWeights};
  let total = 0;
  for (const name of actionNames) {
    const weight = weights[name] ?? defaultActionWeights[name];
    if (!(weight >= 0) || !Number.isFinite(weight)) {
      throw invalidOptions(`weight of ${name} must be a finite non-negative number`);
    }
    resolved[name] = weight;
    total += weight;
  }
  if (total <= 0) {
    throw invalidOptions("at least one action weight must be positive");
  }
  return resolved;
}

/**
 * Run `sequences` independent sequences of `flowsPerSequence` random actions each.
 *
 * Sequence `i` draws from its own generator seeded with `deriveSeed(seed, i)`, so it replays identically
 * whatever the concurrency. The first failure aborts the run: sequences in flight stop at their next flow,
 * none is started anymore, and the failure is thrown once they are all settled.
 */
export async function runFuzz(opts: FuzzOpts, modules: FuzzModules): Promise<FuzzReport> {
  const {seed, sequences, flowsPerSequence, only, params} = opts;
  const concurrency = opts.concurrency ?? 1;
  const {logger, subject, createSystem} = modules;
  const sink = modules.sink ?? new NoopSink();

  if (!isNonNegativeInteger(seed) || seed > MAX_SEED) {
    throw invalidOptions(`seed must be an integer in [0, ${MAX_SEED}]`);
  }
  if (!isNonNegativeInteger(sequences)) throw invalidOptions("sequences must be a non-negative integer");
  if (!isNonNegativeInteger(flowsPerSequence)) throw invalidOptions("flowsPerSequence must be a non-negative integer");
  if (!Number.isSafeInteger(concurrency) || concurrency < 1) throw invalidOptions("concurrency must be at least 1");
  if (only !== undefined && !(isNonNegativeInteger(only) && only < sequences)) {
    throw invalidOptions(`only must be a sequence index lower than ${sequences}`);
  }
  const weights = resolveWeights(opts.weights);

  const queue = only !== undefined ? [only] : Array.from({length: sequences}, (_, i) => i);
  const reports: SequenceReport[] = [];
  const controller = new AbortController();
  const failures: unknown[] = [];

  logger.info("Starting fuzz run", {seed, sequences: queue.length, flowsPerSequence, concurrency});

  const worker = async (): Promise<void> => {
    for (let index = queue.shift(); index !== undefined; index = queue.shift()) {
      if (controller.signal.aborted) return;
      try {
        const report = await runSequence(
          {runSeed: seed, index, seed: deriveSeed(seed, index), flows: flowsPerSequence, weights, params, subject},
          {createSystem, logger, sink, signal: controller.signal}
        );
        reports.push(report);
      } catch (e) {
        failures.push(e);
        controller.abort();
        return;
      }
    }
  };

  await Promise.all(Array.from({length: Math.min(concurrency, queue.length)}, () => worker()));

  if (failures.length > 0) {
    throw failures[0];
  }

  reports.sort((a, b) => a.index - b.index);
  const stats = reports.reduce((total, report) => mergeStats(total, report.stats), createStats());
  logger.info("Fuzz run done", {seed, sequences: reports.length, stats: formatStats(stats)});

  return {seed, sequences: reports, stats};
}
