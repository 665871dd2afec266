import type {SlashingParams} from "@slashwatch/params";
import type {SlashSubject, SlashingSystem} from "@slashwatch/types";
import {Logger, Prng} from "@slashwatch/utils";
import {ActionContext, ActionName, actionNames, actions} from "../actions/index.js";
import {CapacityOracle} from "../capacity.js";
import {OracleError, OracleErrorCode} from "../errors.js";
import {assertSlashWindows} from "../invariants/index.js";
import {ShadowLedger, SlashExecution, SlashRequest} from "../ledger/index.js";
import {SequenceFailureError} from "./failure.js";
import {EventSink} from "./sink.js";
import {Stats, createStats, formatStats} from "./stats.js";
import {SequenceTrace} from "./trace.js";

export type ActionWeights = Record<ActionName, number>;

export type SequenceOpts = {
  /** Seed of the whole run, reported on failure */
  runSeed: number;
  index: number;
  seed: number;
  flows: number;
  weights: ActionWeights;
  params: SlashingParams;
  subject: SlashSubject;
};

export type SequenceModules = {
  createSystem: (sequence: number) => SlashingSystem | Promise<SlashingSystem>;
  logger: Logger;
  sink: EventSink;
  signal?: AbortSignal;
};

export type SequenceReport = {
  index: number;
  seed: number;
  /** Flows run, lower than requested if the run was aborted */
  flows: number;
  stats: Stats;
  requests: readonly Readonly<SlashRequest>[];
  executions: readonly Readonly<SlashExecution>[];
};

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

async function assertSetup(system: SlashingSystem, subject: SlashSubject, params: SlashingParams): Promise<void> {
  // Capture timestamps must be in the past
  const setupTime = await system.currentTime();
  await system.advanceTime(1);
  const checks: [string, bigint, bigint][] = [
    ["stakeAt", params.NETWORK_CAPACITY, await system.queryStakeAt(subject, setupTime)],
    ["slashableStake", params.NETWORK_CAPACITY, await system.querySlashable(subject, setupTime)],
    ["cumulativeSlash", BigInt(0), await system.queryCumulativeSlash(subject)],
  ];

  for (const [query, expected, actual] of checks) {
    if (expected !== actual) {
      throw new OracleError({
        code: OracleErrorCode.QUERY_MISMATCH,
        query,
        time: setupTime,
        expected: expected.toString(),
        actual: actual.toString(),
      });
    }
  }
}

/**
 * Run one sequence: set up a fresh system and ledger, warm up the clock, then run `flows` random
 * actions, checking the slash windows after each one.
 */
export async function runSequence(opts: SequenceOpts, modules: SequenceModules): Promise<SequenceReport> {
  const {runSeed, index, seed, flows, weights, params, subject} = opts;
  const {sink, signal} = modules;
  const logger = modules.logger;

  const rng = new Prng(seed);
  const ledger = new ShadowLedger();
  const oracle = new CapacityOracle(ledger, params);
  const stats = createStats();
  const trace = new SequenceTrace();
  const weightEntries = actionNames.map((name) => [name, weights[name]] as const);

  let flow: number | null = null;
  let action: ActionName | null = null;
  let flowsRun = 0;

  logger.info("Starting sequence", {sequence: index, seed});

  try {
    const system = await modules.createSystem(index);
    await assertSetup(system, subject, params);
    await system.advanceTime(params.WARM_UP_DURATION);

    for (let i = 0; i < flows; i++) {
      if (signal?.aborted) {
        logger.info("Sequence aborted", {sequence: index, flow: i});
        break;
      }

      flow = i;
      action = rng.pickWeighted(weightEntries);
      const step = trace.begin(i, action);
      sink.write({type: "flow", sequence: index, flow: i, action});
      logger.verbose("Starting flow", {sequence: index, flow: i, action});

      const ctx: ActionContext = {
        sequence: index,
        flow: i,
        system,
        subject,
        ledger,
        oracle,
        params,
        rng,
        stats,
        step,
        sink,
        logger,
      };
      await actions[action](ctx);

      assertSlashWindows(ledger.executions, params.VETO_DURATION, params.NETWORK_CAPACITY);
      flowsRun++;
    }
  } catch (e) {
    const violation = toError(e);
    logger.error("Sequence failed", {sequence: index, flow}, violation);
    try {
      await sink.flush();
    } catch (flushError) {
      logger.error("Event sink flush failed", {sequence: index}, toError(flushError));
    }
    throw new SequenceFailureError({seed: runSeed, sequence: index, sequenceSeed: seed, flow, action}, violation, [
      ...trace.steps,
    ]);
  }

  await sink.flush();

  logger.info("Sequence done", {sequence: index, flows: flowsRun, stats: formatStats(stats)});

  return {index, seed, flows: flowsRun, stats, requests: ledger.requests, executions: ledger.executions};
}
