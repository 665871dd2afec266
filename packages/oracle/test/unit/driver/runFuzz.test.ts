import {describe, it, expect} from "vitest";
import {getEmptyLogger} from "@slashwatch/logger";
import {SlashingParams, getSlashingParams, minimalPreset} from "@slashwatch/params";
import type {SlashingSystem} from "@slashwatch/types";
import {isErr} from "@slashwatch/utils";
import {
  ActionName,
  EventSink,
  FuzzModules,
  FuzzOpts,
  MemorySink,
  OracleError,
  OracleErrorCode,
  SequenceFailureError,
  findWindowBreaches,
  formatReproduction,
  runFuzz,
} from "../../../src/index.js";
import {createTestSlasher, overrideSystem, testSubject} from "../../utils/context.js";

function fuzzOpts(opts: Partial<FuzzOpts> = {}): FuzzOpts {
  return {seed: 1, sequences: 3, flowsPerSequence: 200, params: minimalPreset, ...opts};
}

function fuzzModules(createSystem: FuzzModules["createSystem"] = () => createTestSlasher()): FuzzModules {
  return {createSystem, subject: testSubject, logger: getEmptyLogger()};
}

async function expectSequenceFailure(promise: Promise<unknown>): Promise<SequenceFailureError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof SequenceFailureError) return e;
    throw e;
  }
  throw Error("Expected the run to fail");
}

/** Slasher executing one unit less than it should */
function shortExecutingSystem(params: SlashingParams = minimalPreset): SlashingSystem {
  const slasher = createTestSlasher(params);
  return overrideSystem(slasher, {
    submitExecution: async (subject, slashIndex) => {
      const receipt = await slasher.submitExecution(subject, slashIndex);
      return isErr(receipt) ? receipt : {...receipt, slashedAmount: receipt.slashedAmount - BigInt(1)};
    },
  });
}

describe("runFuzz", () => {
  it("should run clean against the veto slasher", async () => {
    const report = await runFuzz(fuzzOpts(), fuzzModules());

    expect(report.seed).toBe(1);
    expect(report.sequences.map((sequence) => [sequence.index, sequence.flows])).toEqual([
      [0, 200],
      [1, 200],
      [2, 200],
    ]);

    let outcomes = 0;
    for (const action of [ActionName.requestSlash, ActionName.executeSlash]) {
      const {success, failure, skipped} = report.stats[action];
      outcomes += success + failure + skipped;
    }
    expect(outcomes).toBe(600);

    const {VETO_DURATION, NETWORK_CAPACITY} = minimalPreset;
    for (const sequence of report.sequences) {
      expect(findWindowBreaches(sequence.executions, VETO_DURATION, NETWORK_CAPACITY)).toEqual([]);
    }
  });

  it("should replay identically from the same seed whatever the concurrency", async () => {
    const first = await runFuzz(fuzzOpts({seed: 42}), fuzzModules());
    const second = await runFuzz(fuzzOpts({seed: 42}), fuzzModules());
    const concurrent = await runFuzz(fuzzOpts({seed: 42, concurrency: 3}), fuzzModules());

    expect(second).toEqual(first);
    expect(concurrent).toEqual(first);
  });

  it("should run a single sequence as in the full run", async () => {
    const full = await runFuzz(fuzzOpts({seed: 3}), fuzzModules());
    const only = await runFuzz(fuzzOpts({seed: 3, only: 1}), fuzzModules());

    expect(only.sequences).toEqual([full.sequences[1]]);
  });

  it("should write every flow to the sink and flush once per sequence", async () => {
    const sink = new MemorySink();
    await runFuzz(fuzzOpts({sequences: 2, flowsPerSequence: 50}), {...fuzzModules(), sink});

    const flows = sink.events.filter((event) => event.type === "flow");
    expect(flows.map((event) => [event.sequence, event.flow])).toEqual([
      ...Array.from({length: 50}, (_, i) => [0, i]),
      ...Array.from({length: 50}, (_, i) => [1, i]),
    ]);
    expect(sink.events[0].type).toBe("flow");
    expect(sink.flushes).toBe(2);
  });

  it("should check the setup state at a past timestamp", async () => {
    const queries: [number, number][] = [];
    await runFuzz(
      fuzzOpts({sequences: 1, flowsPerSequence: 0}),
      fuzzModules(() => {
        const slasher = createTestSlasher();
        return overrideSystem(slasher, {
          querySlashable: async (subject, captureTime) => {
            queries.push([captureTime, await slasher.currentTime()]);
            return slasher.querySlashable(subject, captureTime);
          },
        });
      })
    );

    expect(queries).toEqual([[1000, 1001]]);
  });

  it.each<[string, Partial<FuzzOpts>]>([
    ["negative seed", {seed: -1}],
    ["seed over 32 bits", {seed: 2 ** 32}],
    ["fractional sequences", {sequences: 1.5}],
    ["negative flows", {flowsPerSequence: -1}],
    ["zero concurrency", {concurrency: 0}],
    ["only out of range", {only: 3}],
    ["negative weight", {weights: {[ActionName.requestSlash]: -1}}],
    ["all weights zero", {weights: {[ActionName.requestSlash]: 0, [ActionName.executeSlash]: 0}}],
  ])("should reject %s", async (_, opts) => {
    await expect(runFuzz(fuzzOpts(opts), fuzzModules())).rejects.toBeInstanceOf(OracleError);
    await expect(runFuzz(fuzzOpts(opts), fuzzModules())).rejects.toMatchObject({
      type: {code: OracleErrorCode.INVALID_OPTIONS},
    });
  });

  it("should fail during setup on a wrong initial slashable stake", async () => {
    const error = await expectSequenceFailure(
      runFuzz(
        fuzzOpts(),
        fuzzModules(() => {
          const slasher = createTestSlasher();
          return overrideSystem(slasher, {
            querySlashable: async (subject, captureTime) =>
              (await slasher.querySlashable(subject, captureTime)) + BigInt(1),
          });
        })
      )
    );

    expect(error.type).toMatchObject({seed: 1, sequence: 0, flow: null, action: null});
    expect(error.violation).toBeInstanceOf(OracleError);
    expect(error.violation).toMatchObject({
      type: {
        code: OracleErrorCode.QUERY_MISMATCH,
        query: "slashableStake",
        time: 1000,
        expected: "100000",
        actual: "100001",
      },
    });
    expect(formatReproduction(error).split("\n")[0]).toBe("Sequence 0 failed at setup");
  });

  it("should catch a wrong executed amount and replay it from the reproduction", async () => {
    const error = await expectSequenceFailure(runFuzz(fuzzOpts({seed: 5}), fuzzModules(() => shortExecutingSystem())));

    const {flow, action, sequence} = error.type;
    expect(sequence).toBe(0);
    expect(action).toBe(ActionName.executeSlash);
    expect(error.violation).toMatchObject({type: {code: OracleErrorCode.AMOUNT_MISMATCH}});
    if (flow === null) throw Error("Expected a flow");

    expect(error.steps).toHaveLength(flow + 1);
    expect(error.steps[flow].outcome).toBe(null);
    expect(formatReproduction(error).split("\n")[3]).toBe(`  replay: --seed 5 --only 0 --flows ${flow + 1}`);

    const replayed = await expectSequenceFailure(
      runFuzz(fuzzOpts({seed: 5, only: 0, flowsPerSequence: flow + 1}), fuzzModules(() => shortExecutingSystem()))
    );
    expect(replayed.type).toEqual(error.type);
    expect(replayed.steps).toEqual(error.steps);
  });

  it("should report the violation when the sink fails to flush", async () => {
    const sink: EventSink = {
      write: () => {},
      flush: () => Promise.reject(Error("disk full")),
    };
    const error = await expectSequenceFailure(
      runFuzz(fuzzOpts({seed: 5}), {...fuzzModules(() => shortExecutingSystem()), sink})
    );

    expect(error.type).toMatchObject({seed: 5, sequence: 0, action: ActionName.executeSlash});
    expect(error.violation).toMatchObject({type: {code: OracleErrorCode.AMOUNT_MISMATCH}});
  });

  it("should catch a zero amount request being accepted", async () => {
    const params = getSlashingParams("minimal", {AMOUNT_EDGE_BIAS: 1});
    const error = await expectSequenceFailure(
      runFuzz(
        fuzzOpts({params}),
        fuzzModules(() => {
          const slasher = createTestSlasher(params);
          return overrideSystem(slasher, {
            submitRequest: async (subject, amount, captureTime) =>
              amount === BigInt(0)
                ? {slashIndex: slasher.slashRequestsLength, timestamp: await slasher.currentTime()}
                : slasher.submitRequest(subject, amount, captureTime),
          });
        })
      )
    );

    expect(error.violation).toMatchObject({
      type: {
        code: OracleErrorCode.OUTCOME_MISMATCH,
        action: ActionName.requestSlash,
        expected: "failure",
        actual: "success",
        reason: null,
      },
    });
  });
});
