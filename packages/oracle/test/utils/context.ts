import {getEmptyLogger} from "@slashwatch/logger";
import {SlashingParams, minimalPreset} from "@slashwatch/params";
import type {SlashSubject, SlashingSystem} from "@slashwatch/types";
import {Prng} from "@slashwatch/utils";
import {VetoSlasher, createVetoSlasher} from "@slashwatch/veto-slasher";
import {
  ActionContext,
  ActionName,
  CapacityOracle,
  MemorySink,
  SequenceTrace,
  ShadowLedger,
  createStats,
} from "../../src/index.js";

export const testSubject: SlashSubject = {subnetwork: "0xnetwork00", operator: "0xoperator"};
export const genesisTime = 1000;

/**
 * Prng returning scripted values, and never choosing an edge
 */
export class ScriptedPrng extends Prng {
  constructor(
    private readonly ints: number[] = [],
    private readonly bigInts: bigint[] = []
  ) {
    super(0);
  }

  chance(): boolean {
    return false;
  }

  intBetween(lo: number, hi: number): number {
    const value = this.ints.shift();
    if (value === undefined || value < lo || value > hi) {
      throw Error(`Unscripted intBetween(${lo}, ${hi})`);
    }
    return value;
  }

  bigIntBetween(lo: bigint, hi: bigint): bigint {
    const value = this.bigInts.shift();
    if (value === undefined || value < lo || value > hi) {
      throw Error(`Unscripted bigIntBetween(${lo}, ${hi})`);
    }
    return value;
  }
}

export function createTestSlasher(params: SlashingParams = minimalPreset): VetoSlasher {
  return createVetoSlasher(params, testSubject, genesisTime);
}

/**
 * Context of a sequence right after warm-up: with the minimal preset the clock is at 1660 and the
 * admissible capture window is [1001, 1659]
 */
export function createTestContext(
  rng: Prng,
  params: SlashingParams = minimalPreset
): {ctx: ActionContext; slasher: VetoSlasher; ledger: ShadowLedger; sink: MemorySink} {
  const slasher = createTestSlasher(params);
  slasher.clock.advance(params.WARM_UP_DURATION);
  const ledger = new ShadowLedger();
  const sink = new MemorySink();
  const ctx: ActionContext = {
    sequence: 0,
    flow: 0,
    system: slasher,
    subject: testSubject,
    ledger,
    oracle: new CapacityOracle(ledger, params),
    params,
    rng,
    stats: createStats(),
    step: new SequenceTrace().begin(0, ActionName.requestSlash),
    sink,
    logger: getEmptyLogger(),
  };
  return {ctx, slasher, ledger, sink};
}

/**
 * System delegating to `inner`, with some methods replaced
 */
export function overrideSystem(inner: SlashingSystem, overrides: Partial<SlashingSystem>): SlashingSystem {
  return {
    currentTime: () => inner.currentTime(),
    advanceTime: (by) => inner.advanceTime(by),
    queryCumulativeSlash: (subject) => inner.queryCumulativeSlash(subject),
    queryCumulativeSlashAt: (subject, time) => inner.queryCumulativeSlashAt(subject, time),
    queryStakeAt: (subject, time) => inner.queryStakeAt(subject, time),
    querySlashable: (subject, captureTime) => inner.querySlashable(subject, captureTime),
    submitRequest: (subject, amount, captureTime) => inner.submitRequest(subject, amount, captureTime),
    submitExecution: (subject, slashIndex) => inner.submitExecution(subject, slashIndex),
    ...overrides,
  };
}
