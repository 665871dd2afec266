import {describe, it, expect, beforeEach} from "vitest";
import {minimalPreset} from "@slashwatch/params";
import type {SlashSubject} from "@slashwatch/types";
import {Err, isErr} from "@slashwatch/utils";
import {RejectionReason, VetoSlasher, VetoSlasherError, createVetoSlasher} from "../../src/index.js";

// minimal preset: capacity 100_000, veto 180s, epoch 840s
const genesisTime = 1000;
const subject: SlashSubject = {subnetwork: "0xnetwork00", operator: "0xoperator"};
const otherSubject: SlashSubject = {subnetwork: "0xnetwork00", operator: "0xsomeoneelse"};
const capacity = BigInt(100_000);

describe("VetoSlasher", () => {
  let slasher: VetoSlasher;

  beforeEach(() => {
    slasher = createVetoSlasher(minimalPreset, subject, genesisTime);
    // now = 1660, admissible capture timestamps are [1000, 1659]
    slasher.clock.advance(660);
  });

  it("should cap stake by the network limit from genesis on", () => {
    expect(slasher.stakeAt(subject, genesisTime - 1)).toBe(BigInt(0));
    expect(slasher.stakeAt(subject, genesisTime)).toBe(capacity);
    expect(slasher.stakeAt(otherSubject, genesisTime)).toBe(BigInt(0));
    expect(slasher.slashableStake(subject, genesisTime)).toBe(capacity);
  });

  it("should have no slashable stake at or after the current time", () => {
    expect(slasher.slashableStake(subject, 1659)).toBe(capacity);
    expect(slasher.slashableStake(subject, 1660)).toBe(BigInt(0));
    expect(slasher.slashableStake(subject, 1710)).toBe(BigInt(0));
  });

  it("should reject capture timestamps outside of the window", () => {
    expect(slasher.requestSlash(subject, BigInt(1), 1660)).toEqual(
      Err({reason: RejectionReason.INVALID_CAPTURE_TIMESTAMP})
    );
    expect(slasher.requestSlash(subject, BigInt(1), 999)).toEqual(
      Err({reason: RejectionReason.INVALID_CAPTURE_TIMESTAMP})
    );
    expect(slasher.requestSlash(subject, BigInt(1), 1000)).toEqual({slashIndex: 0, timestamp: 1660});
    expect(slasher.requestSlash(subject, BigInt(1), 1659)).toEqual({slashIndex: 1, timestamp: 1660});
  });

  it("should reject a zero amount and an unknown subject", () => {
    expect(slasher.requestSlash(subject, BigInt(0), 1500)).toEqual(Err({reason: RejectionReason.INSUFFICIENT_SLASH}));
    expect(slasher.requestSlash(otherSubject, BigInt(10), 1500)).toEqual(
      Err({reason: RejectionReason.UNKNOWN_SUBJECT})
    );
    expect(slasher.slashRequestsLength).toBe(0);
  });

  it("should execute after the veto period and checkpoint at execution time", () => {
    slasher.requestSlash(subject, BigInt(150_000), 1000);

    expect(slasher.executeSlash(subject, 0)).toEqual(Err({reason: RejectionReason.VETO_PERIOD_NOT_ENDED}));

    slasher.clock.advance(180);
    // amount was capped to the slashable stake at request time
    expect(slasher.executeSlash(subject, 0)).toEqual({slashedAmount: capacity, timestamp: 1840});
    expect(slasher.cumulativeSlash(subject)).toBe(capacity);
    expect(slasher.cumulativeSlashAt(subject, 1839)).toBe(BigInt(0));
    expect(slasher.cumulativeSlashAt(subject, 1840)).toBe(capacity);

    expect(slasher.executeSlash(subject, 0)).toEqual(Err({reason: RejectionReason.SLASH_REQUEST_COMPLETED}));
  });

  it("should have no slashable stake left after a full slash", () => {
    slasher.requestSlash(subject, capacity, 1500);
    slasher.clock.advance(180);
    slasher.executeSlash(subject, 0);

    expect(slasher.slashableStake(subject, 1501)).toBe(BigInt(0));
    expect(slasher.requestSlash(subject, BigInt(1), 1501)).toEqual(Err({reason: RejectionReason.INSUFFICIENT_SLASH}));
  });

  it("should reject executing a capture older than the latest slashed one", () => {
    slasher.requestSlash(subject, BigInt(10), 1100);
    slasher.requestSlash(subject, BigInt(10), 1200);
    slasher.clock.advance(180);

    expect(slasher.executeSlash(subject, 1)).toEqual({slashedAmount: BigInt(10), timestamp: 1840});
    expect(slasher.slashableStake(subject, 1100)).toBe(BigInt(0));
    expect(slasher.executeSlash(subject, 0)).toEqual(Err({reason: RejectionReason.OUTDATED_CAPTURE_TIMESTAMP}));
  });

  it("should reject executing an expired request", () => {
    slasher.requestSlash(subject, BigInt(10), 1001);
    // 1842 - 1001 > 840
    slasher.clock.advance(182);

    expect(slasher.slashableStake(subject, 1001)).toBe(BigInt(0));
    expect(slasher.executeSlash(subject, 0)).toEqual(Err({reason: RejectionReason.SLASH_PERIOD_ENDED}));
  });

  it("should reject unknown slash indexes", () => {
    for (const slashIndex of [0, -1, 1.5]) {
      const result = slasher.executeSlash(subject, slashIndex);
      expect(isErr(result) && result.error.reason).toBe(RejectionReason.SLASH_REQUEST_NOT_EXIST);
    }
  });

  it("should only move the clock forward", async () => {
    await slasher.advanceTime(0);
    expect(await slasher.currentTime()).toBe(1660);
    await expect(slasher.advanceTime(-1)).rejects.toThrow(VetoSlasherError);
  });

  it("should serve the same values through the async interface", async () => {
    const receipt = await slasher.submitRequest(subject, BigInt(40), 1300);
    expect(receipt).toEqual({slashIndex: 0, timestamp: 1660});
    await slasher.advanceTime(180);
    expect(await slasher.submitExecution(subject, 0)).toEqual({slashedAmount: BigInt(40), timestamp: 1840});
    expect(await slasher.queryCumulativeSlash(subject)).toBe(BigInt(40));
    expect(await slasher.queryCumulativeSlashAt(subject, 1840)).toBe(BigInt(40));
    expect(await slasher.queryStakeAt(subject, 1300)).toBe(capacity);
    expect(await slasher.querySlashable(subject, 1300)).toBe(capacity - BigInt(40));
  });

  it("should reject a veto duration not lower than the epoch", () => {
    expect(() => createVetoSlasher({...minimalPreset, VETO_DURATION: 840}, subject, genesisTime)).toThrow(
      VetoSlasherError
    );
  });
});
