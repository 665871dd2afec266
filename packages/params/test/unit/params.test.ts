import {describe, it, expect} from "vitest";
import {
  ParamsError,
  ParamsErrorCode,
  PresetName,
  SECONDS_PER_DAY,
  captureWindow,
  getSlashingParams,
  mainnetPreset,
  minimalPreset,
} from "../../src/index.js";

describe("getSlashingParams", () => {
  it("should default to mainnet", () => {
    const params = getSlashingParams();
    expect(params).toEqual(mainnetPreset);
    expect(params).not.toBe(mainnetPreset);
    expect(params.NETWORK_CAPACITY).toBe(BigInt("100000000000000000000000"));
    expect(captureWindow(params)).toBe(11 * SECONDS_PER_DAY);
  });

  it("should resolve minimal preset", () => {
    expect(getSlashingParams(PresetName.minimal)).toEqual(minimalPreset);
    expect(captureWindow(minimalPreset)).toBe(660);
  });

  it("should apply overrides and skip undefined ones", () => {
    const params = getSlashingParams("minimal", {NETWORK_CAPACITY: BigInt(50), VETO_DURATION: undefined});
    expect(params).toEqual({...minimalPreset, NETWORK_CAPACITY: BigInt(50)});
  });

  it("should reject an unknown preset", () => {
    try {
      getSlashingParams("gnosis");
      expect.fail("expected to throw");
    } catch (e) {
      expect(e).toBeInstanceOf(ParamsError);
      expect((e as ParamsError).type).toEqual({code: ParamsErrorCode.UNKNOWN_PRESET, preset: "gnosis"});
    }
  });

  const inconsistentCases: {id: string; overrides: Parameters<typeof getSlashingParams>[1]; reason: string}[] = [
    {id: "zero capacity", overrides: {NETWORK_CAPACITY: BigInt(0)}, reason: "NETWORK_CAPACITY must be positive"},
    {id: "fractional veto", overrides: {VETO_DURATION: 1.5}, reason: "VETO_DURATION must be a positive integer"},
    {
      id: "veto as long as epoch",
      overrides: {VETO_DURATION: 840},
      reason: "VETO_DURATION must be lower than EPOCH_DURATION",
    },
    {
      id: "short warm-up",
      overrides: {WARM_UP_DURATION: 659},
      reason: "WARM_UP_DURATION must cover EPOCH_DURATION - VETO_DURATION",
    },
    {id: "bias above 1", overrides: {AMOUNT_EDGE_BIAS: 1.5}, reason: "AMOUNT_EDGE_BIAS must be within [0, 1]"},
    {id: "NaN bias", overrides: {CAPTURE_EDGE_BIAS: NaN}, reason: "CAPTURE_EDGE_BIAS must be within [0, 1]"},
  ];

  for (const {id, overrides, reason} of inconsistentCases) {
    it(`should reject ${id}`, () => {
      expect(() => getSlashingParams(PresetName.minimal, overrides)).toThrow(
        expect.objectContaining({type: {code: ParamsErrorCode.INCONSISTENT, reason}})
      );
    });
  }
});
