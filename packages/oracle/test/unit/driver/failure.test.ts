import {describe, it, expect} from "vitest";
import {
  ActionName,
  OracleError,
  OracleErrorCode,
  SequenceFailureError,
  StepRecord,
  createStats,
  formatReproduction,
  formatStats,
  formatStep,
  mergeStats,
  recordOutcome,
} from "../../../src/index.js";

const steps: StepRecord[] = [
  {
    flow: 0,
    action: ActionName.requestSlash,
    params: {now: 1660, captureTime: 1500, amount: "10", slashIndex: 0},
    outcome: "success",
  },
  {flow: 1, action: ActionName.executeSlash, params: {slashIndex: 0, advancedBy: 180, now: 1840}, outcome: null},
];

describe("formatStep", () => {
  it("should print the outcome and every chosen parameter", () => {
    expect(steps.map(formatStep)).toEqual([
      "#0 request_slash success now=1660 captureTime=1500 amount=10 slashIndex=0",
      "#1 execute_slash aborted slashIndex=0 advancedBy=180 now=1840",
    ]);
    expect(formatStep({flow: 2, action: ActionName.executeSlash, params: {}, outcome: "skipped"})).toBe(
      "#2 execute_slash skipped"
    );
  });
});

describe("formatReproduction", () => {
  it("should print the violation and how to replay it", () => {
    const violation = new OracleError({
      code: OracleErrorCode.AMOUNT_MISMATCH,
      slashIndex: 0,
      expected: "10",
      actual: "9",
    });
    const error = new SequenceFailureError(
      {seed: 7, sequence: 2, sequenceSeed: 123, flow: 1, action: ActionName.executeSlash},
      violation,
      steps
    );

    expect(error.message).toBe("Sequence 2 failed: ORACLE_ERROR_AMOUNT_MISMATCH");
    expect(formatReproduction(error).split("\n")).toEqual([
      "Sequence 2 failed at flow 1 (execute_slash)",
      "  violation: code=ORACLE_ERROR_AMOUNT_MISMATCH, slashIndex=0, expected=10, actual=9",
      "  seed: 7, sequence seed: 123",
      "  replay: --seed 7 --only 2 --flows 2",
      "Steps (2):",
      "  #0 request_slash success now=1660 captureTime=1500 amount=10 slashIndex=0",
      "  #1 execute_slash aborted slashIndex=0 advancedBy=180 now=1840",
    ]);
  });

  it("should report failures during setup", () => {
    const error = new SequenceFailureError(
      {seed: 1, sequence: 0, sequenceSeed: 9, flow: null, action: null},
      Error("connection lost"),
      []
    );

    expect(formatReproduction(error).split("\n")).toEqual([
      "Sequence 0 failed at setup",
      "  violation: connection lost",
      "  seed: 1, sequence seed: 9",
      "  replay: --seed 1 --only 0 --flows 0",
      "Steps (0):",
    ]);
  });
});

describe("stats", () => {
  it("should count and merge outcomes", () => {
    const a = createStats();
    expect(recordOutcome(a, ActionName.requestSlash, "success")).toBe(1);
    expect(recordOutcome(a, ActionName.requestSlash, "success")).toBe(2);
    recordOutcome(a, ActionName.executeSlash, "skipped");

    const b = createStats();
    recordOutcome(b, ActionName.executeSlash, "failure");

    expect(formatStats(mergeStats(a, b))).toBe(
      "request_slash: 2 success, 0 failure, 0 skipped; execute_slash: 0 success, 1 failure, 1 skipped"
    );
  });
});
