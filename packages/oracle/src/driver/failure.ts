import {SlashwatchError, logCtxToString} from "@slashwatch/utils";
import type {ActionName} from "../actions/interface.js";
import {StepRecord, formatStep} from "./trace.js";

export type SequenceFailureErrorType = {
  code: "SEQUENCE_FAILURE";
  /** Seed of the whole run */
  seed: number;
  sequence: number;
  sequenceSeed: number;
  /** Flow the failure happened at, null during setup */
  flow: number | null;
  action: ActionName | null;
};

/**
 * First failure of a sequence, with the steps that led to it
 */
export class SequenceFailureError extends SlashwatchError<SequenceFailureErrorType> {
  constructor(
    type: Omit<SequenceFailureErrorType, "code">,
    readonly violation: Error,
    readonly steps: readonly StepRecord[]
  ) {
    super({code: "SEQUENCE_FAILURE", ...type}, `Sequence ${type.sequence} failed: ${violation.message}`);
  }
}

function formatViolation(violation: Error): string {
  return violation instanceof SlashwatchError ? logCtxToString(violation.getMetadata()) : violation.message;
}

/**
 * Human readable report of a failed sequence and how to replay it
 */
export function formatReproduction(error: SequenceFailureError): string {
  const {seed, sequence, sequenceSeed, flow, action} = error.type;
  const replayFlows = flow === null ? 0 : flow + 1;

  const lines = [
    `Sequence ${sequence} failed at ${flow === null ? "setup" : `flow ${flow} (${action})`}`,
    `  violation: ${formatViolation(error.violation)}`,
    `  seed: ${seed}, sequence seed: ${sequenceSeed}`,
    `  replay: --seed ${seed} --only ${sequence} --flows ${replayFlows}`,
    `Steps (${error.steps.length}):`,
    ...error.steps.map((step) => `  ${formatStep(step)}`),
  ];
  return lines.join("\n");
}
