import type {ActionName, ActionOutcome} from "../actions/interface.js";

export type StepParams = Record<string, string | number | boolean>;

export type StepRecord = {
  flow: number;
  action: ActionName;
  params: StepParams;
  outcome: ActionOutcome | null;
};

/**
 * Ordered record of every step of a sequence, enough to replay it
 */
export class SequenceTrace {
  private readonly records: StepRecord[] = [];

  get steps(): readonly StepRecord[] {
    return this.records;
  }

  begin(flow: number, action: ActionName): StepRecord {
    const step: StepRecord = {flow, action, params: {}, outcome: null};
    this.records.push(step);
    return step;
  }
}

export function formatStep(step: StepRecord): string {
  const params = Object.entries(step.params)
    .map(([key, value]) => `${key}=${value}`)
    .join(" ");
  return `#${step.flow} ${step.action} ${step.outcome ?? "aborted"}${params ? " " + params : ""}`;
}
