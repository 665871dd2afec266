import type {SlashingParams} from "@slashwatch/params";
import type {SlashSubject, SlashingSystem} from "@slashwatch/types";
import type {Logger, Prng} from "@slashwatch/utils";
import type {CapacityOracle} from "../capacity.js";
import type {EventSink} from "../driver/sink.js";
import type {Stats} from "../driver/stats.js";
import type {StepRecord} from "../driver/trace.js";
import type {ShadowLedger} from "../ledger/index.js";

export enum ActionName {
  requestSlash = "request_slash",
  executeSlash = "execute_slash",
}

export const actionNames: readonly ActionName[] = [ActionName.requestSlash, ActionName.executeSlash];

export type ActionOutcome = "success" | "failure" | "skipped";

/**
 * Everything an action reads or mutates, owned by one sequence
 */
export type ActionContext = {
  sequence: number;
  flow: number;
  system: SlashingSystem;
  subject: SlashSubject;
  ledger: ShadowLedger;
  oracle: CapacityOracle;
  params: SlashingParams;
  rng: Prng;
  stats: Stats;
  /** Record of the running step, actions add the parameters they chose */
  step: StepRecord;
  sink: EventSink;
  logger: Logger;
};

export type Action = (ctx: ActionContext) => Promise<ActionOutcome>;
