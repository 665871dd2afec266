import {randomInt} from "node:crypto";
import {getNodeLogger} from "@slashwatch/logger/node";
import {
  ActionName,
  ActionWeights,
  FuzzOpts,
  MAX_SEED,
  SequenceFailureError,
  formatReproduction,
  runFuzz,
} from "@slashwatch/oracle";
import {SlashingParams, getSlashingParams, paramsFromJson, paramsToJson} from "@slashwatch/params";
import type {SlashSubject} from "@slashwatch/types";
import {createVetoSlasher} from "@slashwatch/veto-slasher";
import {GlobalArgs} from "../../options/index.js";
import {CsvEventSink, YargsError, parseLoggerArgs, readObjectFile} from "../../util/index.js";
import {RunArgs} from "./options.js";

/** Clock time the in-memory slasher of every sequence starts at */
export const GENESIS_TIME = 1_700_000_000;

export const defaultSubject: SlashSubject = {subnetwork: "subnetwork-0", operator: "operator-0"};

/**
 * Preset, then the params file, then the params flags
 */
export function parseSlashingParams(args: Pick<GlobalArgs, "preset" | "paramsFile"> & RunArgs): SlashingParams {
  const overrides: Partial<SlashingParams> =
    args.paramsFile !== undefined ? paramsFromJson(readObjectFile(args.paramsFile)) : {};

  const flags = paramsFromJson({
    NETWORK_CAPACITY: args.capacity,
    VETO_DURATION: args.vetoDuration,
    EPOCH_DURATION: args.epochDuration,
    WARM_UP_DURATION: args.warmUp,
  });

  return getSlashingParams(args.preset, {...overrides, ...flags});
}

export function parseFuzzOpts(args: RunArgs, params: SlashingParams): FuzzOpts {
  const weights: Partial<ActionWeights> = {};
  if (args.requestWeight !== undefined) weights[ActionName.requestSlash] = args.requestWeight;
  if (args.executeWeight !== undefined) weights[ActionName.executeSlash] = args.executeWeight;

  if (args.seed !== undefined && !(Number.isSafeInteger(args.seed) && args.seed >= 0 && args.seed <= MAX_SEED)) {
    throw new YargsError(`--seed must be an integer between 0 and ${MAX_SEED}`);
  }

  return {
    seed: args.seed ?? randomInt(0, MAX_SEED + 1),
    sequences: args.sequences,
    flowsPerSequence: args.flows,
    weights,
    concurrency: args.concurrency,
    only: args.only,
    params,
  };
}

export async function runHandler(args: GlobalArgs & RunArgs): Promise<void> {
  const logger = getNodeLogger(parseLoggerArgs(args));
  const params = parseSlashingParams(args);
  const opts = parseFuzzOpts(args, params);
  const sink = args.eventsFile !== undefined ? new CsvEventSink(args.eventsFile) : undefined;

  logger.info("Slashing params", {preset: args.preset, ...paramsToJson(params)});
  if (sink) logger.info("Writing events", {file: sink.filepath});

  try {
    await runFuzz(opts, {
      createSystem: () => createVetoSlasher(params, defaultSubject, GENESIS_TIME, logger.child({module: "slasher"})),
      subject: defaultSubject,
      logger: logger.child({module: "fuzz"}),
      sink,
    });
  } catch (e) {
    if (e instanceof SequenceFailureError) {
      logger.error(`Fuzz run failed\n${formatReproduction(e)}`);
      process.exitCode = 1;
      return;
    }
    throw e;
  }
}
