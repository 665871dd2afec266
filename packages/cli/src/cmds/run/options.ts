import {CliCommandOptions} from "@slashwatch/utils";

export type RunArgs = {
  seed?: number;
  sequences: number;
  flows: number;
  concurrency: number;
  only?: number;
  capacity?: string;
  vetoDuration?: number;
  epochDuration?: number;
  warmUp?: number;
  requestWeight?: number;
  executeWeight?: number;
  eventsFile?: string;
};

export const runOptions: CliCommandOptions<RunArgs> = {
  seed: {
    description: "Seed of the run, random if not set. Printed at start and on failure",
    type: "number",
  },

  sequences: {
    description: "Number of independent sequences",
    default: 10,
    type: "number",
  },

  flows: {
    description: "Number of random actions per sequence",
    default: 10_000,
    type: "number",
  },

  concurrency: {
    description: "Number of sequences run at once",
    default: 1,
    type: "number",
  },

  only: {
    description: "Run only the sequence with this index, to replay a failure",
    type: "number",
  },

  capacity: {
    description: "Override NETWORK_CAPACITY, in base units",
    type: "string",
  },

  vetoDuration: {
    description: "Override VETO_DURATION, in seconds",
    type: "number",
  },

  epochDuration: {
    description: "Override EPOCH_DURATION, in seconds",
    type: "number",
  },

  warmUp: {
    description: "Override WARM_UP_DURATION, in seconds",
    type: "number",
  },

  requestWeight: {
    description: "Relative weight of the request slash action",
    type: "number",
  },

  executeWeight: {
    description: "Relative weight of the execute slash action",
    type: "number",
  },

  eventsFile: {
    description: "Write every flow, transaction and outcome to this CSV file",
    type: "string",
  },
};
