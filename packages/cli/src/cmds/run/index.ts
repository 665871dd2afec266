import {CliCommand} from "@slashwatch/utils";
import {GlobalArgs} from "../../options/index.js";
import {runHandler} from "./handler.js";
import {RunArgs, runOptions} from "./options.js";

export const run: CliCommand<RunArgs, GlobalArgs> = {
  command: "run",
  describe: "Run seeded random slashing sequences against the in-memory veto slasher",
  examples: [
    {
      command: "run --preset minimal --sequences 4 --flows 1000 --concurrency 4",
      description: "Run 4 short sequences at once with the minimal preset",
    },
    {
      command: "run --seed 7 --only 2 --flows 120 --logLevel debug",
      description: "Replay the first 120 flows of sequence 2 of the run seeded 7",
    },
  ],
  options: runOptions,
  handler: runHandler,
};
