// Must not use `* as yargs`, see https://github.com/yargs/yargs/issues/1131
import yargs, {Argv} from "yargs";
import {hideBin} from "yargs/helpers";
import {registerCommandToYargs} from "@slashwatch/utils";
import {cmds} from "./cmds/index.js";
import {globalOptions, rcConfigOption} from "./options/index.js";

const topBanner = `slashwatch: shadow ledger fuzz oracle for veto slashing.

Runs seeded random sequences of slash requests and executions and checks every result against an
independent model of the slashing capacity.`;

/**
 * Common factory for running the CLI and testing its parsing. Options can be set with `SLASHWATCH_`
 * prefixed environment variables and supplemented by `--rcConfig`.
 */
export function getSlashwatchCli(args: string[] = hideBin(process.argv)): Argv {
  const slashwatch = yargs(args)
    .env("SLASHWATCH")
    .parserConfiguration({
      // As of yargs v16.1.0 dot-notation breaks strictOptions()
      "dot-notation": false,
    })
    .options(globalOptions)
    .scriptName("slashwatch")
    .demandCommand(1)
    // Control show help behaviour below on .fail()
    .showHelpOnFail(false)
    .usage(topBanner)
    .alias("h", "help")
    .alias("v", "version")
    .recommendCommands();

  for (const cmd of cmds) {
    registerCommandToYargs(slashwatch, cmd);
  }

  // throw an error if we see an unrecognized cmd
  slashwatch.recommendCommands().strict();
  slashwatch.config(...rcConfigOption);

  return slashwatch;
}
