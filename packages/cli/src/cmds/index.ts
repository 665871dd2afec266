import {CliCommand} from "@slashwatch/utils";
import {GlobalArgs} from "../options/index.js";
import {run} from "./run/index.js";

export const cmds: Required<CliCommand<GlobalArgs, Record<never, never>>>["subcommands"] = [run];
