import {PresetName} from "@slashwatch/params";
import {CliCommandOptions} from "@slashwatch/utils";
import {readObjectFile} from "../util/file.js";
import {LogArgs, logOptions} from "./logOptions.js";

type GlobalSingleArgs = {
  preset: string;
  paramsFile?: string;
};

const globalSingleOptions: CliCommandOptions<GlobalSingleArgs> = {
  preset: {
    description: "Slashing parameters preset",
    type: "string",
    choices: Object.values(PresetName),
    default: PresetName.mainnet,
  },

  paramsFile: {
    description: "Slashing parameters file (.yml, .yaml or .json) overriding the preset",
    type: "string",
  },
};

export const rcConfigOption: [string, string, (configPath: string) => Record<string, unknown>] = [
  "rcConfig",
  "RC file to supplement command line args, accepted formats: .yml, .yaml, .json",
  (configPath: string): Record<string, unknown> => readObjectFile(configPath),
];

export type GlobalArgs = GlobalSingleArgs & LogArgs;

export const globalOptions = {
  ...globalSingleOptions,
  ...logOptions,
};
