import type {Options, Argv} from "yargs";

export interface CliExample {
  command: string;
  description?: string;
}

export interface CliOptionDefinition<T = unknown> extends Options {
  example?: CliExample;
  // Ensure `type` property matches type of `T`
  type: T extends string
    ? "string"
    : T extends number
      ? "number"
      : T extends boolean
        ? "boolean"
        : T extends Array<unknown>
          ? "array"
          : never;
}

export type CliCommandOptions<OwnArgs> = Required<{
  [K in keyof OwnArgs]: undefined extends OwnArgs[K]
    ? CliOptionDefinition<OwnArgs[K]>
    : // If arg cannot be undefined it must specify a default value or be provided by the user
      CliOptionDefinition<OwnArgs[K]> & (Required<Pick<Options, "default">> | {demandOption: true});
}>;

export interface CliCommand<OwnArgs = Record<never, never>, ParentArgs = Record<never, never>, R = void> {
  command: string;
  describe: string;
  examples?: CliExample[];
  options?: CliCommandOptions<OwnArgs>;
  // 1st arg: free own sub command options
  // 2nd arg: subcommand parent options is = to this command options + parent options
  subcommands?: CliCommand<object, OwnArgs & ParentArgs>[];
  handler?(args: OwnArgs & ParentArgs): Promise<R>;
}

/**
 * Register a CliCommand type to yargs. Recursively registers subcommands too.
 */
export function registerCommandToYargs(yargs: Argv, cliCommand: CliCommand<Record<never, never>, Record<never, never>>): void {
  yargs.command({
    command: cliCommand.command,
    describe: cliCommand.describe,
    builder: (yargsBuilder) => {
      yargsBuilder.options(cliCommand.options ?? {});
      for (const subcommand of cliCommand.subcommands ?? []) {
        registerCommandToYargs(yargsBuilder, subcommand);
      }
      if (cliCommand.examples) {
        for (const example of cliCommand.examples) {
          yargsBuilder.example(`$0 ${example.command}`, example.description ?? "");
        }
      }
      return yargs;
    },
    handler: (args) => (cliCommand.handler ? cliCommand.handler(args) : undefined),
  });
}
