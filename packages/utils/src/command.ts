import type {Argv, Options} from "yargs";

export type CliExample = {
  command: string;
  description: string;
};

type OptionType<T> = T extends string
  ? "string"
  : T extends number
    ? "number"
    : T extends boolean
      ? "boolean"
      : T extends unknown[]
        ? "array"
        : never;

/** yargs option whose `type` agrees with the arg it fills */
export type CliOption<T> = Options & {type: OptionType<T>};

/**
 * One option per arg. An arg that is never undefined has a default or must be given by the user.
 */
export type CliCommandOptions<Args> = Required<{
  [K in keyof Args]: undefined extends Args[K]
    ? CliOption<Args[K]>
    : CliOption<Args[K]> & ({default: Args[K]} | {demandOption: true});
}>;

export type CliCommand<Args, GlobalArgs, R> = {
  command: string;
  describe: string;
  examples: CliExample[];
  options: CliCommandOptions<Args>;
  handler: (args: Args & GlobalArgs) => Promise<R>;
};

/**
 * Add a command with its options and usage examples to `yargs`
 */
// biome-ignore lint/suspicious/noExplicitAny: yargs hands every command untyped args, each command declares its own
export function registerCommandToYargs(yargs: Argv, cliCommand: CliCommand<any, any, unknown>): void {
  yargs.command({
    command: cliCommand.command,
    describe: cliCommand.describe,
    builder: (commandYargs) => {
      commandYargs.options(cliCommand.options);
      for (const {command, description} of cliCommand.examples) {
        commandYargs.example(`$0 ${command}`, description);
      }
      return commandYargs;
    },
    handler: async (args) => {
      await cliCommand.handler(args);
    },
  });
}
