// Must not use `* as yargs`, see https://github.com/yargs/yargs/issues/1131
import yargs from "yargs";
import type {Argv} from "yargs";
import {hideBin} from "yargs/helpers";
import {registerCommandToYargs} from "@chunktree/utils";
import {cmds} from "./cmds/index.js";
import {globalOptions, rcConfigOption} from "./options/index.js";

const topBanner = "chunktree: binary hash trees over chunked byte streams";

/**
 * Common factory for running the CLI and running tests against it
 */
export function getChunktreeCli(args: string[] = hideBin(process.argv)): Argv {
  const chunktree = yargs(args)
    .env("CHUNKTREE")
    .parserConfiguration({
      // dot-notation breaks strictOptions()
      "dot-notation": false,
    })
    .options(globalOptions)
    .scriptName("chunktree")
    .demandCommand(1)
    // Control show help behaviour below on .fail()
    .showHelpOnFail(false)
    .usage(topBanner)
    .alias("h", "help")
    .recommendCommands();

  for (const cmd of cmds) {
    registerCommandToYargs(chunktree, cmd);
  }

  // throw an error if we see an unrecognized cmd
  chunktree.recommendCommands().strict();
  chunktree.config(...rcConfigOption);

  return chunktree;
}
