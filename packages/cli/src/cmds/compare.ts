import {CliCommand} from "@chunktree/utils";
import {GlobalArgs} from "../options/index.js";
import {InputSource, buildInputTree, getCliLogger} from "../util/index.js";

/* eslint-disable no-console */

type CompareArgs = {
  a: string;
  b: string;
  text?: boolean;
};

export const compare: CliCommand<CompareArgs, GlobalArgs, boolean> = {
  command: "compare",
  describe: "Compare the hash trees of two inputs, exits with code 1 when they differ",
  examples: [
    {command: "compare --a ./v1.bin --b ./v2.bin", description: "Compare two files"},
    {command: 'compare --text --a "hello world" --b "hello worlb" --chunkSize 1', description: "Compare two strings"},
  ],
  options: {
    a: {
      description: "First input, a file path unless --text is set",
      type: "string",
      demandOption: true,
    },
    b: {
      description: "Second input, a file path unless --text is set",
      type: "string",
      demandOption: true,
    },
    text: {
      description: "Treat --a and --b as literal text",
      type: "boolean",
    },
  },
  handler: async (args) => {
    const equal = await compareHandler(args);
    console.log(equal ? "equal" : "different");
    if (!equal) {
      process.exitCode = 1;
    }
    return equal;
  },
};

export async function compareHandler(args: CompareArgs & GlobalArgs): Promise<boolean> {
  const logger = getCliLogger(args).child({module: "compare"});
  const toInput = (value: string): InputSource => (args.text ? {kind: "text", text: value} : {kind: "file", filepath: value});
  const opts = {chunkSize: args.chunkSize, algorithm: args.algorithm, logger: logger.child({module: "tree"})};

  const treeA = await buildInputTree(toInput(args.a), opts);
  const treeB = await buildInputTree(toInput(args.b), opts);
  const equal = treeA.equals(treeB);

  logger.verbose("Compared trees", {
    a: treeA.rootDigest.hexDigest(),
    b: treeB.rootDigest.hexDigest(),
    equal,
  });
  return equal;
}
