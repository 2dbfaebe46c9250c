import {CliCommand, formatBytes} from "@chunktree/utils";
import {getHashAlgorithm} from "@chunktree/merkle";
import {GlobalArgs} from "../options/index.js";
import {InputArgs, describeInput, getCliLogger, readInputBytes, resolveInput} from "../util/index.js";

/* eslint-disable no-console */

type DigestArgs = InputArgs;

export const digest: CliCommand<DigestArgs, GlobalArgs, string> = {
  command: "digest [text]",
  describe: "Print the digest of the whole input, without chunking",
  examples: [
    {command: 'digest "hello world"', description: "Digest a string with the default algorithm"},
    {command: "digest --file ./data.bin --algorithm blake2b256", description: "Digest a file with blake2b"},
  ],
  options: {
    text: {
      description: "Input text, read from stdin if neither text nor --file is given",
      type: "string",
    },
    file: {
      description: "Input file path",
      type: "string",
    },
  },
  handler: async (args) => {
    const hex = await digestHandler(args);
    console.log(hex);
    return hex;
  },
};

export async function digestHandler(args: DigestArgs & GlobalArgs, stdin?: AsyncIterable<Uint8Array>): Promise<string> {
  const logger = getCliLogger(args).child({module: "digest"});
  const algorithm = getHashAlgorithm(args.algorithm);
  const input = resolveInput(args);

  const bytes = await readInputBytes(input, stdin);
  const hex = algorithm.hash(bytes).hexDigest();
  logger.verbose("Hashed input", {source: describeInput(input), size: formatBytes(bytes.length), algorithm: algorithm.name});
  return hex;
}
