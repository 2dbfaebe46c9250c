import {CliCommandOptions} from "@chunktree/utils";
import {DEFAULT_CHUNK_SIZE, DEFAULT_HASH_ALGORITHM, hashAlgorithmNames} from "@chunktree/merkle";
import {readFile} from "../util/file.js";
import {LogArgs, logOptions} from "./logOptions.js";

type GlobalSingleArgs = {
  algorithm: string;
  chunkSize: number;
};

const globalSingleOptions: CliCommandOptions<GlobalSingleArgs> = {
  algorithm: {
    description: "Hash algorithm for leaves and internal nodes",
    type: "string",
    default: DEFAULT_HASH_ALGORITHM,
    choices: hashAlgorithmNames,
  },

  chunkSize: {
    description: "Bytes per leaf, the last leaf may cover fewer",
    type: "number",
    default: DEFAULT_CHUNK_SIZE,
  },
};

export const rcConfigOption: [string, string, (configPath: string) => Record<string, unknown>] = [
  "rcConfig",
  "RC file to supplement command line args, accepted formats: .yml, .yaml, .json",
  (configPath: string): Record<string, unknown> => readFile(configPath),
];

export type GlobalArgs = GlobalSingleArgs & LogArgs;

export const globalOptions = {
  ...globalSingleOptions,
  ...logOptions,
};
