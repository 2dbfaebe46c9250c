import {CliCommand} from "@chunktree/utils";
import {MerkleTree} from "@chunktree/merkle";
import {GlobalArgs} from "../options/index.js";
import {InputArgs, YargsError, buildInputTree, describeInput, getCliLogger, resolveInput} from "../util/index.js";

/* eslint-disable no-console */

export type RootFormat = "text" | "json";
const rootFormats: RootFormat[] = ["text", "json"];

type RootArgs = InputArgs & {
  leaves?: boolean;
  format: string;
};

export type LeafReport = {
  offset: number;
  size: number;
  digest: string;
};

export type RootReport = {
  root: string;
  algorithm: string;
  chunkSize: number;
  leafCount: number;
  levelSizes: number[];
  leaves?: LeafReport[];
};

export const root: CliCommand<RootArgs, GlobalArgs, RootReport> = {
  command: "root [text]",
  describe: "Build the hash tree of the input and print its root",
  examples: [
    {command: 'root "hello world" --chunkSize 4', description: "Root of a three leaf tree"},
    {command: "root --file ./data.bin --leaves --format json", description: "Root and every leaf as JSON"},
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
    leaves: {
      description: "Also print the offset, size and digest of every leaf",
      type: "boolean",
    },
    format: {
      description: "Output format",
      type: "string",
      default: "text",
      choices: rootFormats,
    },
  },
  handler: async (args) => {
    const report = await rootHandler(args);
    console.log(formatRootReport(report, parseRootFormat(args.format)));
    return report;
  },
};

export async function rootHandler(args: RootArgs & GlobalArgs, stdin?: AsyncIterable<Uint8Array>): Promise<RootReport> {
  const logger = getCliLogger(args).child({module: "root"});
  const input = resolveInput(args);
  logger.verbose("Building tree", {source: describeInput(input), chunkSize: args.chunkSize, algorithm: args.algorithm});

  const tree = await buildInputTree(
    input,
    {chunkSize: args.chunkSize, algorithm: args.algorithm, logger: logger.child({module: "tree"})},
    stdin
  );
  return getRootReport(tree, args.leaves ?? false);
}

export function getRootReport(tree: MerkleTree, withLeaves: boolean): RootReport {
  return {
    root: tree.rootDigest.hexDigest(),
    algorithm: tree.algorithm.name,
    chunkSize: tree.chunkSize,
    leafCount: tree.leafCount,
    levelSizes: [...tree.levelSizes],
    leaves: withLeaves
      ? tree.leaves().map((leaf) => ({
          offset: leaf.data.chunkOffset,
          size: leaf.data.chunkSize,
          digest: leaf.data.digest.hexDigest(),
        }))
      : undefined,
  };
}

export function formatRootReport(report: RootReport, format: RootFormat): string {
  if (format === "json") {
    return JSON.stringify(report, null, 2);
  }

  const lines = [
    `root: ${report.root}`,
    `algorithm: ${report.algorithm}`,
    `chunkSize: ${report.chunkSize}`,
    `leaves: ${report.leafCount}`,
    `levels: ${report.levelSizes.join(" -> ")}`,
  ];
  for (const [i, leaf] of (report.leaves ?? []).entries()) {
    lines.push(`leaf ${i}: offset=${leaf.offset} size=${leaf.size} digest=${leaf.digest}`);
  }
  return lines.join("\n");
}

function parseRootFormat(format: string): RootFormat {
  const rootFormat = rootFormats.find((f) => f === format);
  if (rootFormat === undefined) {
    throw new YargsError(`Unknown output format ${format}`);
  }
  return rootFormat;
}
