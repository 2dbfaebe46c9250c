import fs from "node:fs";
import {MerkleTree, MerkleTreeOpts, ioFailureError} from "@chunktree/merkle";
import {YargsError} from "./errors.js";

export type InputArgs = {
  text?: string;
  file?: string;
};

export type InputSource = {kind: "text"; text: string} | {kind: "file"; filepath: string} | {kind: "stdin"};

/**
 * A positional text argument or `--file`, stdin when neither is given
 */
export function resolveInput(args: InputArgs): InputSource {
  if (args.text !== undefined && args.file !== undefined) {
    throw new YargsError("Provide either a text argument or --file, not both");
  }
  if (args.file !== undefined) return {kind: "file", filepath: args.file};
  if (args.text !== undefined) return {kind: "text", text: args.text};
  return {kind: "stdin"};
}

export function describeInput(input: InputSource): string {
  switch (input.kind) {
    case "text":
      return "text";
    case "file":
      return input.filepath;
    case "stdin":
      return "stdin";
  }
}

export async function buildInputTree(
  input: InputSource,
  opts: MerkleTreeOpts,
  stdin?: AsyncIterable<Uint8Array>
): Promise<MerkleTree> {
  switch (input.kind) {
    case "text":
      return MerkleTree.fromBytes(input.text, opts);
    case "file":
      return MerkleTree.fromFile(input.filepath, opts);
    case "stdin":
      return MerkleTree.fromStream(stdin ?? process.stdin, opts, "stdin");
  }
}

/**
 * Whole input in memory, for single-shot digests
 */
export async function readInputBytes(
  input: InputSource,
  stdin?: AsyncIterable<Uint8Array>
): Promise<Uint8Array> {
  switch (input.kind) {
    case "text":
      return new TextEncoder().encode(input.text);
    case "file":
      try {
        return fs.readFileSync(input.filepath);
      } catch (e) {
        throw ioFailureError(input.filepath, 0, e);
      }
    case "stdin": {
      const source: AsyncIterable<Uint8Array> = stdin ?? process.stdin;
      const buffers: Uint8Array[] = [];
      let length = 0;
      try {
        for await (const buffer of source) {
          buffers.push(buffer);
          length += buffer.length;
        }
      } catch (e) {
        throw ioFailureError("stdin", length, e);
      }
      return Buffer.concat(buffers, length);
    }
  }
}
