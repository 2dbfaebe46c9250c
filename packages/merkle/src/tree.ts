import {Logger, prettyBytes} from "@chunktree/utils";
import {DEFAULT_HASH_ALGORITHM} from "./constants.js";
import {Digest} from "./digest.js";
import {buildTree} from "./fold.js";
import {HashAlgorithm, assertValidHashAlgorithm, getHashAlgorithm} from "./hasher/index.js";
import {assertValidChunkSize, generateLeaves, generateLeavesFromStream} from "./leaves.js";
import {MerkleNode, walkNodes} from "./node.js";
import {BufferReader, ByteReader, FileReader} from "./reader.js";

export type MerkleTreeOpts = {
  /** Bytes per leaf, the last leaf may cover fewer */
  chunkSize: number;
  /** Algorithm or registered algorithm name, defaults to sha256 */
  algorithm?: HashAlgorithm | string;
  logger?: Logger;
};

type ResolvedOpts = {
  chunkSize: number;
  algorithm: HashAlgorithm;
  logger: Logger | null;
};

/**
 * Binary hash tree over a byte stream. The root digest commits to the content and to the chunk layout.
 *
 * A tree is only returned fully built, construction failures throw `MerkleTreeError`.
 */
export class MerkleTree {
  private constructor(
    readonly root: MerkleNode,
    readonly algorithm: HashAlgorithm,
    readonly chunkSize: number,
    /** Node count of each level, from the leaves up to the root */
    readonly levelSizes: readonly number[]
  ) {}

  static fromBytes(data: Uint8Array | string, opts: MerkleTreeOpts): MerkleTree {
    const bytes = typeof data === "string" ? new TextEncoder().encode(data) : data;
    return MerkleTree.fromReader(new BufferReader(bytes), opts);
  }

  static fromReader(reader: ByteReader, opts: MerkleTreeOpts): MerkleTree {
    const resolved = resolveOpts(opts);
    const leaves = generateLeaves(reader, resolved.chunkSize, resolved.algorithm);
    return MerkleTree.fromLeaves(leaves, resolved, reader.source);
  }

  static fromFile(filepath: string, opts: MerkleTreeOpts): MerkleTree {
    const resolved = resolveOpts(opts);
    const reader = FileReader.open(filepath);
    try {
      const leaves = generateLeaves(reader, resolved.chunkSize, resolved.algorithm);
      return MerkleTree.fromLeaves(leaves, resolved, filepath);
    } finally {
      reader.close();
    }
  }

  static async fromStream(source: AsyncIterable<Uint8Array>, opts: MerkleTreeOpts, sourceName = "stream"): Promise<MerkleTree> {
    const resolved = resolveOpts(opts);
    const leaves = await generateLeavesFromStream(source, resolved.chunkSize, resolved.algorithm, sourceName);
    return MerkleTree.fromLeaves(leaves, resolved, sourceName);
  }

  private static fromLeaves(leaves: MerkleNode[], opts: ResolvedOpts, source: string): MerkleTree {
    const {chunkSize, algorithm, logger} = opts;
    logger?.debug("Generated leaves", {source, leaves: leaves.length, chunkSize, algorithm: algorithm.name});

    const {root, levelSizes} = buildTree(leaves, algorithm);
    logger?.debug("Folded tree", {
      source,
      levelSizes: levelSizes.join(","),
      root: prettyBytes(root.data.digest.bytes),
    });

    return new MerkleTree(root, algorithm, chunkSize, levelSizes);
  }

  get rootDigest(): Digest {
    return this.root.data.digest;
  }

  get leafCount(): number {
    return this.levelSizes[0];
  }

  /** Number of folding rounds, 0 for a single leaf */
  get depth(): number {
    return this.levelSizes.length - 1;
  }

  /** Leaves in stream order */
  leaves(): MerkleNode[] {
    const leaves: MerkleNode[] = [];
    for (const node of walkNodes(this.root)) {
      if (node.isLeaf()) leaves.push(node);
    }
    return leaves;
  }

  equals(other: MerkleTree): boolean {
    return this.root.equals(other.root);
  }
}

function resolveOpts(opts: MerkleTreeOpts): ResolvedOpts {
  assertValidChunkSize(opts.chunkSize);

  const algorithm = opts.algorithm ?? DEFAULT_HASH_ALGORITHM;
  if (typeof algorithm !== "string") {
    // Registered algorithms were checked when created
    assertValidHashAlgorithm(algorithm);
  }

  return {
    chunkSize: opts.chunkSize,
    algorithm: typeof algorithm === "string" ? getHashAlgorithm(algorithm) : algorithm,
    logger: opts.logger ?? null,
  };
}
