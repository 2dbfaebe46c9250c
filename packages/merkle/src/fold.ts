import {MerkleTreeError, MerkleTreeErrorCode} from "./errors.js";
import {HashAlgorithm} from "./hasher/index.js";
import {MerkleNode} from "./node.js";

export type FoldResult<A extends string> = {
  root: MerkleNode<A>;
  /** Node count of each level, from the leaves up to the root */
  levelSizes: number[];
};

/**
 * Pair nodes left to right into parents. An odd trailing node is carried to the next level
 * as the same object, without rehashing.
 */
export function foldLevel<A extends string>(level: MerkleNode<A>[], algorithm: HashAlgorithm<A>): MerkleNode<A>[] {
  const next: MerkleNode<A>[] = [];
  for (let i = 0; i + 1 < level.length; i += 2) {
    next.push(MerkleNode.internal(level[i], level[i + 1], algorithm));
  }
  if (level.length % 2 === 1) {
    next.push(level[level.length - 1]);
  }
  return next;
}

/**
 * Fold levels until a single node remains. ceil(log2(leaves.length)) rounds, a single leaf is its own root.
 */
export function buildTree<A extends string>(leaves: MerkleNode<A>[], algorithm: HashAlgorithm<A>): FoldResult<A> {
  if (leaves.length === 0) {
    throw new MerkleTreeError({code: MerkleTreeErrorCode.EMPTY_INPUT}, "Cannot build a tree from empty input");
  }

  const levelSizes = [leaves.length];
  let level = leaves;
  while (level.length > 1) {
    level = foldLevel(level, algorithm);
    levelSizes.push(level.length);
  }

  return {root: level[0], levelSizes};
}
