import {Digest} from "./digest.js";
import {MerkleTreeError, MerkleTreeErrorCode} from "./errors.js";
import {HashAlgorithm} from "./hasher/index.js";

export type MerkleNodeData<A extends string = string> = {
  readonly digest: Digest<A>;
  /** Offset of the first covered byte in the input stream */
  readonly chunkOffset: number;
  /** Number of covered bytes */
  readonly chunkSize: number;
};

/**
 * Node of a binary hash tree. A node is either a leaf, with no children, or an internal node
 * with exactly two children whose byte ranges are adjacent.
 *
 * Children are owned by their parent. The back link to the parent is a `WeakRef` so it never
 * keeps a discarded tree alive.
 */
export class MerkleNode<A extends string = string> {
  private parentRef: WeakRef<MerkleNode<A>> | null = null;

  private constructor(
    readonly data: MerkleNodeData<A>,
    readonly left: MerkleNode<A> | null,
    readonly right: MerkleNode<A> | null
  ) {}

  static leaf<A extends string>(data: MerkleNodeData<A>): MerkleNode<A> {
    return new MerkleNode(data, null, null);
  }

  /**
   * Create the parent of two adjacent nodes and attach it to both.
   * digest = hash(left.digest ++ right.digest)
   */
  static internal<A extends string>(
    left: MerkleNode<A>,
    right: MerkleNode<A>,
    algorithm: HashAlgorithm<A>
  ): MerkleNode<A> {
    if (left === right) {
      throw new MerkleTreeError({code: MerkleTreeErrorCode.INVALID_NODE_CHILDREN, reason: "same node on both sides"});
    }
    if (left.data.chunkOffset + left.data.chunkSize !== right.data.chunkOffset) {
      throw new MerkleTreeError({
        code: MerkleTreeErrorCode.INVALID_NODE_CHILDREN,
        reason: `right child at offset ${right.data.chunkOffset} does not follow left child ending at ${
          left.data.chunkOffset + left.data.chunkSize
        }`,
      });
    }
    // Check both before attaching either, a failure must not leave one child half linked
    left.assertNoParent();
    right.assertNoParent();

    const node = new MerkleNode(
      {
        digest: algorithm.hash(Digest.concat(left.data.digest, right.data.digest)),
        chunkOffset: left.data.chunkOffset,
        chunkSize: left.data.chunkSize + right.data.chunkSize,
      },
      left,
      right
    );
    left.parentRef = new WeakRef(node);
    right.parentRef = new WeakRef(node);
    return node;
  }

  get parent(): MerkleNode<A> | null {
    return this.parentRef?.deref() ?? null;
  }

  isRoot(): boolean {
    return this.parent === null;
  }

  isLeaf(): boolean {
    return this.left === null && this.right === null;
  }

  /**
   * Shallow equality: same position kind (root, leaf) and same data triple. Children are not compared.
   *
   * On two roots this compares whole trees, since the root digest commits to every chunk.
   * On non-root nodes it only states that both cover the same range with the same digest.
   */
  equals(other: MerkleNode<string>): boolean {
    return (
      this.isRoot() === other.isRoot() &&
      this.isLeaf() === other.isLeaf() &&
      this.data.digest.equals(other.data.digest) &&
      this.data.chunkOffset === other.data.chunkOffset &&
      this.data.chunkSize === other.data.chunkSize
    );
  }

  private assertNoParent(): void {
    if (this.parent !== null) {
      throw new MerkleTreeError({
        code: MerkleTreeErrorCode.PARENT_ALREADY_SET,
        chunkOffset: this.data.chunkOffset,
        chunkSize: this.data.chunkSize,
      });
    }
  }
}

/**
 * Total order over node data: digest bytes, then chunk offset, then chunk size
 */
export function compareNodeData<A extends string>(a: MerkleNodeData<A>, b: MerkleNodeData<A>): -1 | 0 | 1 {
  const byDigest = Digest.compare(a.digest, b.digest);
  if (byDigest !== 0) return byDigest;
  if (a.chunkOffset !== b.chunkOffset) return a.chunkOffset < b.chunkOffset ? -1 : 1;
  if (a.chunkSize !== b.chunkSize) return a.chunkSize < b.chunkSize ? -1 : 1;
  return 0;
}

/**
 * Pre-order traversal: node, then its left subtree, then its right subtree
 */
export function* walkNodes<A extends string>(root: MerkleNode<A>): Generator<MerkleNode<A>> {
  const stack: MerkleNode<A>[] = [root];
  let node: MerkleNode<A> | undefined;
  while ((node = stack.pop()) !== undefined) {
    yield node;
    if (node.right !== null) stack.push(node.right);
    if (node.left !== null) stack.push(node.left);
  }
}
