// eslint-disable-next-line import/no-extraneous-dependencies, @typescript-eslint/no-unused-vars
import * as vitest from "vitest";

interface CustomMatchers<R = unknown> {
  /**
   * Leaf with a non-empty range, or internal node with two adjacent children whose
   * digests hash to the node digest and whose parent is the node
   */
  toBeValidMerkleNode(algorithm: {hash(data: Uint8Array): {bytes: Uint8Array}}): R;
}

declare module "vitest" {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  interface Assertion<T = any> extends CustomMatchers<T> {}
}
