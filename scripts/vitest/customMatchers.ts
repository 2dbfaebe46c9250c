// eslint-disable-next-line import/no-extraneous-dependencies
import {expect} from "vitest";

type NodeLike = {
  data: {digest: {bytes: Uint8Array}; chunkOffset: number; chunkSize: number};
  left: NodeLike | null;
  right: NodeLike | null;
  parent: NodeLike | null;
};

function isNodeLike(value: unknown): value is NodeLike {
  return typeof value === "object" && value !== null && "data" in value && "left" in value && "right" in value;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

expect.extend({
  toBeValidMerkleNode(received: unknown, algorithm: {hash(data: Uint8Array): {bytes: Uint8Array}}) {
    if (!isNodeLike(received)) {
      return {message: () => "Received value is not a merkle node", pass: false};
    }

    const {left, right, data} = received;
    if (left === null && right === null) {
      return {
        message: () => `Leaf covers ${data.chunkSize} bytes, expected at least one`,
        pass: data.chunkSize > 0,
      };
    }

    if (left === null || right === null) {
      return {message: () => "Internal node must have exactly two children", pass: false};
    }

    if (data.chunkOffset !== left.data.chunkOffset || left.data.chunkOffset + left.data.chunkSize !== right.data.chunkOffset) {
      return {
        message: () =>
          `Children ranges are not adjacent: node offset ${data.chunkOffset}, left ${left.data.chunkOffset}+${left.data.chunkSize}, right ${right.data.chunkOffset}`,
        pass: false,
      };
    }

    if (data.chunkSize !== left.data.chunkSize + right.data.chunkSize) {
      return {
        message: () =>
          `Node size ${data.chunkSize} is not the sum of children sizes ${left.data.chunkSize} + ${right.data.chunkSize}`,
        pass: false,
      };
    }

    const leftBytes = left.data.digest.bytes;
    const rightBytes = right.data.digest.bytes;
    const preimage = new Uint8Array(leftBytes.length + rightBytes.length);
    preimage.set(leftBytes, 0);
    preimage.set(rightBytes, leftBytes.length);
    if (!bytesEqual(algorithm.hash(preimage).bytes, data.digest.bytes)) {
      return {message: () => "Node digest is not the hash of its children digests", pass: false};
    }

    if (left.parent !== received || right.parent !== received) {
      return {message: () => "Children do not link back to the node", pass: false};
    }

    return {message: () => "Merkle node is valid", pass: true};
  },
});
