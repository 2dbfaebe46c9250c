import {MerkleTreeError, MerkleTreeErrorCode, ioFailureError} from "./errors.js";
import {HashAlgorithm} from "./hasher/index.js";
import {MerkleNode} from "./node.js";
import {ByteReader} from "./reader.js";

export function assertValidChunkSize(chunkSize: number): void {
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    const reason = `chunkSize must be a positive integer, got ${chunkSize}`;
    throw new MerkleTreeError({code: MerkleTreeErrorCode.INVALID_CONFIGURATION, reason}, reason);
  }
}

/**
 * Split the reader's bytes into windows of `chunkSize` bytes, the last one possibly shorter,
 * and emit one leaf per non-empty window. An empty input emits no leaf.
 */
export function generateLeaves<A extends string>(
  reader: ByteReader,
  chunkSize: number,
  algorithm: HashAlgorithm<A>
): MerkleNode<A>[] {
  assertValidChunkSize(chunkSize);

  const leaves: MerkleNode<A>[] = [];
  const window = new Uint8Array(chunkSize);
  let chunkOffset = 0;

  for (;;) {
    const filled = fillWindow(reader, window, chunkOffset);
    if (filled === 0) break;

    leaves.push(MerkleNode.leaf({digest: algorithm.hash(window.subarray(0, filled)), chunkOffset, chunkSize: filled}));
    chunkOffset += filled;

    // A short window is only possible at end of input
    if (filled < chunkSize) break;
  }

  return leaves;
}

/**
 * Same windows, offsets and digests as `generateLeaves`, regrouping buffers of any size
 * from an async source such as a Node.js readable stream.
 */
export async function generateLeavesFromStream<A extends string>(
  source: AsyncIterable<Uint8Array>,
  chunkSize: number,
  algorithm: HashAlgorithm<A>,
  sourceName = "stream"
): Promise<MerkleNode<A>[]> {
  assertValidChunkSize(chunkSize);

  const leaves: MerkleNode<A>[] = [];
  const window = new Uint8Array(chunkSize);
  let filled = 0;
  let chunkOffset = 0;

  const iterator = source[Symbol.asyncIterator]();
  // Set once the source is exhausted or has failed, otherwise the source is closed on the way out
  let finished = false;
  try {
    for (;;) {
      let result: IteratorResult<Uint8Array>;
      try {
        result = await iterator.next();
      } catch (e) {
        finished = true;
        throw ioFailureError(sourceName, chunkOffset + filled, e);
      }
      if (result.done) {
        finished = true;
        break;
      }

      const buffer = result.value;
      let position = 0;
      while (position < buffer.length) {
        const count = Math.min(chunkSize - filled, buffer.length - position);
        window.set(buffer.subarray(position, position + count), filled);
        filled += count;
        position += count;

        if (filled === chunkSize) {
          leaves.push(MerkleNode.leaf({digest: algorithm.hash(window), chunkOffset, chunkSize}));
          chunkOffset += chunkSize;
          filled = 0;
        }
      }
    }
  } finally {
    if (!finished) await iterator.return?.();
  }

  if (filled > 0) {
    leaves.push(MerkleNode.leaf({digest: algorithm.hash(window.subarray(0, filled)), chunkOffset, chunkSize: filled}));
  }

  return leaves;
}

/** Read until `window` is full or the reader reaches end of input */
function fillWindow(reader: ByteReader, window: Uint8Array, chunkOffset: number): number {
  let filled = 0;
  while (filled < window.length) {
    let count: number;
    try {
      count = reader.read(window.subarray(filled));
    } catch (e) {
      throw ioFailureError(reader.source, chunkOffset + filled, e);
    }

    if (!Number.isInteger(count) || count < 0 || count > window.length - filled) {
      throw new MerkleTreeError(
        {code: MerkleTreeErrorCode.IO_FAILURE, source: reader.source, offset: chunkOffset + filled},
        `Reader for ${reader.source} returned an invalid byte count ${count}`
      );
    }
    if (count === 0) break;
    filled += count;
  }
  return filled;
}
