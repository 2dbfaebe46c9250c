import {describe, it, expect} from "vitest";
import {
  BufferReader,
  ByteReader,
  HashAlgorithm,
  MerkleNode,
  MerkleTreeError,
  MerkleTreeErrorCode,
  generateLeaves,
  generateLeavesFromStream,
  sha256,
} from "../../src/index.js";

const encoder = new TextEncoder();

/** Returns at most `maxRead` bytes per call, like a pipe or socket would */
class TrickleReader implements ByteReader {
  readonly source = "trickle";
  private readonly inner: BufferReader;

  constructor(
    bytes: Uint8Array,
    private readonly maxRead: number
  ) {
    this.inner = new BufferReader(bytes);
  }

  read(target: Uint8Array): number {
    return this.inner.read(target.subarray(0, this.maxRead));
  }
}

function ranges(leaves: MerkleNode[]): [number, number][] {
  return leaves.map((leaf) => [leaf.data.chunkOffset, leaf.data.chunkSize]);
}

async function* chunked(bytes: Uint8Array, sizes: number[]): AsyncGenerator<Uint8Array> {
  let offset = 0;
  for (const size of sizes) {
    yield bytes.subarray(offset, offset + size);
    offset += size;
  }
}

describe("leaf generation", () => {
  const input = encoder.encode("hello world");

  it("should cover the input with contiguous windows", () => {
    const leaves = generateLeaves(new BufferReader(input), 4, sha256);
    expect(ranges(leaves)).toEqual([
      [0, 4],
      [4, 4],
      [8, 3],
    ]);
    expect(leaves[0].data.digest.equals(sha256.hash(encoder.encode("hell")))).toBe(true);
    expect(leaves[2].data.digest.equals(sha256.hash(encoder.encode("rld")))).toBe(true);
    for (const leaf of leaves) {
      expect(leaf).toBeValidMerkleNode(sha256);
    }
  });

  it("should not emit an empty trailing leaf on an exact multiple", () => {
    const leaves = generateLeaves(new BufferReader(encoder.encode("abcdef")), 3, sha256);
    expect(ranges(leaves)).toEqual([
      [0, 3],
      [3, 3],
    ]);
  });

  it("should emit a single short leaf when the input is smaller than a chunk", () => {
    expect(ranges(generateLeaves(new BufferReader(input), 1024, sha256))).toEqual([[0, 11]]);
  });

  it("should emit no leaf for empty input", () => {
    expect(generateLeaves(new BufferReader(new Uint8Array(0)), 4, sha256)).toEqual([]);
  });

  it("should refill windows on short reads", () => {
    const expected = generateLeaves(new BufferReader(input), 4, sha256);
    const leaves = generateLeaves(new TrickleReader(input, 3), 4, sha256);
    expect(ranges(leaves)).toEqual(ranges(expected));
    expect(leaves.map((leaf) => leaf.data.digest.hexDigest())).toEqual(
      expected.map((leaf) => leaf.data.digest.hexDigest())
    );
  });

  for (const chunkSize of [0, -1, 1.5, Number.NaN]) {
    it(`should reject chunk size ${chunkSize}`, () => {
      expect(() => generateLeaves(new BufferReader(input), chunkSize, sha256)).toThrow(
        `chunkSize must be a positive integer, got ${chunkSize}`
      );
    });
  }

  it("should wrap reader failures with the failing offset", () => {
    const cause = new Error("disk on fire");
    let calls = 0;
    const reader: ByteReader = {
      source: "flaky",
      read(target) {
        if (calls++ > 0) throw cause;
        target.set(encoder.encode("abcd"));
        return 4;
      },
    };

    try {
      generateLeaves(reader, 4, sha256);
      expect.unreachable("should throw");
    } catch (e) {
      expect(e).toBeInstanceOf(MerkleTreeError);
      if (e instanceof MerkleTreeError) {
        expect(e.type).toEqual({code: MerkleTreeErrorCode.IO_FAILURE, source: "flaky", offset: 4});
        expect(e.message).toBe("Error reading flaky at offset 4: disk on fire");
        expect(e.cause).toBe(cause);
      }
    }
  });

  it("should reject a reader returning more bytes than asked", () => {
    const reader: ByteReader = {source: "liar", read: (target) => target.length + 1};
    expect(() => generateLeaves(reader, 4, sha256)).toThrow("Reader for liar returned an invalid byte count 5");
  });

  describe("from async source", () => {
    it("should regroup uneven buffers into the same leaves", async () => {
      const expected = generateLeaves(new BufferReader(input), 4, sha256);
      const leaves = await generateLeavesFromStream(chunked(input, [1, 5, 0, 2, 3]), 4, sha256);
      expect(ranges(leaves)).toEqual(ranges(expected));
      expect(leaves.map((leaf) => leaf.data.digest.hexDigest())).toEqual(
        expected.map((leaf) => leaf.data.digest.hexDigest())
      );
    });

    it("should emit no leaf for an empty source", async () => {
      expect(await generateLeavesFromStream(chunked(input, []), 4, sha256)).toEqual([]);
    });

    it("should wrap source failures", async () => {
      async function* failing(): AsyncGenerator<Uint8Array> {
        yield encoder.encode("abcdef");
        throw Error("connection reset");
      }

      await expect(generateLeavesFromStream(failing(), 4, sha256, "socket")).rejects.toThrow(
        "Error reading socket at offset 6: connection reset"
      );
    });

    it("should close the source when hashing fails", async () => {
      let closed = false;
      async function* source(): AsyncGenerator<Uint8Array> {
        try {
          yield encoder.encode("abcd");
          yield encoder.encode("efgh");
          yield encoder.encode("ijkl");
        } finally {
          closed = true;
        }
      }

      let hashCalls = 0;
      const failingSecondHash: HashAlgorithm<"sha256"> = {
        name: "sha256",
        digestSize: 32,
        hash: (data) => {
          if (++hashCalls > 1) throw Error("hash unavailable");
          return sha256.hash(data);
        },
      };

      await expect(generateLeavesFromStream(source(), 4, failingSecondHash)).rejects.toThrow("hash unavailable");
      expect(hashCalls).toBe(2);
      expect(closed).toBe(true);
    });
  });
});
