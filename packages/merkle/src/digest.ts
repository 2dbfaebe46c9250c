import {byteArrayEquals, compareBytes, concatBytes, toHex} from "@chunktree/utils";

/**
 * Fixed-length output of a hash algorithm.
 *
 * The type parameter carries the algorithm name, so digests of different algorithms are not
 * interchangeable at compile time. At runtime `equals` also checks the name.
 */
export class Digest<A extends string = string> {
  private readonly raw: Uint8Array;

  constructor(
    readonly algorithm: A,
    bytes: Uint8Array
  ) {
    this.raw = Uint8Array.from(bytes);
  }

  /** A copy of the digest bytes */
  get bytes(): Uint8Array {
    return this.raw.slice();
  }

  get length(): number {
    return this.raw.length;
  }

  /** Lowercase hex, two characters per byte, no prefix */
  hexDigest(): string {
    return toHex(this.raw);
  }

  equals(other: Digest<string>): boolean {
    return this.algorithm === other.algorithm && byteArrayEquals(this.raw, other.raw);
  }

  compare(other: Digest<A>): -1 | 0 | 1 {
    return compareBytes(this.raw, other.raw);
  }

  toString(): string {
    return this.hexDigest();
  }

  static compare<A extends string>(a: Digest<A>, b: Digest<A>): -1 | 0 | 1 {
    return a.compare(b);
  }

  /** Concatenation of both digests' bytes, the pre-image of their parent node */
  static concat<A extends string>(left: Digest<A>, right: Digest<A>): Uint8Array {
    return concatBytes(left.raw, right.raw);
  }
}
