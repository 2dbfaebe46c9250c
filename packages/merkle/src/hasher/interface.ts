import type {Digest} from "../digest.js";

/** Raw one-shot digest primitive, as exported by hashing libraries */
export type DigestFn = (data: Uint8Array) => Uint8Array;

export type HashAlgorithm<A extends string = string> = {
  readonly name: A;
  /** Length in bytes of every digest this algorithm produces */
  readonly digestSize: number;
  /** Pure and deterministic, defined for empty input */
  hash(data: Uint8Array): Digest<A>;
};
