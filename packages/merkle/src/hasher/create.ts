import {Digest} from "../digest.js";
import {MerkleTreeError, MerkleTreeErrorCode} from "../errors.js";
import {DigestFn, HashAlgorithm} from "./interface.js";

export type HashAlgorithmOpts<A extends string> = {
  name: A;
  digestSize: number;
  digest: DigestFn;
};

/**
 * Wrap a raw digest primitive as a `HashAlgorithm`.
 *
 * The primitive is probed once with empty input; a digest of the wrong length throws
 * `ALGORITHM_MISMATCH` here instead of on every hash call.
 */
export function createHashAlgorithm<A extends string>({name, digestSize, digest}: HashAlgorithmOpts<A>): HashAlgorithm<A> {
  if (!Number.isSafeInteger(digestSize) || digestSize <= 0) {
    const reason = `digestSize of ${name} must be a positive integer, got ${digestSize}`;
    throw new MerkleTreeError({code: MerkleTreeErrorCode.INVALID_CONFIGURATION, reason}, reason);
  }

  assertDigestSize(name, digestSize, digest(new Uint8Array(0)).length);

  return {
    name,
    digestSize,
    hash: (data) => new Digest(name, digest(data)),
  };
}

/**
 * Hash empty input once and check the digest length against `digestSize`, for algorithms
 * that did not come from `createHashAlgorithm`
 */
export function assertValidHashAlgorithm(algorithm: HashAlgorithm): void {
  assertDigestSize(algorithm.name, algorithm.digestSize, algorithm.hash(new Uint8Array(0)).length);
}

function assertDigestSize(name: string, digestSize: number, actualSize: number): void {
  if (actualSize !== digestSize) {
    throw new MerkleTreeError(
      {code: MerkleTreeErrorCode.ALGORITHM_MISMATCH, algorithm: name, expectedSize: digestSize, actualSize},
      `${name} returned a ${actualSize} byte digest, expected ${digestSize}`
    );
  }
}
