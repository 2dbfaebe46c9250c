import {MerkleTreeError, MerkleTreeErrorCode} from "../errors.js";
import {HashAlgorithm} from "./interface.js";
import {blake2b256, sha384, sha512} from "./noble.js";
import {sha256} from "./sha256.js";

export type {DigestFn, HashAlgorithm} from "./interface.js";
export {assertValidHashAlgorithm, createHashAlgorithm} from "./create.js";
export type {HashAlgorithmOpts} from "./create.js";
export {sha256} from "./sha256.js";
export {sha384, sha512, blake2b256} from "./noble.js";

export const hashAlgorithmNames = ["sha256", "sha384", "sha512", "blake2b256"] as const;
export type HashAlgorithmName = (typeof hashAlgorithmNames)[number];

const hashAlgorithms: {[N in HashAlgorithmName]: HashAlgorithm<N>} = {
  sha256,
  sha384,
  sha512,
  blake2b256,
};

export function isHashAlgorithmName(name: string): name is HashAlgorithmName {
  return hashAlgorithmNames.some((algorithmName) => algorithmName === name);
}

export function getHashAlgorithm(name: string): HashAlgorithm {
  if (!isHashAlgorithmName(name)) {
    const reason = `Unknown hash algorithm '${name}', expected one of ${hashAlgorithmNames.join(", ")}`;
    throw new MerkleTreeError({code: MerkleTreeErrorCode.INVALID_CONFIGURATION, reason}, reason);
  }
  return hashAlgorithms[name];
}
