import {blake2b} from "@noble/hashes/blake2b";
import {sha384 as nobleSha384, sha512 as nobleSha512} from "@noble/hashes/sha512";
import {createHashAlgorithm} from "./create.js";

export const sha384 = createHashAlgorithm({name: "sha384", digestSize: 48, digest: nobleSha384});

export const sha512 = createHashAlgorithm({name: "sha512", digestSize: 64, digest: nobleSha512});

export const blake2b256 = createHashAlgorithm({
  name: "blake2b256",
  digestSize: 32,
  digest: (data) => blake2b(data, {dkLen: 32}),
});
