import type {HashAlgorithmName} from "./hasher/index.js";

export const DEFAULT_CHUNK_SIZE = 1024;
export const DEFAULT_HASH_ALGORITHM: HashAlgorithmName = "sha256";
