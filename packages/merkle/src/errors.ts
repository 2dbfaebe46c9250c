import {ChunktreeError} from "@chunktree/utils";

export enum MerkleTreeErrorCode {
  /** Chunk size is not a positive integer, or the hash algorithm is unknown */
  INVALID_CONFIGURATION = "MERKLE_TREE_ERROR_INVALID_CONFIGURATION",
  /** The input stream produced zero bytes */
  EMPTY_INPUT = "MERKLE_TREE_ERROR_EMPTY_INPUT",
  /** Reading the input failed */
  IO_FAILURE = "MERKLE_TREE_ERROR_IO_FAILURE",
  /** A hash primitive returned a digest whose length differs from its declared size */
  ALGORITHM_MISMATCH = "MERKLE_TREE_ERROR_ALGORITHM_MISMATCH",
  PARENT_ALREADY_SET = "MERKLE_TREE_ERROR_PARENT_ALREADY_SET",
  INVALID_NODE_CHILDREN = "MERKLE_TREE_ERROR_INVALID_NODE_CHILDREN",
}

export type MerkleTreeErrorType =
  | {code: MerkleTreeErrorCode.INVALID_CONFIGURATION; reason: string}
  | {code: MerkleTreeErrorCode.EMPTY_INPUT}
  | {code: MerkleTreeErrorCode.IO_FAILURE; source: string; offset: number}
  | {code: MerkleTreeErrorCode.ALGORITHM_MISMATCH; algorithm: string; expectedSize: number; actualSize: number}
  | {code: MerkleTreeErrorCode.PARENT_ALREADY_SET; chunkOffset: number; chunkSize: number}
  | {code: MerkleTreeErrorCode.INVALID_NODE_CHILDREN; reason: string};

export class MerkleTreeError extends ChunktreeError<MerkleTreeErrorType> {}

export function ioFailureError(source: string, offset: number, cause: unknown): MerkleTreeError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new MerkleTreeError(
    {code: MerkleTreeErrorCode.IO_FAILURE, source, offset},
    `Error reading ${source} at offset ${offset}: ${reason}`,
    {cause}
  );
}
