import fs from "node:fs";
import {ioFailureError} from "./errors.js";

/**
 * Sequential byte source. `read` fills the start of `target` and returns how many bytes it wrote,
 * which may be fewer than asked for before the end of input. It returns 0 only at end of input.
 */
export interface ByteReader {
  /** Name used in error metadata, such as a file path */
  readonly source: string;
  read(target: Uint8Array): number;
}

/** Reads from an in-memory byte array */
export class BufferReader implements ByteReader {
  readonly source = "buffer";
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  read(target: Uint8Array): number {
    const count = Math.min(target.length, this.bytes.length - this.offset);
    target.set(this.bytes.subarray(this.offset, this.offset + count));
    this.offset += count;
    return count;
  }
}

/** Reads a file synchronously through its descriptor, must be closed after use */
export class FileReader implements ByteReader {
  private position = 0;
  private closed = false;

  private constructor(
    readonly source: string,
    private readonly fd: number
  ) {}

  static open(filepath: string): FileReader {
    try {
      return new FileReader(filepath, fs.openSync(filepath, "r"));
    } catch (e) {
      throw ioFailureError(filepath, 0, e);
    }
  }

  read(target: Uint8Array): number {
    if (this.closed) {
      throw Error(`Reader for ${this.source} is closed`);
    }
    const count = fs.readSync(this.fd, target, 0, target.length, this.position);
    this.position += count;
    return count;
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      fs.closeSync(this.fd);
    }
  }
}
