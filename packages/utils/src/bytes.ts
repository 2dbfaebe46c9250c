const hexByByte: string[] = [];

/**
 * Render bytes as lowercase hex, two characters per byte, without prefix
 */
export function toHex(bytes: Uint8Array): string {
  let hex = "";
  for (const byte of bytes) {
    if (!hexByByte[byte]) {
      hexByByte[byte] = byte < 16 ? "0" + byte.toString(16) : byte.toString(16);
    }
    hex += hexByByte[byte];
  }
  return hex;
}

/**
 * Same as `toHex` with a `0x` prefix, for logs
 */
export function toPrefixedHex(bytes: Uint8Array): string {
  return "0x" + toHex(bytes);
}

/**
 * Lexicographic comparison, a shorter array sorts before any longer array it prefixes
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): -1 | 0 | 1 {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

export function byteArrayEquals(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  let length = 0;
  for (const arr of arrays) length += arr.length;

  const out = new Uint8Array(length);
  let offset = 0;
  for (const arr of arrays) {
    out.set(arr, offset);
    offset += arr.length;
  }
  return out;
}

export function formatBytes(bytes: number): string {
  if (bytes < 0) {
    throw new Error("bytes must be a positive number, got " + bytes);
  }

  if (bytes === 0) {
    return "0 Bytes";
  }

  // size of a kb
  const k = 1024;

  // only support up to GB
  const units = ["Bytes", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), units.length - 1);
  const formattedSize = (bytes / Math.pow(k, i)).toFixed(2);

  return `${formattedSize} ${units[i]}`;
}
