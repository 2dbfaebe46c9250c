export type ChunktreeErrorMetaData = Record<string, string | number | null>;
export type ChunktreeErrorObject = ChunktreeErrorMetaData & {stack: string};

/**
 * Generic error with attached metadata
 */
export class ChunktreeError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string, options?: {cause?: unknown}) {
    super(message || type.code, options);
    this.type = type;
  }

  getMetadata(): Record<string, string | number | null> {
    return this.type;
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): ChunktreeErrorObject {
    return {
      // Ignore message since it's just type.code
      ...this.getMetadata(),
      stack: this.stack || "",
    };
  }
}
