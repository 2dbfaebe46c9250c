export enum LogLevel {
  error = "error",
  warn = "warn",
  info = "info",
  verbose = "verbose",
  debug = "debug",
}

/** Most severe first */
export const LogLevels = Object.values(LogLevel);

/** Bytes are rendered as 0x-prefixed hex */
export type LogValue = string | number | boolean | Uint8Array | null | undefined;

/** Flat key-value context attached to a log entry */
export type LogData = Record<string, LogValue>;

export type LogHandler = (message: string, context?: LogData, error?: Error) => void;

/**
 * What the tree and the commands log through. Implemented by `@chunktree/logger`,
 * tests pass any object of this shape.
 */
export type Logger = {[L in LogLevel]: LogHandler};
