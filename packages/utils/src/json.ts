import {toPrefixedHex} from "./bytes.js";
import {ChunktreeError} from "./errors.js";
import {LogData, LogValue} from "./logger.js";

export type JsonValue = string | number | boolean | null | undefined;

function logValueToJson(value: LogValue): JsonValue {
  return value instanceof Uint8Array ? toPrefixedHex(value) : value;
}

export function logCtxToJson(context: LogData): Record<string, JsonValue> {
  return Object.fromEntries(
    Object.entries(context).map(([key, value]): [string, JsonValue] => [key, logValueToJson(value)])
  );
}

/**
 * Render a context as `key=value` pairs joined by ", "
 */
export function logCtxToString(context: LogData): string {
  return Object.entries(context)
    .map(([key, value]) => `${key}=${String(logValueToJson(value))}`)
    .join(", ");
}

/**
 * A `ChunktreeError` is rendered by its metadata, any other error by its message. The stack is kept in both cases.
 */
export function errorToJson(error: Error): Record<string, JsonValue> {
  const json: Record<string, JsonValue> =
    error instanceof ChunktreeError ? {...error.getMetadata()} : {message: error.message};
  if (error.stack) json.stack = error.stack;
  return json;
}

export function errorToString(error: Error): string {
  const summary = error instanceof ChunktreeError ? logCtxToString(error.getMetadata()) : error.message;
  return error.stack ? `${summary}\n${error.stack}` : summary;
}
