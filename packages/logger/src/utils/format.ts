import winston, {format} from "winston";
import {ChunktreeError, LogData, errorToJson, errorToString, logCtxToJson, logCtxToString} from "@chunktree/utils";
import {LoggerOptions} from "../interface.js";

type Format = ReturnType<typeof winston.format.combine>;

type WinstonInfoArg = {
  level: string;
  message: string;
  module?: string;
  timestamp?: string;
  context?: LogData;
  error?: Error;
};

/** Width of the `[module]` column, the level is right-aligned inside it */
const MODULE_COLUMN_WIDTH = 30;

export function getFormat(opts: LoggerOptions): Format {
  if (opts.format === "json") {
    const timestamp = opts.hideTimestamp ? [] : [format.timestamp()];
    return format.combine(...timestamp, format(toJsonFields)(), format.json());
  }

  const timestamp = opts.hideTimestamp ? [] : [format.timestamp({format: "MMM-DD HH:mm:ss.SSS"})];
  return format.combine(...timestamp, format.colorize(), format.printf(toHumanLine));
}

function toJsonFields(_info: winston.Logform.TransformableInfo): winston.Logform.TransformableInfo {
  const info = _info as WinstonInfoArg;
  const {context, error} = info;
  return Object.assign(_info, {
    context: context && logCtxToJson(context),
    error: error && errorToJson(error),
  });
}

/**
 * `<timestamp>[module]   level: message k=v, k=v` with the error appended
 */
function toHumanLine(_info: winston.Logform.TransformableInfo): string {
  const info = _info as WinstonInfoArg;
  const module = info.module ?? "";

  let line = `${info.timestamp ?? ""}[${module}] ${info.level.padStart(MODULE_COLUMN_WIDTH - module.length)}: ${info.message}`;

  const context = info.context ?? {};
  const hasContext = Object.keys(context).length > 0;
  if (hasContext) line += " " + logCtxToString(context);

  if (info.error !== undefined) {
    // Typed error metadata continues the context, any other error is set apart after " - "
    const separator = info.error instanceof ChunktreeError ? (hasContext ? ", " : " ") : " - ";
    line += separator + errorToString(info.error);
  }

  return line;
}
