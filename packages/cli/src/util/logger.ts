import {LogFormat, logFormats} from "@chunktree/logger";
import {LoggerNode, LoggerNodeOpts, getNodeLogger} from "@chunktree/logger/node";
import {LogLevel} from "@chunktree/utils";
import {LogArgs} from "../options/logOptions.js";
import {YargsError} from "./errors.js";

/**
 * Translate log args into logger options, the file transport is only set with `--logFile`
 */
export function parseLoggerArgs(args: LogArgs): LoggerNodeOpts {
  return {
    level: parseLogLevel(args.logLevel),
    file:
      args.logFile === undefined
        ? undefined
        : {
            filepath: args.logFile,
            level: parseLogLevel(args.logFileLevel),
            dailyRotate: args.logFileDailyRotate,
          },
    format: args.logFormat ? parseLogFormat(args.logFormat) : undefined,
    levelModule: args.logLevelModule && parseLogLevelModule(args.logLevelModule),
    hideTimestamp: args.logHideTimestamp ?? false,
  };
}

export function getCliLogger(args: LogArgs): LoggerNode {
  return getNodeLogger(parseLoggerArgs(args));
}

function parseLogFormat(format: string): LogFormat {
  const logFormat = logFormats.find((f) => f === format);
  if (logFormat === undefined) {
    throw new YargsError(`Unknown log format ${format}`);
  }
  return logFormat;
}

function parseLogLevel(level: string): LogLevel {
  const logLevel = Object.values(LogLevel).find((l) => l === level);
  if (logLevel === undefined) {
    throw new YargsError(`Unknown log level '${level}'`);
  }
  return logLevel;
}

function parseLogLevelModule(logLevelModuleArr: string[]): Record<string, LogLevel> {
  const levelModule: Record<string, LogLevel> = {};
  for (const logLevelModule of logLevelModuleArr) {
    const [module, levelStr] = logLevelModule.split("=");
    if (!module || levelStr === undefined) {
      throw new YargsError(`Invalid logLevelModule '${logLevelModule}', expected 'module=level'`);
    }
    levelModule[module] = parseLogLevel(levelStr);
  }
  return levelModule;
}
