import {LEVEL} from "triple-beam";
import {LogLevel} from "@chunktree/utils";

export {LEVEL};
export {LogLevel, LogLevels} from "@chunktree/utils";
export type {Logger, LogData} from "@chunktree/utils";

/** winston priorities: a transport at level L writes every entry whose number is at most `logLevelNum[L]` */
export const logLevelNum: Record<LogLevel, number> = {
  [LogLevel.error]: 0,
  [LogLevel.warn]: 1,
  [LogLevel.info]: 2,
  [LogLevel.verbose]: 3,
  [LogLevel.debug]: 4,
};

export type LogFormat = "human" | "json";
export const logFormats: LogFormat[] = ["human", "json"];

export type LoggerOptions = {
  /** Prefix of every entry, children append their own as `parent/child` */
  module?: string;
  /** Defaults to "human" */
  format?: LogFormat;
  hideTimestamp?: boolean;
};

/** Fields of a winston entry the transports filter on */
export type WinstonLogInfo = {
  module: string;
  [LEVEL]: LogLevel;
};
