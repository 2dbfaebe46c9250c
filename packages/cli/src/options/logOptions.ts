import {CliCommandOptions, LogLevel, LogLevels} from "@chunktree/utils";
import {logFormats} from "@chunktree/logger";

export type LogArgs = {
  logLevel: LogLevel;
  logFile?: string;
  logFileLevel: LogLevel;
  logFileDailyRotate: number;
  logFormat?: string;
  logLevelModule?: string[];
  logHideTimestamp?: boolean;
};

export const logOptions: CliCommandOptions<LogArgs> = {
  logLevel: {
    choices: LogLevels,
    description: "Most verbose level printed to the terminal",
    default: LogLevel.warn,
    type: "string",
  },

  logFile: {
    description: "Also write logs to this file",
    type: "string",
  },

  logFileLevel: {
    choices: LogLevels,
    description: "Most verbose level written to --logFile",
    default: LogLevel.debug,
    type: "string",
  },

  logFileDailyRotate: {
    description: "Days of --logFile to keep in dated files, 0 writes a single file",
    default: 5,
    type: "number",
  },

  logFormat: {
    hidden: true,
    description: "Rendering of terminal and file logs",
    choices: logFormats,
    type: "string",
  },

  logLevelModule: {
    hidden: true,
    description: "Set log level for a specific module by name: 'tree=debug' or 'tree=debug,input=verbose'",
    type: "array",
    string: true,
    coerce: (args: string[]) => args.flatMap((item) => item.split(",")),
  },

  logHideTimestamp: {
    hidden: true,
    description: "Do not prefix terminal logs with a timestamp",
    type: "boolean",
  },
};
