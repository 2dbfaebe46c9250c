import path from "node:path";
import DailyRotateFile from "winston-daily-rotate-file";
import TransportStream from "winston-transport";
import winston from "winston";
import type {Logger as Winston} from "winston";
import {Logger, LoggerOptions, LogLevel} from "./interface.js";
import {ConsoleDynamicLevel} from "./utils/consoleTransport.js";
import {WinstonLogger} from "./winston.js";

export type LogFileOpts = {
  filepath: string;
  level: LogLevel;
  /** Number of daily files to keep, 0 or unset writes a single file */
  dailyRotate?: number;
};

export type LoggerNodeOpts = LoggerOptions & {
  /** Console level of modules without an entry in `levelModule` */
  level: LogLevel;
  levelModule?: Record<string, LogLevel>;
  file?: LogFileOpts;
};

export type LoggerNode = Logger & {
  /** Logger writing to the same transports under module `<module>/<child module>` */
  child(opts: {module: string}): LoggerNode;
};

export function getNodeLogger(opts: LoggerNodeOpts): LoggerNode {
  const transports: TransportStream[] = [
    new ConsoleDynamicLevel({
      defaultLevel: opts.level,
      levelByModule: opts.levelModule,
      debugStdout: true,
      handleExceptions: true,
    }),
  ];
  if (opts.file) {
    transports.push(getFileTransport(opts.file));
  }

  return new WinstonLoggerNode(WinstonLogger.createWinstonInstance(opts, transports), opts.module ?? "");
}

function getFileTransport({filepath, level, dailyRotate}: LogFileOpts): TransportStream {
  if (dailyRotate === undefined || dailyRotate <= 0) {
    return new winston.transports.File({level, filename: filepath, handleExceptions: true});
  }

  return new DailyRotateFile({
    level,
    // tree.log -> tree-2024-01-31.log
    filename: filepath.replace(/\.(?=[^.]*$)|$/, "-%DATE%$&"),
    datePattern: "YYYY-MM-DD",
    maxFiles: dailyRotate,
    auditFile: path.join(path.dirname(filepath), ".log_rotate_audit.json"),
    handleExceptions: true,
  });
}

class WinstonLoggerNode extends WinstonLogger implements LoggerNode {
  constructor(
    protected readonly winston: Winston,
    private readonly module: string
  ) {
    super(winston);
  }

  child({module}: {module: string}): LoggerNode {
    const childModule = this.module ? `${this.module}/${module}` : module;

    // winston's own child() keeps the parent's metadata over the child's, so `module` would not change.
    // Same prototype clone as winston's, with defaultMeta replaced and writes sent to the parent.
    const parent = this.winston;
    const childWinston: Winston = Object.create(parent, {
      defaultMeta: {value: {module: childModule}},
      write: {value: (info: object) => parent.write(info)},
    });

    return new WinstonLoggerNode(childWinston, childModule);
  }
}
