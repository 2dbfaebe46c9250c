import winston from "winston";
import type {Logger as Winston} from "winston";
import {Logger, LogData, LoggerOptions, LogLevel, logLevelNum} from "./interface.js";
import {getFormat} from "./utils/format.js";

/**
 * `Logger` backed by a winston instance.
 *
 * The instance itself lets every entry through and each transport applies its own level,
 * which is how children sharing their parent's transports get a level per module.
 */
export class WinstonLogger implements Logger {
  constructor(protected readonly winston: Winston) {}

  static createWinstonInstance(options: LoggerOptions, transports: winston.transport[]): Winston {
    return winston.createLogger({
      level: LogLevel.debug,
      levels: logLevelNum,
      defaultMeta: {module: options.module ?? ""},
      format: getFormat(options),
      transports,
      exitOnError: false,
    });
  }

  error(message: string, context?: LogData, error?: Error): void {
    this.log(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: LogData, error?: Error): void {
    this.log(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: LogData, error?: Error): void {
    this.log(LogLevel.info, message, context, error);
  }

  verbose(message: string, context?: LogData, error?: Error): void {
    this.log(LogLevel.verbose, message, context, error);
  }

  debug(message: string, context?: LogData, error?: Error): void {
    this.log(LogLevel.debug, message, context, error);
  }

  private log(level: LogLevel, message: string, context?: LogData, error?: Error): void {
    // A single object argument skips winston's splat handling, the format receives context and error as given
    this.winston.log(level, {message, context, error});
  }
}
