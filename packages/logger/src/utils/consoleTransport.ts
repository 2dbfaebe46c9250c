import {transports} from "winston";
import {LEVEL, LogLevel, WinstonLogInfo, logLevelNum} from "../interface.js";

export type ConsoleDynamicLevelOpts = transports.ConsoleTransportOptions & {
  defaultLevel: LogLevel;
  levelByModule?: Record<string, LogLevel>;
};

/**
 * Console transport that filters each entry by the level of its `module`.
 *
 * A module without a level of its own takes the level of its closest ancestor,
 * `a/b/c` falls back to `a/b` then `a`, and finally to the default level.
 */
export class ConsoleDynamicLevel extends transports.Console {
  private readonly levelByModule = new Map<string, LogLevel>();
  private readonly defaultLevel: LogLevel;

  constructor({defaultLevel, levelByModule, ...opts}: ConsoleDynamicLevelOpts) {
    super(opts);
    this.defaultLevel = defaultLevel;
    for (const [module, level] of Object.entries(levelByModule ?? {})) {
      this.levelByModule.set(module, level);
    }
    // Filtering happens in _write, the underlying transport must accept every entry
    this.level = undefined;
  }

  getModuleLevel(module: string): LogLevel {
    for (let name = module; name !== ""; name = name.slice(0, Math.max(0, name.lastIndexOf("/")))) {
      const level = this.levelByModule.get(name);
      if (level !== undefined) return level;
    }
    return this.defaultLevel;
  }

  _write(info: WinstonLogInfo, enc: BufferEncoding, callback: (error?: Error | null) => void): void {
    // Lower number is higher priority, {error: 0, warn: 1, info: 2, ...}
    if (logLevelNum[this.getModuleLevel(info.module)] >= logLevelNum[info[LEVEL]]) {
      super._write(info, enc, callback);
    } else {
      callback(null);
    }
  }
}
