import fs from "node:fs";
import path from "node:path";
import tmp from "tmp";
import {LogLevel} from "@chunktree/utils";
import {GlobalArgs} from "../src/options/index.js";

const tmpDir = tmp.dirSync({unsafeCleanup: true});
export const testFilesDir = tmpDir.name;

export function getTestdirPath(filepath: string): string {
  const fullpath = path.join(testFilesDir, filepath);
  fs.mkdirSync(path.dirname(fullpath), {recursive: true});
  return fullpath;
}

export function writeTestFile(filepath: string, contents: string): string {
  const fullpath = getTestdirPath(filepath);
  fs.writeFileSync(fullpath, contents);
  return fullpath;
}

/**
 * Parsed global args as yargs would produce them with no flag set
 */
export function getGlobalArgs(overrides: Partial<GlobalArgs> = {}): GlobalArgs {
  return {
    algorithm: "sha256",
    chunkSize: 1024,
    logLevel: LogLevel.warn,
    logFileLevel: LogLevel.debug,
    logFileDailyRotate: 5,
    ...overrides,
  };
}
