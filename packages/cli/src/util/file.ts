import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import {YargsError} from "./errors.js";

const {load} = yaml;

export enum FileFormat {
  json = "json",
  yaml = "yaml",
  yml = "yml",
}

function isFileFormat(format: string): format is FileFormat {
  return Object.values(FileFormat).some((fileFormat) => fileFormat === format);
}

/**
 * Parse file contents as a plain object
 */
export function parse(contents: string, fileFormat: FileFormat): Record<string, unknown> {
  const parsed: unknown = fileFormat === FileFormat.json ? JSON.parse(contents) : load(contents);
  if (parsed == null) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new YargsError(`Expected a ${fileFormat} object, got ${Array.isArray(parsed) ? "array" : typeof parsed}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Read a config object from a .json, .yaml or .yml file
 */
export function readFile(filepath: string, acceptedFormats: FileFormat[] = Object.values(FileFormat)): Record<string, unknown> {
  const fileFormat = path.extname(filepath).slice(1);
  if (!isFileFormat(fileFormat) || !acceptedFormats.includes(fileFormat)) {
    throw new YargsError(`Unsupported file format: ${filepath}, expected one of ${acceptedFormats.join(", ")}`);
  }
  const contents = fs.readFileSync(filepath, "utf-8");
  return parse(contents, fileFormat);
}
