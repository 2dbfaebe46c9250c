export * from "./bytes.js";
export * from "./command.js";
export * from "./errors.js";
export * from "./format.js";
export * from "./json.js";
export * from "./logger.js";
