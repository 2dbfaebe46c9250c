export * from "./errors.js";
export * from "./file.js";
export * from "./input.js";
export * from "./logger.js";
