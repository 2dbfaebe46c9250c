export * from "./constants.js";
export * from "./digest.js";
export * from "./errors.js";
export * from "./fold.js";
export * from "./hasher/index.js";
export * from "./leaves.js";
export * from "./node.js";
export * from "./reader.js";
export * from "./tree.js";
