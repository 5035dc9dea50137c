export * from "./types.js";
export * from "./errors.js";
export * from "./sizing.js";
export * from "./logger.js";
