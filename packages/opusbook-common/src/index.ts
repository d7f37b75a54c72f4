export * from "./cli-parser.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./fs.js";
export * from "./logger.js";
export * from "./process.js";
export * from "./retry.js";
export * from "./time.js";
