export * from "./errors.js";
export * from "./operations.js";
export * from "./result.js";
export * from "./config.js";
