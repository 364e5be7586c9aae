/**
 * @fsfault/shared - Shared types and constants
 */

// Export all types
export * from "./types/index.js";

// Export filesystem provider interface
export * from "./vfs/index.js";

// Export constants
export * from "./constants.js";
