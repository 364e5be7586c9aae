/**
 * Shared constants
 */

/**
 * Where the faulting provider is installed, and under which name
 */
export const FAULT_MOUNT = {
  NAME: "fault",
  PATH: "/",
} as const;

/**
 * Name of the pass-through provider the mount table starts with
 */
export const REAL_PROVIDER_NAME = "node";

/**
 * Configuration directive names
 */
export const DIRECTIVES = {
  ENGINE: "FaultEngine",
  INJECT: "FaultInject",
} as const;

/**
 * Fault categories (netio is reserved, not implemented)
 */
export const FAULT_CATEGORIES = {
  FILESYSTEM: "filesystem",
} as const;

/**
 * Environment variables read by the CLI
 */
export const ENV = {
  CONFIG: "FSFAULT_CONFIG",
  LOG_LEVEL: "FSFAULT_LOG_LEVEL",
} as const;

export const DEFAULT_CONFIG_FILE = "fsfault.conf";
