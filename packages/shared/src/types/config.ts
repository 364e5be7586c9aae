/**
 * Configuration types - directives handed over by the host's config loader
 */

/**
 * One tokenized directive, e.g. `FaultInject filesystem ENOSPC write`
 * becomes `{ name: "FaultInject", args: ["filesystem", "ENOSPC", "write"] }`.
 */
export interface Directive {
  name: string;
  args: string[];
  line?: number; // 1-based source line, when parsed from a file
}

export type FaultConfigErrorKind =
  | "MissingParameters"
  | "InvalidBoolean"
  | "UnsupportedCategory"
  | "UnknownErrorName"
  | "UnsupportedOperation"
  | "DuplicateBinding"
  | "UnknownDirective";

/**
 * Fault categories. Only "filesystem" is implemented; "netio" is reserved.
 */
export type FaultCategory = "filesystem";
