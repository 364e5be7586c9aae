/**
 * Error registry - maps injectable error names to platform errno values
 *
 * Codes are read from the running platform, so the same configuration
 * resolves to the right numbers on Linux, macOS and the BSDs. Extended
 * names are only registered where the platform defines them.
 */

import { constants } from "node:os";
import { getSystemErrorMap } from "node:util";
import {
  PORTABLE_ERROR_NAMES,
  EXTENDED_ERROR_NAMES,
  type ErrorDescriptor,
  type ErrorName,
} from "@fsfault/shared";

// Registry names that the platform spells differently
const PLATFORM_SPELLINGS: Partial<Record<ErrorName, string>> = {
  ETXTBUSY: "ETXTBSY",
};

const platformErrno = new Map<string, number>();
for (const [name, value] of Object.entries(constants.errno)) {
  if (typeof value === "number") {
    platformErrno.set(name, value);
  }
}

const systemErrors = getSystemErrorMap();

const DESCRIPTORS: readonly ErrorDescriptor[] = Object.freeze(
  [...PORTABLE_ERROR_NAMES, ...EXTENDED_ERROR_NAMES].flatMap(
    (name): ErrorDescriptor[] => {
      const code = platformErrno.get(PLATFORM_SPELLINGS[name] ?? name);
      return code === undefined ? [] : [Object.freeze({ name, code })];
    }
  )
);

export class UnknownErrorNameError extends Error {
  constructor(public readonly errorName: string) {
    super(`unknown/unsupported error: ${errorName}`);
    this.name = "UnknownErrorNameError";
  }
}

export class UnrepresentableErrorCode extends Error {
  constructor(public readonly code: number) {
    super(`no registered error name for errno ${code}`);
    this.name = "UnrepresentableErrorCode";
  }
}

export function listErrorDescriptors(): readonly ErrorDescriptor[] {
  return DESCRIPTORS;
}

/**
 * Case-insensitive lookup of a registered error name
 */
export function findErrorCode(name: string): number | undefined {
  const wanted = name.toUpperCase();
  return DESCRIPTORS.find((d) => d.name === wanted)?.code;
}

/**
 * First registered name for a code
 */
export function findErrorName(code: number): ErrorName | undefined {
  return DESCRIPTORS.find((d) => d.code === code)?.name;
}

export function nameToCode(name: string): number {
  const code = findErrorCode(name);
  if (code === undefined) {
    throw new UnknownErrorNameError(name);
  }
  return code;
}

export function codeToName(code: number): ErrorName {
  const name = findErrorName(code);
  if (name === undefined) {
    throw new UnrepresentableErrorCode(code);
  }
  return name;
}

/**
 * Registry name for diagnostics, falling back to the raw number
 */
export function describeErrno(code: number): string {
  return findErrorName(code) ?? `errno ${code}`;
}

/**
 * Platform errno for a symbolic code as Node reports it (e.g. "ETXTBSY")
 */
export function platformErrnoFor(code: string): number | undefined {
  return platformErrno.get(code);
}

/**
 * Symbolic code as the platform spells it, the way Node sets `err.code`
 */
export function systemErrorCode(code: number): string {
  return systemErrors.get(-code)?.[0] ?? "UNKNOWN";
}

/**
 * System message for a code (strerror)
 */
export function errnoMessage(code: number): string {
  return systemErrors.get(-code)?.[1] ?? `Unknown system error ${code}`;
}
