/**
 * Configuration validator - turns FaultEngine/FaultInject arguments into
 * engine state and fault bindings
 */

import { z } from "zod";
import {
  FAULT_CATEGORIES,
  type FaultBinding,
} from "@fsfault/shared";
import { FaultConfigError } from "../errors/config-error.js";
import { findErrorCode } from "../errors/registry.js";
import { toOperationName } from "./catalog.js";
import type { FaultTable } from "./table.js";

const TRUE_TOKENS = new Set(["on", "yes", "true", "1"]);

const EngineFlagSchema = z
  .string()
  .transform((token) => token.toLowerCase())
  .pipe(z.enum(["on", "off", "yes", "no", "true", "false", "1", "0"]))
  .transform((token) => TRUE_TOKENS.has(token));

/**
 * Parse the arguments of `FaultEngine <on|off>`
 */
export function parseEngineFlag(args: readonly string[]): boolean {
  if (args.length !== 1) {
    throw new FaultConfigError(
      "MissingParameters",
      "wrong number of parameters"
    );
  }

  const parsed = EngineFlagSchema.safeParse(args[0]);
  if (!parsed.success) {
    throw new FaultConfigError("InvalidBoolean", "expected Boolean parameter");
  }
  return parsed.data;
}

/**
 * Apply `FaultInject <category> <error> <op1> [op2 ...]`.
 *
 * Operations are validated and bound one at a time: when a later operation
 * is rejected, those bound before it stay in the table.
 */
export function applyFaultInject(
  table: FaultTable,
  category: string,
  errorToken: string,
  operationTokens: readonly string[]
): FaultBinding[] {
  // Other categories (netio) are reserved for later
  if (category.toLowerCase() !== FAULT_CATEGORIES.FILESYSTEM) {
    throw new FaultConfigError(
      "UnsupportedCategory",
      `unsupported category: ${category}`
    );
  }

  const errorCode = findErrorCode(errorToken);
  if (errorCode === undefined) {
    throw new FaultConfigError(
      "UnknownErrorName",
      `unknown/unsupported error: ${errorToken}`
    );
  }

  const committed: FaultBinding[] = [];
  for (const token of operationTokens) {
    const operation = toOperationName(token);
    if (operation === undefined) {
      throw new FaultConfigError(
        "UnsupportedOperation",
        `unknown/unsupported ${category} operation: ${token}`
      );
    }

    table.bind(operation, errorCode);
    committed.push({ operation, errorCode });
  }

  return committed;
}

/**
 * Parse the full argument list of a FaultInject directive
 */
export function applyFaultInjectArgs(
  table: FaultTable,
  args: readonly string[]
): FaultBinding[] {
  const [category, errorToken, ...operations] = args;
  if (
    category === undefined ||
    errorToken === undefined ||
    operations.length === 0
  ) {
    throw new FaultConfigError("MissingParameters", "missing parameters");
  }

  return applyFaultInject(table, category, errorToken, operations);
}
