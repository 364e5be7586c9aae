/**
 * Operation catalog - which filesystem operations may be faulted
 */

import { FAULT_OPERATIONS, type OperationName } from "@fsfault/shared";

/**
 * Canonical (lower-case) operation name, or undefined when the operation
 * cannot be faulted
 */
export function toOperationName(name: string): OperationName | undefined {
  const wanted = name.toLowerCase();
  return FAULT_OPERATIONS.find((op) => op === wanted);
}

export function isSupportedOperation(name: string): boolean {
  return toOperationName(name) !== undefined;
}

export function listOperations(): readonly OperationName[] {
  return FAULT_OPERATIONS;
}
