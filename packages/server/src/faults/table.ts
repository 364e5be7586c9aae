/**
 * Fault table - operation -> errno bindings for one configuration generation
 */

import type { Logger } from "pino";
import type { FaultBinding, OperationName } from "@fsfault/shared";
import { FaultConfigError } from "../errors/config-error.js";
import { describeErrno, errnoMessage } from "../errors/registry.js";

/**
 * Read-only side of a fault table, the only part interception sees
 */
export interface FaultTableView {
  lookup(operation: OperationName): number | undefined;
  count(): number;
  entries(): FaultBinding[];
}

export class FaultTable implements FaultTableView {
  private readonly bindings = new Map<OperationName, number>();

  /**
   * Add a binding. Bindings are never overwritten within a generation.
   */
  bind(operation: OperationName, errorCode: number): void {
    if (this.bindings.has(operation)) {
      throw new FaultConfigError(
        "DuplicateBinding",
        `filesystem configuration already exists for '${operation}'`
      );
    }
    this.bindings.set(operation, errorCode);
  }

  lookup(operation: OperationName): number | undefined {
    return this.bindings.get(operation);
  }

  has(operation: OperationName): boolean {
    return this.bindings.has(operation);
  }

  count(): number {
    return this.bindings.size;
  }

  entries(): FaultBinding[] {
    return Array.from(this.bindings, ([operation, errorCode]) => ({
      operation,
      errorCode,
    }));
  }

  /**
   * Copy handed to a session; later binds on this table don't reach it
   */
  snapshot(): FaultTableView {
    return new FrozenFaultTable(this.bindings);
  }
}

class FrozenFaultTable implements FaultTableView {
  private readonly bindings: ReadonlyMap<OperationName, number>;

  constructor(bindings: ReadonlyMap<OperationName, number>) {
    this.bindings = new Map(bindings);
  }

  lookup(operation: OperationName): number | undefined {
    return this.bindings.get(operation);
  }

  count(): number {
    return this.bindings.size;
  }

  entries(): FaultBinding[] {
    return Array.from(this.bindings, ([operation, errorCode]) => ({
      operation,
      errorCode,
    }));
  }
}

/**
 * Enumerate every binding at trace level
 */
export function dumpTable(table: FaultTableView, log: Logger): void {
  if (!log.isLevelEnabled("trace")) {
    return;
  }

  for (const { operation, errorCode } of table.entries()) {
    log.trace(
      {
        operation,
        error: describeErrno(errorCode),
        errno: errorCode,
        reason: errnoMessage(errorCode),
      },
      `  ${operation}: ${describeErrno(errorCode)} (${errorCode}) [${errnoMessage(errorCode)}]`
    );
  }
}
