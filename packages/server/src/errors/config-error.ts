/**
 * Configuration errors - fatal, abort loading or reloading
 */

import type { Directive, FaultConfigErrorKind } from "@fsfault/shared";

export class FaultConfigError extends Error {
  constructor(
    public readonly kind: FaultConfigErrorKind,
    message: string,
    public readonly directive?: string,
    public readonly line?: number
  ) {
    super(message);
    this.name = "FaultConfigError";
  }

  /**
   * Same error, located at the directive that caused it
   */
  at(directive: Directive): FaultConfigError {
    return new FaultConfigError(
      this.kind,
      this.message,
      directive.name,
      directive.line
    );
  }

  /**
   * Host-style report, e.g. `FaultInject (line 3): unsupported category: netio`
   */
  describe(): string {
    const where = this.line !== undefined ? ` (line ${this.line})` : "";
    return `${this.directive ?? "configuration"}${where}: ${this.message}`;
  }
}
