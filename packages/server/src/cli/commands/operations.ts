/**
 * operations command - list the operations FaultInject accepts
 */

import kleur from "kleur";
import { COUPLED_OPERATIONS } from "@fsfault/shared";
import { listOperations } from "../../faults/catalog.js";

export function operationsCommand() {
  console.log(kleur.cyan("Filesystem operations that can be faulted:"));
  for (const operation of listOperations()) {
    console.log(`  ${operation}`);
  }

  for (const [call, operation] of Object.entries(COUPLED_OPERATIONS)) {
    console.log(kleur.gray(`  (${call} is faulted by the "${operation}" binding)`));
  }
}
