/**
 * errors command - list the error names FaultInject accepts
 */

import kleur from "kleur";
import { errnoMessage, listErrorDescriptors } from "../../errors/registry.js";

export function errorsCommand() {
  console.log(kleur.cyan("Injectable errors on this platform:"));
  for (const { name, code } of listErrorDescriptors()) {
    console.log(
      `  ${name.padEnd(11)} ${String(code).padStart(4)}  ${kleur.gray(errnoMessage(code))}`
    );
  }
}
