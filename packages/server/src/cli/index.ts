#!/usr/bin/env node
/**
 * CLI entry point
 */

import { Command } from "commander";
import { checkCommand } from "./commands/check.js";
import { errorsCommand } from "./commands/errors.js";
import { operationsCommand } from "./commands/operations.js";
import { defaultConfigPath } from "./options.js";

const program = new Command();

program
  .name("fsfault")
  .description("Filesystem fault injection for server sessions")
  .version("0.1.0");

program
  .command("check")
  .description("Validate a FaultEngine/FaultInject directive file")
  .option("-c, --config <path>", "Directive file path", defaultConfigPath())
  .option("--log-level <level>", "Log level (trace shows the fault table)")
  .action(async (options) => {
    await checkCommand(options);
  });

program
  .command("errors")
  .description("List injectable error names")
  .action(() => {
    errorsCommand();
  });

program
  .command("operations")
  .description("List filesystem operations that can be faulted")
  .action(() => {
    operationsCommand();
  });

await program.parseAsync();
