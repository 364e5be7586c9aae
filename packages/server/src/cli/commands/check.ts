/**
 * check command - load and validate a directive file
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import kleur from "kleur";
import type { Logger } from "pino";
import type { FaultBinding } from "@fsfault/shared";
import { loadDirectiveFile, DirectiveSyntaxError } from "../../config/directives.js";
import { FaultEngine } from "../../engine/fault-engine.js";
import { FaultConfigError } from "../../errors/config-error.js";
import { describeErrno, errnoMessage } from "../../errors/registry.js";
import { createLogger } from "../../logger.js";
import { parseLogLevel } from "../options.js";

interface CheckOptions {
  config: string;
  logLevel?: string;
}

export interface CheckReport {
  engineEnabled: boolean;
  bindings: FaultBinding[];
}

/**
 * Load a directive file into a fresh engine and report what it configures
 */
export async function runCheck(
  configPath: string,
  logger: Logger
): Promise<CheckReport> {
  const directives = await loadDirectiveFile(configPath);
  const engine = new FaultEngine({ logger });
  engine.configure(directives);
  engine.dump();

  return {
    engineEnabled: engine.isEnabled(),
    bindings: engine.bindings(),
  };
}

export function formatBinding(binding: FaultBinding): string {
  const name = describeErrno(binding.errorCode);
  return `${binding.operation.padEnd(10)} ${name} (${binding.errorCode}) ${errnoMessage(binding.errorCode)}`;
}

export async function checkCommand(options: CheckOptions) {
  const configPath = resolve(process.cwd(), options.config);

  if (!existsSync(configPath)) {
    console.log(kleur.red(`❌ ${options.config} not found`));
    process.exit(1);
  }

  const logger = createLogger({
    level: parseLogLevel(options.logLevel),
    pretty: true,
  });

  let report: CheckReport;
  try {
    report = await runCheck(configPath, logger);
  } catch (err) {
    if (err instanceof FaultConfigError) {
      console.log(kleur.red(`❌ ${err.describe()}`));
      process.exit(1);
    }
    if (err instanceof DirectiveSyntaxError) {
      console.log(kleur.red(`❌ ${err.message}`));
      process.exit(1);
    }
    throw err;
  }

  console.log(kleur.green(`✅ ${options.config} is valid`));
  console.log(
    `   FaultEngine: ${report.engineEnabled ? kleur.green("on") : kleur.yellow("off")}`
  );

  if (report.bindings.length === 0) {
    console.log(kleur.gray("   No filesystem faults configured"));
    return;
  }

  console.log(`   Filesystem faults (${report.bindings.length}):`);
  for (const binding of report.bindings) {
    console.log(kleur.gray(`     ${formatBinding(binding)}`));
  }

  if (!report.engineEnabled) {
    console.log(
      kleur.yellow("   FaultEngine is off: sessions will not inject these faults")
    );
  }
}
