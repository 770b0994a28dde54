#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { completeCommand } from "./commands/complete";
import { loadCommand } from "./commands/load";
import { modelsCommand } from "./commands/models";
import { statusCommand } from "./commands/status";

export function createCli(): Command {
  const program = new Command();

  program
    .name("modelhub")
    .description("Query language models through modelhub providers")
    .version("0.3.0")
    .option("-p, --provider <name>", "providers to load: ollama, mock or all (env MODELHUB_PROVIDER)")
    .option("-c, --config <path>", "settings file (default ./modelhub.config.json)");

  program.addCommand(modelsCommand());
  program.addCommand(statusCommand());
  program.addCommand(completeCommand());
  program.addCommand(loadCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
