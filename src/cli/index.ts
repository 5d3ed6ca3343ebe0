#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import { Command } from "commander";
import { runtimeCommands } from "./commands";
import { serveCommand } from "./commands/serve";

export function createCli(): Command {
  const program = new Command();

  program
    .name("forge")
    .description("Create, compose, share and approve runtime tools")
    .version("0.1.0");

  for (const cmd of runtimeCommands()) {
    program.addCommand(cmd);
  }
  program.addCommand(serveCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
