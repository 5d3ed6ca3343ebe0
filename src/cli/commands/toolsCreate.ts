/**
 * forge tools:create <name> <file>
 */

import { Command } from "commander";
import fs from "fs/promises";
import { RuntimeRunner, withRuntime } from "../utils/runtime";

export function toolsCreateCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("tools:create");
  cmd
    .description("Create or overwrite a tool from a JavaScript file")
    .argument("<name>", "tool name; the file must define a function with this name")
    .argument("<file>", "path to the source file")
    .action((name: string, file: string) =>
      run(async ({ runtime }) => {
        const source = await fs.readFile(file, "utf8");
        const result = await runtime.createTool(name, source);
        console.log(`${result.overwritten ? "Updated" : "Created"} tool ${result.name}`);
      })
    );
  return cmd;
}
