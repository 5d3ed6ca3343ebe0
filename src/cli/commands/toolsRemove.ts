/**
 * forge tools:remove <name>
 */

import { Command } from "commander";
import { RuntimeRunner, withRuntime } from "../utils/runtime";

export function toolsRemoveCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("tools:remove");
  cmd
    .description("Delete a tool")
    .argument("<name>", "tool name")
    .action((name: string) =>
      run(async ({ runtime }) => {
        await runtime.removeTool(name);
        console.log(`Removed tool ${name}`);
      })
    );
  return cmd;
}
