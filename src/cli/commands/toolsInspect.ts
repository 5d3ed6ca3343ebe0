/**
 * forge tools:inspect <name>
 */

import { Command } from "commander";
import { RuntimeRunner, withRuntime } from "../utils/runtime";

export function toolsInspectCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("tools:inspect");
  cmd
    .description("Print a tool's source")
    .argument("<name>", "tool name")
    .action((name: string) =>
      run(async ({ runtime }) => {
        console.log(runtime.inspect(name));
      })
    );
  return cmd;
}
