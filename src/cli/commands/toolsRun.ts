/**
 * forge tools:run <name> [arg]
 */

import { Command } from "commander";
import { RuntimeRunner, withRuntime } from "../utils/runtime";

export function toolsRunCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("tools:run");
  cmd
    .description("Run a tool or native capability")
    .argument("<name>", "tool or capability name")
    .argument("[arg]", "single string argument")
    .action((name: string, arg: string | undefined) =>
      run(async ({ runtime }) => {
        const output = await runtime.execute(name, arg === undefined ? [] : [arg]);
        console.log(output);
      })
    );
  return cmd;
}
