/**
 * forge tools:list
 */

import { Command } from "commander";
import { printTable } from "../utils/printTable";
import { RuntimeRunner, withRuntime } from "../utils/runtime";

export function toolsListCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("tools:list");
  cmd.description("List loaded tools with their origin and risk level").action(() =>
    run(async ({ runtime }) => {
      const rows = runtime.tools().map((tool) => {
        const { level, capabilities } = runtime.assess(tool.source);
        return [tool.name, tool.origin, level, capabilities.join(", ")];
      });
      printTable(["NAME", "ORIGIN", "RISK", "CAPABILITIES"], rows, "No tools loaded");
    })
  );
  return cmd;
}
