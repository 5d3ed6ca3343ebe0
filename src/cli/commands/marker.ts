/**
 * forge marker <text>
 * Apply the tool blocks and [TOOL: ...] markers found in an agent reply.
 */

import { Command } from "commander";
import fs from "fs/promises";
import { applyMarkers } from "../../core/agent/markers";
import { RuntimeRunner, withRuntime } from "../utils/runtime";

export function markerCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("marker");
  cmd
    .description("Create tools and run invocations written in an agent reply")
    .argument("[text]", "reply text")
    .option("-f, --file <path>", "read the reply from a file")
    .action((text: string | undefined, opts: { file?: string }) =>
      run(async ({ runtime }) => {
        const reply = opts.file ? await fs.readFile(opts.file, "utf8") : text ?? "";
        const outcomes = await applyMarkers(runtime, reply);
        if (outcomes.length === 0) {
          console.log("No markers found");
          return;
        }
        for (const outcome of outcomes) {
          if (!outcome.ok) {
            console.log(`✗ ${outcome.kind} ${outcome.name}: ${outcome.error}`);
          } else if (outcome.kind === "invoke") {
            console.log(`✓ ${outcome.name} → ${outcome.output}`);
          } else {
            console.log(`✓ created ${outcome.name}`);
          }
        }
      })
    );
  return cmd;
}
