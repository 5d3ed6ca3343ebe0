/**
 * forge send <url> <body> | share <url> <name> | clone <targetDir>
 */

import { Command } from "commander";
import { RuntimeRunner, withRuntime } from "../utils/runtime";

export function sendCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("send");
  cmd
    .description("POST a message to a peer's /message endpoint and print the reply")
    .argument("<url>", "peer endpoint, e.g. http://127.0.0.1:8080/message")
    .argument("<body>", "plain text, or a JSON object sent as-is")
    .action((url: string, body: string) =>
      run(async ({ runtime }) => {
        console.log(await runtime.sendMessage(url, body));
      })
    );
  return cmd;
}

export function shareCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("share");
  cmd
    .description("Offer a local tool to a peer for approval")
    .argument("<url>", "peer endpoint")
    .argument("<name>", "tool name")
    .action((url: string, name: string) =>
      run(async ({ runtime }) => {
        console.log(await runtime.shareTool(url, name));
      })
    );
  return cmd;
}

export function cloneCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("clone");
  cmd
    .description("Copy the executable, tools and config into a new directory")
    .argument("<targetDir>", "destination directory")
    .action((targetDir: string) =>
      run(async ({ runtime }) => {
        console.log(await runtime.capabilities.cloneAgent(targetDir));
      })
    );
  return cmd;
}
