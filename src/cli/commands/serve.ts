/**
 * forge serve
 * Start the peer gateway. On a terminal, also open a command shell that runs
 * the other commands against the live runtime (pending proposals only exist
 * while the gateway runs).
 */

import { Command, CommanderError } from "commander";
import readline from "readline";
import { describeThrown } from "../../core/errors";
import { CliContext, openRuntime, sharedRuntime } from "../utils/runtime";
import { tokenize } from "../utils/tokenize";
import { runtimeCommands } from "./index";

function shellProgram(ctx: CliContext): Command {
  const program = new Command("forge").exitOverride();
  for (const cmd of runtimeCommands(sharedRuntime(ctx))) {
    program.addCommand(cmd.exitOverride());
  }
  return program;
}

async function runShellLine(ctx: CliContext, line: string): Promise<void> {
  const words = tokenize(line);
  if (words.length === 0) return;
  try {
    await shellProgram(ctx).parseAsync(words, { from: "user" });
  } catch (error: unknown) {
    // help and version output arrive as CommanderErrors too
    if (!(error instanceof CommanderError)) {
      console.error(`Error: ${describeThrown(error).message}`);
    }
  }
}

function runShell(ctx: CliContext): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "forge> " });
    let queue = Promise.resolve();

    rl.on("line", (line) => {
      const trimmed = line.trim();
      if (trimmed === "exit" || trimmed === "quit") {
        rl.close();
        return;
      }
      queue = queue.then(async () => {
        await runShellLine(ctx, trimmed);
        rl.prompt();
      });
    });
    rl.on("close", () => {
      void queue.then(resolve);
    });
    rl.prompt();
  });
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));
  });
}

export function serveCommand(): Command {
  const cmd = new Command("serve");
  cmd
    .description("Start the peer gateway and, on a terminal, an interactive shell")
    .option("-p, --port <port>", "port to listen on", (value) => Number.parseInt(value, 10))
    .option("--host <host>", "address to bind")
    .option("--no-shell", "do not open the interactive shell")
    .action(async (opts: { port?: number; host?: string; shell: boolean }) => {
      let ctx: CliContext | undefined;
      try {
        ctx = await openRuntime();
        const server = await ctx.runtime.startServer(opts.port, opts.host);
        console.log(`Peer gateway listening on ${server.url}`);
        console.log(`Loaded tools: ${ctx.runtime.list().join(", ") || "(none)"}`);

        if (opts.shell && process.stdin.isTTY) {
          await Promise.race([runShell(ctx), waitForSignal()]);
        } else {
          await waitForSignal();
        }
      } catch (error: unknown) {
        console.error(`Error: ${describeThrown(error).message}`);
        process.exitCode = 1;
      } finally {
        await ctx?.runtime.close();
        ctx?.logger.flush();
      }
    });
  return cmd;
}
