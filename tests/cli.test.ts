/**
 * CLI commands against a live runtime
 */

import fs from "fs/promises";
import path from "path";
import { Command } from "commander";
import { EventBus } from "../src/core/eventBus";
import { ForgeLogger } from "../src/core/logger";
import type { ToolRuntime } from "../src/core/runtime";
import { runtimeCommands } from "../src/cli/commands";
import { CliContext, sharedRuntime } from "../src/cli/utils/runtime";
import { formatTable } from "../src/cli/utils/printTable";
import { tokenize } from "../src/cli/utils/tokenize";
import { makeRuntime, makeTempDir, removeDir } from "./helpers";

describe("tokenize", () => {
  test("should split on whitespace and keep quoted words together", () => {
    expect(tokenize(`tools:run greet "hello world"  'it''s'`)).toEqual(["tools:run", "greet", "hello world", "its"]);
  });

  test("should honour backslash escapes", () => {
    expect(tokenize(String.raw`send a\ b "say \"hi\""`)).toEqual(["send", "a b", 'say "hi"']);
  });

  test("should keep an empty quoted word", () => {
    expect(tokenize(`tools:run echo ""`)).toEqual(["tools:run", "echo", ""]);
  });
});

describe("formatTable", () => {
  test("should align columns to the widest cell", () => {
    expect(formatTable(["NAME", "RISK"], [["square", "Safe"], ["fetcher", "HighRisk"]])).toEqual([
      "NAME    │ RISK",
      "────────┼─────────",
      "square  │ Safe",
      "fetcher │ HighRisk",
    ]);
  });
});

describe("runtime commands", () => {
  let root: string;
  let runtime: ToolRuntime;
  let ctx: CliContext;
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  const run = (...words: string[]) => {
    const program = new Command("forge").exitOverride();
    for (const cmd of runtimeCommands(sharedRuntime(ctx))) {
      program.addCommand(cmd.exitOverride());
    }
    return program.parseAsync(words, { from: "user" });
  };

  beforeEach(async () => {
    root = await makeTempDir();
    runtime = await makeRuntime(root);
    ctx = { runtime, logger: new ForgeLogger(new EventBus(), { level: "silent", format: "json" }) };
    log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    error = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    log.mockRestore();
    error.mockRestore();
    await runtime.close();
    await removeDir(root);
  });

  test("should create a tool from a file and run it", async () => {
    const file = path.join(root, "square.js");
    await fs.writeFile(file, "function square(x) { return String(Number(x) * Number(x)); }\n");

    await run("tools:create", "square", file);
    await run("tools:run", "square", "7");

    expect(log).toHaveBeenCalledWith("Created tool square");
    expect(log).toHaveBeenCalledWith("49");
    expect(runtime.list()).toEqual(["square"]);
  });

  test("should report an empty approval queue", async () => {
    await run("pending:list");

    expect(log).toHaveBeenCalledWith("No pending proposals");
  });

  test("should approve a queued proposal", async () => {
    await runtime.proposeTool("twice", "function twice(x) { return x + x; }", "10.0.0.2");

    await run("pending:approve", "twice", "--sender", "10.0.0.2");

    expect(log).toHaveBeenCalledWith("Approved twice from 10.0.0.2 (Safe)");
    expect(runtime.registry.get("twice")?.origin).toBe("remote");
  });

  test("should print errors without closing the shared runtime", async () => {
    await run("tools:run", "missing");

    expect(error).toHaveBeenCalledWith("Error: Tool not found: missing");
    expect(runtime.list()).toEqual([]);
  });
});
