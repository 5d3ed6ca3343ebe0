/**
 * Tool Runtime Tests: create, compose, overwrite, remove, execute
 */

import fs from "fs/promises";
import path from "path";
import { ToolRuntime } from "../src/core/runtime";
import { makeRuntime, makeTempDir, removeDir } from "./helpers";

const TOOL_A = 'function tool_a(x) { return x + "_A"; }';
const TOOL_B = 'function tool_b(x) { return tool_a(x) + "_B"; }';

describe("ToolRuntime", () => {
  let root: string;
  let runtime: ToolRuntime;

  beforeEach(async () => {
    root = await makeTempDir();
    runtime = await makeRuntime(root);
  });

  afterEach(async () => {
    await runtime.close();
    await removeDir(root);
  });

  describe("create and inspect", () => {
    test("should return the created source byte for byte", async () => {
      const source = "// greets\nfunction greet(name) {\r\n  return 'hi ' + name; \n}\n";
      await runtime.createTool("greet", source);

      expect(runtime.inspect("greet")).toBe(source);
      expect(await runtime.execute("inspect_tool", ["greet"])).toBe(source);
    });

    test("should persist tools across runtimes", async () => {
      await runtime.createTool("tool_a", TOOL_A);

      const second = await makeRuntime(root);
      expect(second.list()).toEqual(["tool_a"]);
      expect(await second.execute("tool_a", ["x"])).toBe("x_A");
    });

    test("should leave store and namespace untouched when a create fails", async () => {
      await runtime.createTool("good", 'function good() { return "v1"; }');

      await expect(runtime.createTool("good", "function good( {")).rejects.toMatchObject({ code: "COMPILE_ERROR" });

      expect(await runtime.execute("good")).toBe("v1");
      expect(await fs.readFile(path.join(root, "tools", "good.js"), "utf8")).toBe('function good() { return "v1"; }');
    });

    test("should reject a source that does not define its function", async () => {
      await expect(runtime.createTool("nofn", "const nofn = 1;")).rejects.toThrow(
        "Compile error in nofn.js: does not define a function named nofn"
      );
      expect(runtime.list()).toEqual([]);
    });

    test("should reject top-level code that throws", async () => {
      await expect(runtime.createTool("loud", 'throw new Error("at load");\nfunction loud() {}')).rejects.toThrow(
        "Compile error in loud.js: top-level code threw Error: at load"
      );
    });

    test("should fail initialization when a stored tool is broken", async () => {
      await fs.writeFile(path.join(root, "tools", "bad.js"), "function bad( {");
      await expect(makeRuntime(root)).rejects.toMatchObject({ code: "COMPILE_ERROR" });
    });

    test("should emit ToolCreatedEvent with the overwrite flag", async () => {
      const seen: Array<{ name: string; overwritten: boolean }> = [];
      runtime.eventBus.on("ToolCreatedEvent", (evt) => {
        seen.push({ name: evt.payload.name, overwritten: evt.payload.overwritten });
      });

      await runtime.createTool("t", "function t() { return 1; }");
      await runtime.createTool("t", "function t() { return 2; }");

      expect(seen).toEqual([
        { name: "t", overwritten: false },
        { name: "t", overwritten: true },
      ]);
    });
  });

  describe("composition and overwrite", () => {
    test("should let one tool call another", async () => {
      await runtime.createTool("tool_a", TOOL_A);
      await runtime.createTool("tool_b", TOOL_B);

      expect(await runtime.execute("tool_b", ["test"])).toBe("test_A_B");
    });

    test("should keep only the latest source and behaviour after overwrite", async () => {
      await runtime.createTool("tool_a", TOOL_A);
      await runtime.createTool("tool_b", TOOL_B);
      const updated = 'function tool_a(x) { return x + "_Z"; }';
      await runtime.createTool("tool_a", updated);

      expect(runtime.inspect("tool_a")).toBe(updated);
      expect(await runtime.execute("tool_a", ["x"])).toBe("x_Z");
      expect(await runtime.execute("tool_b", ["x"])).toBe("x_Z_B");
      expect(runtime.list()).toEqual(["tool_a", "tool_b"]);
    });

    test("should keep a captured namespace unchanged after a rebuild", async () => {
      await runtime.createTool("t", 'function t() { return "old"; }');
      const before = runtime.registry.namespace;

      await runtime.createTool("t", 'function t() { return "new"; }');

      expect(before.invoke("t", [])).toBe("old");
      expect(runtime.registry.namespace.generation).toBeGreaterThan(before.generation);
      expect(await runtime.execute("t")).toBe("new");
    });

    test("should keep the stored and published tool when the write fails", async () => {
      await runtime.createTool("t", 'function t() { return "old"; }');
      const realRename = fs.rename;
      const rename = jest.spyOn(fs, "rename").mockImplementation(async (from, to) => {
        if (String(to).endsWith(`${path.sep}t.js`)) {
          throw Object.assign(new Error("no space left on device"), { code: "ENOSPC" });
        }
        return realRename(from, to);
      });

      try {
        await expect(runtime.registry.create("t", 'function t() { return "new"; }', "remote")).rejects.toMatchObject({
          code: "IO_ERROR",
        });
      } finally {
        rename.mockRestore();
      }

      expect(await runtime.execute("t")).toBe("old");
      const reloaded = await makeRuntime(root);
      expect(reloaded.registry.get("t")).toEqual({ name: "t", source: 'function t() { return "old"; }', origin: "local" });
    });

    test("should let executions interleaved with a create see a complete namespace", async () => {
      await runtime.createTool("tool_a", TOOL_A);

      const calls = Array.from({ length: 20 }, () => runtime.execute("tool_a", ["x"]));
      const creation = runtime.createTool("tool_a", 'function tool_a(x) { return x + "_Z"; }');
      const unrelated = runtime.createTool("other", "function other() { return 1; }");
      const results = await Promise.all(calls);
      await Promise.all([creation, unrelated]);

      for (const result of results) {
        expect(["x_A", "x_Z"]).toContain(result);
      }
      expect(await runtime.execute("tool_a", ["x"])).toBe("x_Z");
    });
  });

  describe("remove", () => {
    test("should remove a tool from listing, inspection and execution", async () => {
      await runtime.createTool("t", "function t() { return 1; }");
      await runtime.removeTool("t");

      expect(runtime.list()).toEqual([]);
      expect(await runtime.execute("list_tools")).toBe("[]");
      expect(() => runtime.inspect("t")).toThrow("Tool not found: t");
      await expect(runtime.execute("t")).rejects.toMatchObject({ code: "NOT_FOUND" });
      await expect(fs.access(path.join(root, "tools", "t.js"))).rejects.toMatchObject({ code: "ENOENT" });
    });

    test("should fail NotFound for an unknown tool", async () => {
      await expect(runtime.removeTool("ghost")).rejects.toMatchObject({ code: "NOT_FOUND" });
    });

    test("should turn a call into a removed dependency into a runtime error", async () => {
      await runtime.createTool("tool_a", TOOL_A);
      await runtime.createTool("tool_b", TOOL_B);
      await runtime.removeTool("tool_a");

      await expect(runtime.execute("tool_b", ["x"])).rejects.toMatchObject({
        code: "RUNTIME_ERROR",
        message: "Tool tool_b failed: ReferenceError: tool_a is not defined",
      });
    });

    test("should allow a tool to remove another through remove_tool", async () => {
      await runtime.createTool("victim", "function victim() {}");
      await runtime.createTool("cleanup", 'async function cleanup(n) { await remove_tool(n); return "removed " + n; }');

      expect(await runtime.execute("cleanup", ["victim"])).toBe("removed victim");
      expect(runtime.list()).toEqual(["cleanup"]);
    });
  });

  describe("execute", () => {
    test("should render return values as text", async () => {
      await runtime.createTool("num", "function num() { return 42; }");
      await runtime.createTool("obj", "function obj() { return { a: 1, b: [true, null] }; }");
      await runtime.createTool("nothing", "function nothing() {}");
      await runtime.createTool("nul", "function nul() { return null; }");
      await runtime.createTool("later", 'async function later(x) { return x + "!"; }');

      expect(await runtime.execute("num")).toBe("42");
      expect(await runtime.execute("obj")).toBe('{"a":1,"b":[true,null]}');
      expect(await runtime.execute("nothing")).toBe("");
      expect(await runtime.execute("nul")).toBe("null");
      expect(await runtime.execute("later", ["hi"])).toBe("hi!");
    });

    test("should pass arguments through unchanged", async () => {
      await runtime.createTool("echo", "function echo(x) { return x; }");
      const tricky = 'quote " backslash \\ newline \n and ${template}';

      expect(await runtime.execute("echo", [tricky])).toBe(tricky);
    });

    test("should fail NotFound for unknown names", async () => {
      await expect(runtime.execute("missing")).rejects.toMatchObject({
        code: "NOT_FOUND",
        message: "Tool not found: missing",
      });
    });

    test("should reject anything but zero or one string argument", async () => {
      await runtime.createTool("t", "function t(x) { return x; }");

      await expect(runtime.execute("t", ["a", "b"])).rejects.toMatchObject({
        code: "ARITY_MISMATCH",
        message: "t expects zero or one string argument, got 2 arguments",
      });
      await expect(runtime.execute("t", [5])).rejects.toMatchObject({
        code: "ARITY_MISMATCH",
        message: "t expects zero or one string argument, got one number argument",
      });
    });

    test("should wrap errors thrown by a tool", async () => {
      await runtime.createTool("boom", 'function boom() { throw new Error("boom"); }');
      await runtime.createTool("sour", 'async function sour() { throw new TypeError("sour"); }');

      await expect(runtime.execute("boom")).rejects.toMatchObject({
        code: "RUNTIME_ERROR",
        message: "Tool boom failed: Error: boom",
      });
      await expect(runtime.execute("sour")).rejects.toMatchObject({
        code: "RUNTIME_ERROR",
        message: "Tool sour failed: TypeError: sour",
      });
    });

    test("should expose natives to tools and directly", async () => {
      await runtime.createTool("b_tool", "function b_tool() { return list_tools().length; }");
      await runtime.createTool("a_tool", 'function a_tool() { return inspect_tool("a_tool").length; }');

      expect(await runtime.execute("list_tools")).toBe('["a_tool","b_tool"]');
      expect(await runtime.execute("b_tool")).toBe("2");
      expect(await runtime.execute("a_tool")).toBe(String(runtime.inspect("a_tool").length));
    });

    test("should wrap a native's error raised inside a tool", async () => {
      await runtime.createTool("peek", 'function peek() { return inspect_tool("ghost"); }');

      await expect(runtime.execute("peek")).rejects.toMatchObject({
        code: "RUNTIME_ERROR",
        causeCode: "NOT_FOUND",
        message: "Tool peek failed: Tool not found: ghost",
      });
    });

    test("should pass a native's own error through when called directly", async () => {
      await expect(runtime.execute("inspect_tool", ["ghost"])).rejects.toMatchObject({ code: "NOT_FOUND" });
      await expect(runtime.execute("read_file")).rejects.toMatchObject({ code: "ARITY_MISMATCH" });
    });
  });

  describe("timeouts", () => {
    let strict: ToolRuntime;
    let strictRoot: string;

    beforeEach(async () => {
      strictRoot = await makeTempDir();
      strict = await makeRuntime(strictRoot, { config: { timeouts: { scriptMs: 200, ioMs: 300, networkMs: 300 } } });
    });

    afterEach(async () => {
      await strict.close();
      await removeDir(strictRoot);
    });

    test("should stop a synchronous loop at the script timeout", async () => {
      await strict.createTool("spin", "function spin() { while (true) {} }");

      await expect(strict.execute("spin")).rejects.toMatchObject({
        code: "TIMEOUT",
        message: "tool spin timed out after 200ms",
      });
    });

    test("should stop a promise that never settles at the execution timeout", async () => {
      await strict.createTool("hang", "async function hang() { await new Promise(() => {}); }");

      await expect(strict.execute("hang")).rejects.toMatchObject({
        code: "TIMEOUT",
        message: "tool hang timed out after 300ms",
      });
    });

    test("should refuse a tool whose top-level code never finishes", async () => {
      await expect(strict.createTool("stuck", "while (true) {}\nfunction stuck() {}")).rejects.toThrow(
        "Compile error in stuck.js: top-level code timed out after 200ms"
      );
      expect(strict.list()).toEqual([]);
    });
  });
});
