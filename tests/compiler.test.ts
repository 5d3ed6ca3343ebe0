/**
 * Script Compiler Tests
 */

import { CompileError } from "../src/core/errors";
import { MAX_SOURCE_LENGTH, compile, validateToolDefinition } from "../src/core/tool-engine/compiler";

describe("compile", () => {
  test("should compile a valid tool", () => {
    const unit = compile("square", "function square(x) { return x * x; }");
    expect(unit.name).toBe("square");
    expect(unit.filename).toBe("square.js");
  });

  test("should report syntax errors as CompileError with the file", () => {
    let caught: unknown;
    try {
      compile("broken", "function broken(x) {\n  return x +;\n}");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CompileError);
    expect(caught).toMatchObject({
      code: "COMPILE_ERROR",
      location: { file: "broken.js" },
      message: expect.stringContaining("SyntaxError"),
    });
  });

  test.each(["1abc", "has-dash", "with space", "", "a".repeat(65)])("should reject invalid name %p", (name) => {
    expect(() => validateToolDefinition(name, "function x() {}")).toThrow(CompileError);
  });

  test("should accept identifier names with $ and _", () => {
    expect(() => validateToolDefinition("$_tool2", "function $_tool2() {}")).not.toThrow();
  });

  test.each(["console", "Object", "JSON", "__proto__", "constructor", "toString"])(
    "should reject the context global name %p",
    (name) => {
      expect(() => validateToolDefinition(name, `function ${name}() {}`)).toThrow(
        `Compile error in ${name}.js: "${name}" is a built-in global of the tool context`
      );
    }
  );

  test("should reject names that shadow native capabilities", () => {
    expect(() => compile("read_file", "function read_file() {}")).toThrow("native capability");
  });

  test("should reject oversized sources", () => {
    const source = `function big() {}\n//${"x".repeat(MAX_SOURCE_LENGTH)}`;
    expect(() => compile("big", source)).toThrow(CompileError);
  });
});
