/**
 * Namespace: one immutable snapshot of every loaded tool plus the native
 * capabilities, evaluated together in a single script context.
 *
 * A namespace is never mutated after it is built. The registry swaps whole
 * snapshots, so a call that captured one keeps seeing the same definitions.
 */

import vm from "vm";
import { format } from "util";
import { CompileError, TimeoutError, describeThrown } from "../errors";
import type { Tool, ToolArgs } from "../types";
import type { NativeCapabilityName } from "../tools/capabilityNames";
import type { ForgeLogger } from "../logger";
import { compile } from "./compiler";

export type NativeBinding = (...args: unknown[]) => unknown;
export type NativeBindings = Record<NativeCapabilityName, NativeBinding>;

export interface NamespaceOptions {
  generation: number;
  natives: NativeBindings;
  scriptTimeoutMs: number;
  logger?: ForgeLogger;
}

const SCRIPT_TIMEOUT_CODE = "ERR_SCRIPT_EXECUTION_TIMEOUT";

function scriptConsole(logger: ForgeLogger | undefined): Record<string, (...args: unknown[]) => void> {
  const write = (level: "debug" | "info" | "warn") => (...args: unknown[]) => {
    logger?.[level](format(...args), { type: "tool_console" });
  };
  return { log: write("info"), info: write("info"), debug: write("debug"), warn: write("warn"), error: write("warn") };
}

export class Namespace {
  private constructor(
    readonly generation: number,
    private readonly tools: ReadonlyMap<string, Tool>,
    private readonly context: vm.Context,
    private readonly nativeNames: ReadonlySet<string>,
    private readonly scriptTimeoutMs: number
  ) {}

  /**
   * Compile every tool and evaluate them, in name order, in one fresh context.
   * @throws CompileError if a tool fails to parse, its top-level code throws,
   *   or it does not define a function under its own name
   */
  static build(tools: readonly Tool[], options: NamespaceOptions): Namespace {
    const ordered = [...tools].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    const units = ordered.map((tool) => compile(tool.name, tool.source));

    const globals: Record<string, unknown> = { ...options.natives, console: scriptConsole(options.logger) };
    const context = vm.createContext(globals, { name: `tools#${options.generation}` });

    for (const unit of units) {
      try {
        unit.script.runInContext(context, { timeout: options.scriptTimeoutMs });
      } catch (error: unknown) {
        const thrown = describeThrown(error);
        const reason =
          thrown.code === SCRIPT_TIMEOUT_CODE
            ? `top-level code timed out after ${options.scriptTimeoutMs}ms`
            : `top-level code threw ${thrown.name}: ${thrown.message}`;
        throw new CompileError({ file: unit.filename }, reason);
      }
    }

    for (const unit of units) {
      if (typeof globals[unit.name] !== "function") {
        throw new CompileError({ file: unit.filename }, `does not define a function named ${unit.name}`);
      }
    }

    return new Namespace(
      options.generation,
      new Map(ordered.map((tool) => [tool.name, tool])),
      context,
      new Set(Object.keys(options.natives)),
      options.scriptTimeoutMs
    );
  }

  /** Tool or native capability */
  has(name: string): boolean {
    return this.tools.has(name) || this.nativeNames.has(name);
  }

  isNative(name: string): boolean {
    return this.nativeNames.has(name) && !this.tools.has(name);
  }

  toolNames(): string[] {
    return [...this.tools.keys()];
  }

  tool(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /**
   * Call `name` inside the context. The synchronous part runs under the script
   * timeout; a returned promise is handed back unawaited.
   * @throws TimeoutError when the synchronous part runs too long; anything the
   *   callee throws is rethrown unchanged
   */
  invoke(name: string, args: ToolArgs): unknown {
    const values: readonly string[] = args;
    const call = `${name}(${values.map((arg) => JSON.stringify(arg)).join(", ")})`;
    try {
      return new vm.Script(call, { filename: `<call ${name}>` }).runInContext(this.context, {
        timeout: this.scriptTimeoutMs,
      });
    } catch (error: unknown) {
      if (describeThrown(error).code === SCRIPT_TIMEOUT_CODE) {
        throw new TimeoutError(`tool ${name}`, this.scriptTimeoutMs);
      }
      throw error;
    }
  }
}
