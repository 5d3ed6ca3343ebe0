/**
 * Tool registry: owns the published namespace and every change to it.
 *
 * - create/remove build a candidate namespace first, then write the store,
 *   then publish; a failure at any step leaves the published namespace alone
 * - execute captures the published snapshot once and runs against it
 * - all writes go through the shared WriteLock; reads never wait on it
 */

import { EventBus } from "../eventBus";
import {
  ArityMismatchError,
  ForgeError,
  NotFoundError,
  TimeoutError,
  ToolExecutionError,
  describeThrown,
} from "../errors";
import type { ForgeLogger } from "../logger";
import { ToolStore } from "../storage/toolStore";
import type { ExecutionTimeouts, Tool, ToolArgs, ToolOrigin } from "../types";
import { WriteLock } from "../utils/writeLock";
import { withTimeout } from "../utils/timeout";
import { compile } from "./compiler";
import { Namespace, NativeBindings } from "./namespace";

export interface ToolRegistryOptions {
  store: ToolStore;
  eventBus: EventBus;
  lock: WriteLock;
  timeouts: ExecutionTimeouts;
  /** Called on every rebuild; the bindings may close over the registry itself */
  natives: () => NativeBindings;
  logger?: ForgeLogger;
}

export interface CreateResult {
  name: string;
  overwritten: boolean;
  generation: number;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

/**
 * Text form of a tool's return value.
 */
export function renderValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "";
  if (typeof value === "function") return "[Function]";
  if (value === null || typeof value !== "object") return String(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // cyclic structures
    return String(value);
  }
}

function toToolArgs(name: string, args: readonly unknown[]): ToolArgs {
  if (args.length === 0) return [];
  const [first] = args;
  if (args.length === 1 && typeof first === "string") return [first];
  const received = args.length === 1 ? `one ${typeof first} argument` : `${args.length} arguments`;
  throw new ArityMismatchError(name, "zero or one string argument", received);
}

export class ToolRegistry {
  private current: Namespace;
  private generation = 0;
  private readonly store: ToolStore;
  private readonly eventBus: EventBus;
  private readonly lock: WriteLock;
  private readonly timeouts: ExecutionTimeouts;
  private readonly natives: () => NativeBindings;
  private readonly logger?: ForgeLogger;

  constructor(options: ToolRegistryOptions) {
    this.store = options.store;
    this.eventBus = options.eventBus;
    this.lock = options.lock;
    this.timeouts = options.timeouts;
    this.natives = options.natives;
    this.logger = options.logger;
    this.current = this.rebuild([]);
  }

  /**
   * Load every stored tool and publish the result.
   * @throws CompileError if any stored tool is broken; nothing is published then
   */
  async initialize(): Promise<this> {
    await this.lock.run(async () => {
      await this.store.initialize();
      this.publish(this.rebuild(await this.store.loadAll()));
    });
    return this;
  }

  /** The published snapshot */
  get namespace(): Namespace {
    return this.current;
  }

  /**
   * Build a candidate namespace from `tools`. Does not publish it.
   * @throws CompileError
   */
  rebuild(tools: readonly Tool[]): Namespace {
    this.generation++;
    return Namespace.build(tools, {
      generation: this.generation,
      natives: this.natives(),
      scriptTimeoutMs: this.timeouts.scriptMs,
      logger: this.logger,
    });
  }

  async create(name: string, source: string, origin: ToolOrigin = "local"): Promise<CreateResult> {
    return this.lock.run(() => this.install({ name, source, origin }));
  }

  /**
   * Compile, store and publish one tool. The caller must hold the write lock;
   * the approval queue uses this from inside its own locked operations.
   * @throws CompileError before anything is written
   */
  async install(tool: Tool): Promise<CreateResult> {
    this.assertLocked("install");
    compile(tool.name, tool.source);

    const stored = await this.store.loadAll();
    const overwritten = stored.some((t) => t.name === tool.name);
    const candidate = this.rebuild([...stored.filter((t) => t.name !== tool.name), tool]);

    await this.store.save(tool.name, tool.source, tool.origin);
    this.publish(candidate);

    this.eventBus.emit("ToolCreatedEvent", { name: tool.name, origin: tool.origin, overwritten });
    return { name: tool.name, overwritten, generation: candidate.generation };
  }

  async remove(name: string): Promise<void> {
    await this.lock.run(() => this.uninstall(name));
  }

  /**
   * @throws NotFoundError when no stored tool has that name
   * @throws CompileError when a remaining tool depended on the removed one at load time
   */
  private async uninstall(name: string): Promise<void> {
    this.assertLocked("uninstall");
    const stored = await this.store.loadAll();
    if (!stored.some((t) => t.name === name)) {
      throw new NotFoundError("tool", name);
    }

    const candidate = this.rebuild(stored.filter((t) => t.name !== name));
    await this.store.delete(name);
    this.publish(candidate);

    this.eventBus.emit("ToolRemovedEvent", { name });
  }

  /**
   * Run a tool or native capability against the snapshot published at call time.
   * @throws NotFoundError | ArityMismatchError | ToolExecutionError | TimeoutError,
   *   or the native capability's own error
   */
  async execute(name: string, args: readonly unknown[] = []): Promise<string> {
    const namespace = this.current;
    if (!namespace.has(name)) {
      throw new NotFoundError("tool", name);
    }
    const toolArgs = toToolArgs(name, args);

    this.eventBus.emit("ToolInvocationEvent", { name, args: [...toolArgs], generation: namespace.generation });
    const started = Date.now();

    try {
      const raw = namespace.invoke(name, toolArgs);
      const value = isThenable(raw)
        ? await withTimeout(Promise.resolve(raw), this.timeouts.networkMs, `tool ${name}`)
        : raw;
      const rendered = renderValue(value);

      const durationMs = Date.now() - started;
      this.eventBus.emit("ToolResultEvent", { name, durationMs });
      this.logger?.traceToolExecution(name, toolArgs, durationMs, true);
      return rendered;
    } catch (error: unknown) {
      const failure = this.toFailure(name, namespace.isNative(name), error);
      const durationMs = Date.now() - started;
      this.eventBus.emit("ToolErrorEvent", { name, code: failure.code, message: failure.message });
      this.logger?.traceToolExecution(name, toolArgs, durationMs, false, failure.message);
      throw failure;
    }
  }

  /** Names of loaded tools, sorted; natives are not included */
  list(): string[] {
    return this.current.toolNames();
  }

  /**
   * @throws NotFoundError
   */
  inspect(name: string): string {
    const tool = this.current.tool(name);
    if (!tool) throw new NotFoundError("tool", name);
    return tool.source;
  }

  /** The loaded tool with its origin, if any */
  get(name: string): Tool | undefined {
    return this.current.tool(name);
  }

  private publish(namespace: Namespace): void {
    const started = Date.now();
    this.current = namespace;
    this.eventBus.emit("NamespaceRebuiltEvent", {
      generation: namespace.generation,
      tools: namespace.toolNames(),
      durationMs: Date.now() - started,
    });
  }

  private toFailure(name: string, native: boolean, error: unknown): ForgeError {
    if (error instanceof TimeoutError) return error;
    if (error instanceof ForgeError) {
      return native ? error : new ToolExecutionError(name, error.message, error.code);
    }
    const thrown = describeThrown(error);
    return new ToolExecutionError(name, `${thrown.name}: ${thrown.message}`);
  }

  private assertLocked(operation: string): void {
    if (!this.lock.busy) {
      throw new Error(`${operation} must run inside the write lock`);
    }
  }
}
