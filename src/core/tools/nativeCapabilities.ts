/**
 * Native capabilities: host functions injected into every tool namespace.
 *
 * Tools reach the file system, the network and the runtime itself only
 * through these. list_tools, inspect_tool and search answer synchronously;
 * everything that touches disk or network returns a promise bounded by the
 * matching timeout.
 */

import { constants as fsConstants } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { ArityMismatchError, IOError, ParseError, describeThrown } from "../errors";
import type { ExecutionTimeouts } from "../types";
import type { ForgeLogger } from "../logger";
import type { NativeBinding, NativeBindings } from "../tool-engine/namespace";
import { FetchLike, PeerClient, defaultFetch, fetchText } from "../peer/peerClient";
import { withTimeout } from "../utils/timeout";
import { NativeCapabilityName } from "./capabilityNames";

/**
 * The part of the runtime the catalog capabilities operate on.
 */
export interface ToolCatalog {
  list(): string[];
  inspect(name: string): string;
  remove(name: string): Promise<void>;
}

export interface NativeCapabilitiesOptions {
  catalog: ToolCatalog;
  timeouts: ExecutionTimeouts;
  toolsDir: string;
  configFile: string;
  executablePath: string;
  scrapeWordLimit: number;
  fetch?: FetchLike;
  peer?: PeerClient;
  logger?: ForgeLogger;
}

const ENTITIES: Record<string, string> = {
  nbsp: " ",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  "#39": "'",
};

const MAX_CODE_POINT = 0x10ffff;

/** Numeric references past the Unicode range stay as written. */
function fromCodePoint(match: string, code: number): string {
  return code <= MAX_CODE_POINT ? String.fromCodePoint(code) : match;
}

function decodeEntities(text: string): string {
  return text
    .replace(/&#(\d+);/g, (match, code: string) => fromCodePoint(match, Number(code)))
    .replace(/&#x([0-9a-f]+);/gi, (match, code: string) => fromCodePoint(match, parseInt(code, 16)))
    .replace(/&(nbsp|lt|gt|quot|apos|#39);/gi, (match, name: string) => ENTITIES[name.toLowerCase()] ?? match)
    .replace(/&amp;/gi, "&");
}

/**
 * Visible text of an HTML page's body, cut to the first `wordLimit` words.
 * @throws ParseError when the page has no `<body>`
 */
export function extractReadableText(html: string, wordLimit: number, url?: string): string {
  const body = /<body(?:\s[^>]*)?>([\s\S]*?)(?:<\/body>|$)/i.exec(html);
  if (!body) {
    throw new ParseError("no <body> element", url);
  }

  const text = decodeEntities(
    body[1]
      .replace(/<!--[\s\S]*?-->/g, " ")
      .replace(/<script[\s\S]*?<\/script>/gi, " ")
      .replace(/<style[\s\S]*?<\/style>/gi, " ")
      .replace(/<noscript[\s\S]*?<\/noscript>/gi, " ")
      .replace(/<[^>]+>/g, " ")
  );

  return text
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .slice(0, wordLimit)
    .join(" ");
}

function ioFailure(action: string, target: string, error: unknown): IOError {
  return new IOError(`${action} ${target}: ${describeThrown(error).message}`, target, error);
}

async function attempt<T>(action: string, target: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error: unknown) {
    throw ioFailure(action, target, error);
  }
}

/**
 * Check a call from tool code: exactly `params.length` string arguments.
 */
function stringArgs(capability: NativeCapabilityName, params: readonly string[], args: readonly unknown[]): string[] {
  const expected = params.length === 0 ? "no arguments" : `string arguments (${params.join(", ")})`;
  if (args.length !== params.length) {
    throw new ArityMismatchError(capability, expected, `${args.length} arguments`);
  }
  return args.map((value, index) => {
    if (typeof value !== "string") {
      throw new ArityMismatchError(capability, expected, `${typeof value} for ${params[index]}`);
    }
    return value;
  });
}

export class NativeCapabilities {
  private readonly catalog: ToolCatalog;
  private readonly timeouts: ExecutionTimeouts;
  private readonly fetchImpl: FetchLike;
  private readonly peer: PeerClient;

  constructor(private readonly options: NativeCapabilitiesOptions) {
    this.catalog = options.catalog;
    this.timeouts = options.timeouts;
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.peer = options.peer ?? new PeerClient({ fetch: this.fetchImpl, timeoutMs: options.timeouts.networkMs });
  }

  listTools(): string[] {
    return this.catalog.list();
  }

  inspectTool(name: string): string {
    return this.catalog.inspect(name);
  }

  async removeTool(name: string): Promise<void> {
    await withTimeout(this.catalog.remove(name), this.timeouts.ioMs, `remove_tool ${name}`);
  }

  async readFile(file: string): Promise<string> {
    const target = path.resolve(file);
    return withTimeout(
      attempt("cannot read", target, () => fs.readFile(target, "utf8")),
      this.timeouts.ioMs,
      `read_file ${file}`
    );
  }

  async writeFile(file: string, content: string): Promise<void> {
    const target = path.resolve(file);
    await withTimeout(
      attempt("cannot write", target, () => fs.writeFile(target, content, "utf8")),
      this.timeouts.ioMs,
      `write_file ${file}`
    );
  }

  /**
   * Stub: no search provider is wired in. The answer depends only on the query.
   */
  search(query: string): string {
    return `No search provider is configured. Query received: "${query}"`;
  }

  async scrapeUrl(url: string): Promise<string> {
    const html = await fetchText(
      this.fetchImpl,
      url,
      { method: "GET", headers: { Accept: "text/html" } },
      this.timeouts.networkMs,
      `scrape_url ${url}`
    );
    return extractReadableText(html, this.options.scrapeWordLimit, url);
  }

  /**
   * Copy the executable, the tool directory and the config file (when there is
   * one) into `targetDir`. Steps already done are not undone on failure.
   */
  async cloneAgent(targetDir: string): Promise<string> {
    const target = path.resolve(targetDir);
    const { executablePath, toolsDir, configFile } = this.options;

    const work = async (): Promise<string> => {
      await attempt("cannot create", target, () => fs.mkdir(target, { recursive: true }));

      const executable = await attempt("cannot stat", executablePath, () => fs.stat(executablePath));
      const executableCopy = path.join(target, path.basename(executablePath));
      if (executable.isDirectory()) {
        await attempt("cannot copy", executablePath, () => fs.cp(executablePath, executableCopy, { recursive: true }));
      } else {
        await attempt("cannot copy", executablePath, () => fs.copyFile(executablePath, executableCopy));
        await attempt("cannot chmod", executableCopy, () => fs.chmod(executableCopy, 0o755));
      }

      await attempt("cannot copy", toolsDir, () => fs.cp(toolsDir, path.join(target, "tools"), { recursive: true }));

      if (await exists(configFile)) {
        const configCopy = path.join(target, path.basename(configFile));
        await attempt("cannot copy", configFile, () => fs.copyFile(configFile, configCopy));
      }
      return `Agent cloned to ${target}`;
    };

    return withTimeout(work(), this.timeouts.ioMs, `clone_agent ${targetDir}`);
  }

  async sendMessage(url: string, body: string): Promise<string> {
    return this.peer.send(url, body);
  }

  /**
   * Host functions for a namespace. Arguments from tool code are checked
   * before they reach the methods above. A promise handed to tool code already
   * has a rejection handler, so a tool that never awaits it cannot leave an
   * unhandled rejection behind.
   */
  bindings(): NativeBindings {
    const bind =
      (capability: NativeCapabilityName, params: readonly string[], run: (args: string[]) => unknown): NativeBinding =>
      (...args: unknown[]) =>
        this.observe(capability, run(stringArgs(capability, params, args)));

    return {
      list_tools: bind("list_tools", [], () => this.listTools()),
      inspect_tool: bind("inspect_tool", ["name"], ([name]) => this.inspectTool(name)),
      remove_tool: bind("remove_tool", ["name"], ([name]) => this.removeTool(name)),
      read_file: bind("read_file", ["path"], ([file]) => this.readFile(file)),
      write_file: bind("write_file", ["path", "content"], ([file, content]) => this.writeFile(file, content)),
      search: bind("search", ["query"], ([query]) => this.search(query)),
      scrape_url: bind("scrape_url", ["url"], ([url]) => this.scrapeUrl(url)),
      clone_agent: bind("clone_agent", ["targetDir"], ([dir]) => this.cloneAgent(dir)),
      send_message: bind("send_message", ["url", "body"], ([url, body]) => this.sendMessage(url, body)),
    };
  }

  private observe(capability: NativeCapabilityName, value: unknown): unknown {
    if (value instanceof Promise) {
      void value.catch((error: unknown) => {
        this.options.logger?.debug(`${capability} rejected`, { capability, error: describeThrown(error).message });
      });
    }
    return value;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}
