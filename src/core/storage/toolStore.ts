/**
 * Disk-backed tool store.
 *
 * Layout: one `<name>.js` file per tool inside `dir`, plus a `.origins.json`
 * manifest recording which tools came from a peer. Every write goes to a
 * dot-prefixed temp file first and is renamed into place, so a reader never
 * sees a half-written tool.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { ulid } from "ulid";
import { IOError, NotFoundError, describeThrown } from "../errors";
import type { Tool, ToolOrigin } from "../types";

export const TOOL_FILE_EXTENSION = ".js";
const ORIGINS_FILE = ".origins.json";

type OriginManifest = Record<string, ToolOrigin>;

function isErrno(error: unknown, code: string): boolean {
  return describeThrown(error).code === code;
}

function ioError(action: string, target: string, error: unknown): IOError {
  return new IOError(`${action} ${target}: ${describeThrown(error).message}`, target, error);
}

/** `origins` itself when nothing changes; local tools are not listed. */
function withOrigin(origins: OriginManifest, name: string, origin: ToolOrigin): OriginManifest {
  if ((origins[name] ?? "local") === origin) return origins;
  const updated = { ...origins };
  if (origin === "local") {
    delete updated[name];
  } else {
    updated[name] = origin;
  }
  return updated;
}

export class ToolStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  async initialize(): Promise<this> {
    try {
      await fs.mkdir(this.dir, { recursive: true });
    } catch (error) {
      throw ioError("cannot create tool directory", this.dir, error);
    }
    return this;
  }

  fileFor(name: string): string {
    return path.join(this.dir, `${name}${TOOL_FILE_EXTENSION}`);
  }

  /**
   * Every stored tool, sorted by name.
   */
  async loadAll(): Promise<Tool[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (isErrno(error, "ENOENT")) return [];
      throw ioError("cannot list", this.dir, error);
    }

    const names = entries
      .filter((entry) => !entry.startsWith(".") && entry.endsWith(TOOL_FILE_EXTENSION))
      .map((entry) => entry.slice(0, -TOOL_FILE_EXTENSION.length))
      .sort();

    const origins = await this.readOrigins();
    const tools: Tool[] = [];
    for (const name of names) {
      const source = await this.readSource(name);
      if (source === undefined) continue; // removed between readdir and read
      tools.push({ name, source, origin: origins[name] ?? "local" });
    }
    return tools;
  }

  async read(name: string): Promise<Tool> {
    const source = await this.readSource(name);
    if (source === undefined) throw new NotFoundError("tool", name);
    const origins = await this.readOrigins();
    return { name, source, origin: origins[name] ?? "local" };
  }

  async has(name: string): Promise<boolean> {
    try {
      await fs.access(this.fileFor(name));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * The manifest is written before the tool file, and put back if the tool
   * write fails, so a failed save leaves the store as it was.
   */
  async save(name: string, source: string, origin: ToolOrigin = "local"): Promise<void> {
    const origins = await this.readOrigins();
    const updated = withOrigin(origins, name, origin);
    if (updated !== origins) await this.writeOrigins(updated);

    try {
      await this.writeAtomic(this.fileFor(name), source);
    } catch (error) {
      if (updated !== origins) await this.writeOrigins(origins);
      throw error;
    }
  }

  /**
   * @throws NotFoundError
   */
  async delete(name: string): Promise<void> {
    if ((await this.readSource(name)) === undefined) throw new NotFoundError("tool", name);

    const origins = await this.readOrigins();
    const updated = withOrigin(origins, name, "local");
    if (updated !== origins) await this.writeOrigins(updated);

    try {
      await fs.unlink(this.fileFor(name));
    } catch (error) {
      if (updated !== origins) await this.writeOrigins(origins);
      if (isErrno(error, "ENOENT")) throw new NotFoundError("tool", name);
      throw ioError("cannot delete", this.fileFor(name), error);
    }
  }

  private async readSource(name: string): Promise<string | undefined> {
    const file = this.fileFor(name);
    try {
      return await fs.readFile(file, "utf8");
    } catch (error) {
      if (isErrno(error, "ENOENT")) return undefined;
      throw ioError("cannot read", file, error);
    }
  }

  private async readOrigins(): Promise<OriginManifest> {
    const file = path.join(this.dir, ORIGINS_FILE);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (error) {
      if (isErrno(error, "ENOENT")) return {};
      throw ioError("cannot read", file, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw ioError("corrupt origin manifest", file, error);
    }

    const manifest: OriginManifest = {};
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      for (const [name, origin] of Object.entries(parsed)) {
        if (origin === "remote" || origin === "local") manifest[name] = origin;
      }
    }
    return manifest;
  }

  private async writeOrigins(origins: OriginManifest): Promise<void> {
    await this.writeAtomic(path.join(this.dir, ORIGINS_FILE), JSON.stringify(origins, null, 2));
  }

  private async writeAtomic(target: string, content: string): Promise<void> {
    const tmp = path.join(this.dir, `.${path.basename(target)}.${ulid()}.tmp`);
    try {
      await fs.writeFile(tmp, content, "utf8");
      await fs.rename(tmp, target);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw ioError("cannot write", target, error);
    }
  }
}
