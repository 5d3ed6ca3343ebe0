/**
 * Runtime configuration
 *
 * Sources, lowest precedence first: built-in defaults, `forge.config.json` in the
 * working directory, environment variables.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { ExecutionTimeouts } from "./types";
import { LogFormat, LogLevel, parseLogFormat, parseLogLevel } from "./logger/config";

export const CONFIG_FILE_NAME = "forge.config.json";

const positiveInt = z.number().int().positive();

const FileConfigSchema = z
  .object({
    toolsDir: z.string().min(1).optional(),
    configFile: z.string().min(1).optional(),
    executablePath: z.string().min(1).optional(),
    peer: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
      })
      .strict()
      .optional(),
    timeouts: z
      .object({
        scriptMs: positiveInt.optional(),
        ioMs: positiveInt.optional(),
        networkMs: positiveInt.optional(),
      })
      .strict()
      .optional(),
    scrapeWordLimit: positiveInt.optional(),
    logger: z
      .object({
        level: z.string().optional(),
        format: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface ForgeConfig {
  toolsDir: string;
  /** Optional configuration file copied alongside the tools by clone_agent */
  configFile: string;
  /** What clone_agent copies as "the running executable"; the package root by default */
  executablePath: string;
  peer: { host: string; port: number };
  timeouts: ExecutionTimeouts;
  scrapeWordLimit: number;
  logger: { level: LogLevel; format: LogFormat };
}

export const DEFAULT_TIMEOUTS: ExecutionTimeouts = {
  scriptMs: 5000,
  ioMs: 10000,
  networkMs: 15000,
};

/**
 * The installed package (the directory holding package.json above this file).
 * clone_agent copies it whole, so the clone keeps `dist/` and its dependencies.
 */
export function packageRoot(from: string = __dirname): string {
  let dir = from;
  while (!fs.existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) return from;
    dir = parent;
  }
  return dir;
}

function readConfigFile(cwd: string): FileConfig {
  const p = path.join(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(p)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    throw new ConfigError(`${CONFIG_FILE_NAME} is not valid JSON (${err.message})`, { path: p });
  }

  const result = FileConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`${CONFIG_FILE_NAME} failed validation`, {
      path: p,
      issues: result.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return result.data;
}

function envInt(env: NodeJS.ProcessEnv, key: string, min = 1): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}`, { key, value: raw });
  }
  return value;
}

export function loadConfig(options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): ForgeConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const file = readConfigFile(cwd);

  const resolve = (p: string) => path.resolve(cwd, p);

  return {
    toolsDir: resolve(env.FORGE_TOOLS_DIR || file.toolsDir || "tools"),
    configFile: resolve(env.FORGE_CONFIG_FILE || file.configFile || ".env"),
    executablePath: resolve(env.FORGE_EXECUTABLE || file.executablePath || packageRoot()),
    peer: {
      host: env.FORGE_PEER_HOST || file.peer?.host || "127.0.0.1",
      port: envInt(env, "FORGE_PEER_PORT", 0) ?? file.peer?.port ?? 8080,
    },
    timeouts: {
      scriptMs: envInt(env, "FORGE_SCRIPT_TIMEOUT_MS") ?? file.timeouts?.scriptMs ?? DEFAULT_TIMEOUTS.scriptMs,
      ioMs: envInt(env, "FORGE_IO_TIMEOUT_MS") ?? file.timeouts?.ioMs ?? DEFAULT_TIMEOUTS.ioMs,
      networkMs: envInt(env, "FORGE_NETWORK_TIMEOUT_MS") ?? file.timeouts?.networkMs ?? DEFAULT_TIMEOUTS.networkMs,
    },
    scrapeWordLimit: file.scrapeWordLimit ?? 200,
    logger: {
      level: parseLogLevel(env.LOG_LEVEL || file.logger?.level),
      format: parseLogFormat(env.LOG_FORMAT || file.logger?.format),
    },
  };
}
