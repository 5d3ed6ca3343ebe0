/**
 * Configuration Tests
 */

import fs from "fs/promises";
import path from "path";
import { CONFIG_FILE_NAME, DEFAULT_TIMEOUTS, loadConfig, packageRoot } from "../src/core/config";
import { ConfigError } from "../src/core/errors";
import { makeTempDir, removeDir } from "./helpers";

describe("loadConfig", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(cwd);
  });

  test("should apply defaults", () => {
    const config = loadConfig({ cwd, env: {} });

    expect(config.toolsDir).toBe(path.join(cwd, "tools"));
    expect(config.configFile).toBe(path.join(cwd, ".env"));
    expect(config.peer).toEqual({ host: "127.0.0.1", port: 8080 });
    expect(config.timeouts).toEqual(DEFAULT_TIMEOUTS);
    expect(config.scrapeWordLimit).toBe(200);
    expect(config.logger).toEqual({ level: "info", format: "pretty" });
    expect(config.executablePath).toBe(path.resolve(__dirname, ".."));
  });

  test("should find the package root above a nested directory", async () => {
    const nested = path.join(cwd, "pkg", "dist", "src", "core");
    await fs.mkdir(nested, { recursive: true });
    await fs.writeFile(path.join(cwd, "pkg", "package.json"), "{}");

    expect(packageRoot(nested)).toBe(path.join(cwd, "pkg"));
  });

  test("should read the config file", async () => {
    await fs.writeFile(
      path.join(cwd, CONFIG_FILE_NAME),
      JSON.stringify({
        toolsDir: "my-tools",
        peer: { port: 9000 },
        timeouts: { scriptMs: 250 },
        scrapeWordLimit: 50,
        logger: { level: "debug", format: "json" },
      })
    );

    const config = loadConfig({ cwd, env: {} });

    expect(config.toolsDir).toBe(path.join(cwd, "my-tools"));
    expect(config.peer).toEqual({ host: "127.0.0.1", port: 9000 });
    expect(config.timeouts).toEqual({ scriptMs: 250, ioMs: 10000, networkMs: 15000 });
    expect(config.scrapeWordLimit).toBe(50);
    expect(config.logger).toEqual({ level: "debug", format: "json" });
  });

  test("should let the environment override the file", async () => {
    await fs.writeFile(path.join(cwd, CONFIG_FILE_NAME), JSON.stringify({ toolsDir: "file-tools", peer: { port: 9000 } }));

    const config = loadConfig({
      cwd,
      env: {
        FORGE_TOOLS_DIR: "/srv/tools",
        FORGE_PEER_HOST: "0.0.0.0",
        FORGE_PEER_PORT: "0",
        FORGE_NETWORK_TIMEOUT_MS: "500",
        LOG_LEVEL: "warn",
      },
    });

    expect(config.toolsDir).toBe("/srv/tools");
    expect(config.peer).toEqual({ host: "0.0.0.0", port: 0 });
    expect(config.timeouts.networkMs).toBe(500);
    expect(config.logger.level).toBe("warn");
  });

  test("should reject malformed JSON", async () => {
    await fs.writeFile(path.join(cwd, CONFIG_FILE_NAME), "{ toolsDir: ");
    expect(() => loadConfig({ cwd, env: {} })).toThrow(ConfigError);
  });

  test("should reject unknown keys and wrong types", async () => {
    await fs.writeFile(path.join(cwd, CONFIG_FILE_NAME), JSON.stringify({ toolDir: "typo" }));
    expect(() => loadConfig({ cwd, env: {} })).toThrow("forge.config.json failed validation");

    await fs.writeFile(path.join(cwd, CONFIG_FILE_NAME), JSON.stringify({ timeouts: { scriptMs: -1 } }));
    expect(() => loadConfig({ cwd, env: {} })).toThrow(ConfigError);
  });

  test("should reject non-integer and zero timeouts from the environment", () => {
    expect(() => loadConfig({ cwd, env: { FORGE_SCRIPT_TIMEOUT_MS: "fast" } })).toThrow(
      "Invalid configuration: FORGE_SCRIPT_TIMEOUT_MS must be an integer >= 1"
    );
    expect(() => loadConfig({ cwd, env: { FORGE_IO_TIMEOUT_MS: "0" } })).toThrow(ConfigError);
  });
});
