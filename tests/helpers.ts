/**
 * Shared fixtures for runtime tests
 */

import fs from "fs/promises";
import os from "os";
import path from "path";
import { ToolRuntime, RuntimeConfig } from "../src/core/runtime";
import type { FetchInit, FetchLike, FetchResponse } from "../src/core/peer/peerClient";

export async function makeTempDir(prefix = "forge-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(root: string, overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    toolsDir: path.join(root, "tools"),
    configFile: path.join(root, ".env"),
    executablePath: path.join(root, "bin", "forge"),
    peer: { host: "127.0.0.1", port: 0 },
    timeouts: { scriptMs: 1000, ioMs: 2000, networkMs: 2000 },
    scrapeWordLimit: 200,
    ...overrides,
  };
}

export async function makeRuntime(
  root: string,
  options: { fetch?: FetchLike; config?: Partial<RuntimeConfig> } = {}
): Promise<ToolRuntime> {
  return new ToolRuntime({ config: testConfig(root, options.config), fetch: options.fetch }).initialize();
}

export function textResponse(status: number, body: string, statusText = status < 300 ? "OK" : "Error"): FetchResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: async () => body,
  };
}

export interface RecordedRequest {
  url: string;
  init?: FetchInit;
}

/**
 * Fake fetch answering every request with `respond`, recording what was asked.
 */
export function fakeFetch(respond: (url: string) => FetchResponse | Promise<FetchResponse>): {
  fetch: FetchLike;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (url, init) => {
    requests.push({ url, init });
    return respond(url);
  };
  return { fetch, requests };
}
