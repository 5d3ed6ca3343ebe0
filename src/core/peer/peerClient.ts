/**
 * Outbound side of peer messaging: POST a JSON body to another runtime's
 * gateway and hand back whatever it answered.
 */

import fetch from "node-fetch";
import { ForgeError, NetworkError, TimeoutError, describeThrown } from "../errors";
import { withTimeout } from "../utils/timeout";

export interface FetchInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  /** node-fetch socket timeout in ms */
  timeout?: number;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

/** The subset of fetch the runtime uses; tests pass a fake. */
export type FetchLike = (url: string, init?: FetchInit) => Promise<FetchResponse>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

/**
 * Fetch `url` and read the body, under one deadline.
 * @throws NetworkError on transport failure or a non-2xx status
 * @throws TimeoutError past `timeoutMs`
 */
export async function fetchText(
  fetchImpl: FetchLike,
  url: string,
  init: FetchInit,
  timeoutMs: number,
  operation: string
): Promise<string> {
  const request = async (): Promise<string> => {
    const res = await fetchImpl(url, { ...init, timeout: timeoutMs });
    const text = await res.text();
    if (!res.ok) {
      throw new NetworkError(`${res.status} ${res.statusText}`.trim(), url, res.status);
    }
    return text;
  };

  try {
    return await withTimeout(request(), timeoutMs, operation);
  } catch (error: unknown) {
    if (error instanceof ForgeError) throw error;
    const thrown = describeThrown(error);
    // node-fetch reports its own socket timeout as a FetchError
    if (error !== null && typeof error === "object" && "type" in error && error.type === "request-timeout") {
      throw new TimeoutError(operation, timeoutMs);
    }
    throw new NetworkError(thrown.message, url);
  }
}

/**
 * A body that already is a JSON object goes out as-is; anything else is
 * wrapped as a generic message.
 */
export function toWireBody(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
      return body;
    }
  } catch {
    // plain text
  }
  return JSON.stringify({ message: body });
}

export interface PeerClientOptions {
  fetch?: FetchLike;
  timeoutMs: number;
}

export class PeerClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: PeerClientOptions) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * @returns the raw response text
   */
  async send(url: string, body: string): Promise<string> {
    return fetchText(
      this.fetchImpl,
      url,
      { method: "POST", headers: { "Content-Type": "application/json" }, body: toWireBody(body) },
      this.timeoutMs,
      `send_message to ${url}`
    );
  }

  /**
   * Offer a tool to a peer; it lands in the peer's approval queue.
   */
  async shareTool(url: string, name: string, source: string): Promise<string> {
    return this.send(url, JSON.stringify({ name, source }));
  }
}
