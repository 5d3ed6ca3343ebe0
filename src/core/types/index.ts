/**
 * Core type definitions shared across the runtime
 */

export type ToolOrigin = "local" | "remote";

/**
 * A named, persisted, executable unit of logic.
 * `name` doubles as the identifier of the function the source defines.
 */
export interface Tool {
  name: string;
  source: string;
  origin: ToolOrigin;
}

/**
 * Arguments accepted by a tool call: nothing, or a single string.
 */
export type ToolArgs = readonly [] | readonly [string];

export interface ExecutionTimeouts {
  /** Synchronous script evaluation (top-level code and the sync part of a call) */
  scriptMs: number;
  /** Filesystem-backed capabilities */
  ioMs: number;
  /** Network-backed capabilities and the async tail of a call */
  networkMs: number;
}
