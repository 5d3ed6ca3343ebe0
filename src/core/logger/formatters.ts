/**
 * Custom Pino formatters for structured logging
 */

import type { LoggerOptions } from "pino";
import { LoggerConfig } from "./config";

export function createFormatter(config: LoggerConfig): NonNullable<LoggerOptions["formatters"]> {
  return {
    level: (label: string) => {
      return { level: label };
    },

    log: (obj: Record<string, unknown>) => {
      if (config.source) {
        obj.source = config.source;
      }

      if (!obj.correlationId && obj.requestId) {
        obj.correlationId = obj.requestId;
      }

      return obj;
    },
  };
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(2);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Shorten long strings (tool sources, message bodies) before they reach a log line
 */
export function truncateForLog(value: string, max = 120): string {
  if (value.length <= max) return value;
  return `${value.slice(0, max)}… (${value.length} chars)`;
}
