/**
 * Pino transport configurations for different output targets
 */

import type { TransportTargetOptions } from "pino";
import { FileTransportConfig, LogLevel } from "./config";

export function createPrettyTransport(level: LogLevel): TransportTargetOptions {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
    level,
  };
}

export function createStdoutTransport(level: LogLevel): TransportTargetOptions {
  return {
    target: "pino/file",
    options: { destination: 1 },
    level,
  };
}

export function createFileTransport(config: FileTransportConfig): TransportTargetOptions {
  return {
    target: "pino/file",
    options: {
      destination: config.path,
      mkdir: true,
      sync: false,
    },
    level: "info",
  };
}
