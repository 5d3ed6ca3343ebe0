/**
 * Runtime logger - Pino-based structured logging
 *
 * - structured JSON logging with Pino
 * - pretty console output through pino-pretty
 * - optional file target
 * - EventBus integration: tool and proposal lifecycle events are logged
 */

import pino from "pino";
import { EventBus, EventType } from "../eventBus";
import { LoggerConfig, createLoggerConfig } from "./config";
import { createFileTransport, createPrettyTransport, createStdoutTransport } from "./transports";
import { createFormatter, formatDuration, truncateForLog } from "./formatters";

export interface LoggerContext {
  toolName?: string;
  proposalId?: string;
  senderId?: string;
  requestId?: string;
  correlationId?: string;
  [key: string]: unknown;
}

type PinoLevel = "debug" | "info" | "warn";

const EVENT_LOG_MAPPINGS: ReadonlyArray<{ event: EventType; level: PinoLevel; message: string }> = [
  { event: "ToolCreatedEvent", level: "info", message: "Tool saved" },
  { event: "ToolRemovedEvent", level: "info", message: "Tool removed" },
  { event: "NamespaceRebuiltEvent", level: "debug", message: "Namespace published" },
  { event: "ToolInvocationEvent", level: "debug", message: "Tool invoked" },
  { event: "ToolResultEvent", level: "debug", message: "Tool completed" },
  { event: "ToolErrorEvent", level: "warn", message: "Tool error" },
  { event: "ProposalQueuedEvent", level: "info", message: "Tool proposal queued" },
  { event: "ProposalApprovedEvent", level: "info", message: "Tool proposal approved" },
  { event: "ProposalRejectedEvent", level: "info", message: "Tool proposal rejected" },
  { event: "PeerMessageEvent", level: "info", message: "Peer message received" },
];

export class ForgeLogger {
  private pinoLogger: pino.Logger;
  private readonly config: LoggerConfig;

  constructor(private eventBus: EventBus, config: Partial<LoggerConfig> = {}, base?: pino.Logger) {
    this.config = createLoggerConfig(config);
    this.pinoLogger = base ?? this.createPinoLogger();
  }

  private createPinoLogger(): pino.Logger {
    const options: pino.LoggerOptions = {
      level: this.config.level,
      formatters: createFormatter(this.config),
      serializers: {
        err: pino.stdSerializers.err,
      },
    };

    const useFile = this.config.file?.enabled === true;

    // Plain JSON to stdout needs no worker thread.
    if (this.config.level === "silent" || (this.config.format === "json" && !useFile)) {
      return pino(options);
    }

    const targets: pino.TransportTargetOptions[] = [
      this.config.format === "pretty"
        ? createPrettyTransport(this.config.level)
        : createStdoutTransport(this.config.level),
    ];
    if (useFile && this.config.file) {
      targets.push(createFileTransport(this.config.file));
    }

    return pino(options, pino.transport({ targets }));
  }

  /**
   * Subscribe to the event bus. Call once per bus.
   */
  attachEventBus(): void {
    for (const { event, level, message } of EVENT_LOG_MAPPINGS) {
      this.eventBus.on(event, (evt) => {
        this.pinoLogger[level](
          {
            event,
            payload: evt.payload,
            type: "eventbus",
            correlationId: evt.id,
          },
          message
        );
      });
    }
  }

  child(context: LoggerContext): ForgeLogger {
    return new ForgeLogger(this.eventBus, this.config, this.pinoLogger.child(context));
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context || {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context || {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context || {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  traceRequest(method: string, url: string, statusCode: number, duration: number, context?: LoggerContext): void {
    const level = statusCode >= 400 ? "warn" : "info";
    this.pinoLogger[level](
      {
        ...context,
        method,
        url,
        statusCode,
        duration,
        type: "request",
      },
      `${method} ${url} ${statusCode} (${formatDuration(duration)})`
    );
  }

  traceToolExecution(toolName: string, args: readonly unknown[], duration: number, success: boolean, error?: string, context?: LoggerContext): void {
    const level = success ? "debug" : "warn";
    this.pinoLogger[level](
      {
        ...context,
        toolName,
        args: args.map((arg) => (typeof arg === "string" ? truncateForLog(arg) : arg)),
        duration,
        success,
        error,
        type: "tool_execution",
      },
      `Tool ${toolName} ${success ? "succeeded" : "failed"} (${formatDuration(duration)})`
    );
  }

  flush(): void {
    this.pinoLogger.flush();
  }
}

let globalLogger: ForgeLogger | null = null;

/**
 * Initialize the process-wide logger and wire it to the event bus
 */
export function initializeLogger(eventBus: EventBus, config: Partial<LoggerConfig> = {}): ForgeLogger {
  globalLogger = new ForgeLogger(eventBus, config);
  globalLogger.attachEventBus();
  return globalLogger;
}

export function getLogger(): ForgeLogger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return globalLogger;
}

export type { LoggerConfig, LogLevel, LogFormat } from "./config";
