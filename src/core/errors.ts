/**
 * Error taxonomy for the tool runtime.
 *
 * Every runtime operation either succeeds or throws one of these. None of them
 * is retried inside the runtime; the caller decides what to do next.
 */

export class ForgeError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode?: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ForgeError";
    Object.setPrototypeOf(this, ForgeError.prototype);
  }
}

export interface SourceLocation {
  file: string;
  line?: number;
}

export class CompileError extends ForgeError {
  constructor(public location: SourceLocation, message: string) {
    super(
      `Compile error in ${formatLocation(location)}: ${message}`,
      "COMPILE_ERROR",
      400,
      { file: location.file, line: location.line, reason: message }
    );
    this.name = "CompileError";
    Object.setPrototypeOf(this, CompileError.prototype);
  }
}

export class NotFoundError extends ForgeError {
  constructor(public kind: "tool" | "proposal", public key: string) {
    super(
      `${kind === "tool" ? "Tool" : "Pending proposal"} not found: ${key}`,
      "NOT_FOUND",
      404,
      { kind, key }
    );
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ArityMismatchError extends ForgeError {
  constructor(target: string, expected: string, received: string) {
    super(
      `${target} expects ${expected}, got ${received}`,
      "ARITY_MISMATCH",
      400,
      { target, expected, received }
    );
    this.name = "ArityMismatchError";
    Object.setPrototypeOf(this, ArityMismatchError.prototype);
  }
}

export class AlreadyQueuedError extends ForgeError {
  constructor(name: string, senderId: string) {
    super(
      `Proposal ${name} from ${senderId} is already pending`,
      "ALREADY_QUEUED",
      409,
      { name, senderId }
    );
    this.name = "AlreadyQueuedError";
    Object.setPrototypeOf(this, AlreadyQueuedError.prototype);
  }
}

export class IOError extends ForgeError {
  constructor(message: string, public path?: string, public cause?: unknown) {
    super(`IO error: ${message}`, "IO_ERROR", 500, { path });
    this.name = "IOError";
    Object.setPrototypeOf(this, IOError.prototype);
  }
}

export class NetworkError extends ForgeError {
  constructor(message: string, public url?: string, public status?: number) {
    super(`Network error: ${message}`, "NETWORK_ERROR", 502, { url, status });
    this.name = "NetworkError";
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

export class TimeoutError extends ForgeError {
  constructor(operation: string, public timeoutMs: number) {
    super(
      `${operation} timed out after ${timeoutMs}ms`,
      "TIMEOUT",
      504,
      { operation, timeoutMs }
    );
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export class ParseError extends ForgeError {
  constructor(message: string, public url?: string) {
    super(`Parse error: ${message}`, "PARSE_ERROR", 422, { url });
    this.name = "ParseError";
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * A tool's own logic failed while running.
 */
export class ToolExecutionError extends ForgeError {
  constructor(toolName: string, message: string, public causeCode?: string) {
    super(
      `Tool ${toolName} failed: ${message}`,
      "RUNTIME_ERROR",
      500,
      { toolName, causeCode }
    );
    this.name = "ToolExecutionError";
    Object.setPrototypeOf(this, ToolExecutionError.prototype);
  }
}

export class ConfigError extends ForgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid configuration: ${message}`, "CONFIG_ERROR", 500, details);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function formatLocation(location: SourceLocation): string {
  return location.line === undefined ? location.file : `${location.file}:${location.line}`;
}

export interface ThrownShape {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

/**
 * Describe a thrown value without `instanceof`: values thrown inside a vm
 * context carry that context's Error constructor.
 */
export function describeThrown(thrown: unknown): ThrownShape {
  if (thrown !== null && typeof thrown === "object") {
    const target: object = thrown;
    const field = (key: string): string | undefined => {
      const value: unknown = Reflect.get(target, key);
      return typeof value === "string" ? value : undefined;
    };
    return {
      name: field("name") ?? "Error",
      message: field("message") ?? String(thrown),
      code: field("code"),
      stack: field("stack"),
    };
  }
  return { name: "Error", message: String(thrown) };
}
