/**
 * Logger Test Suite
 */

import pino from "pino";
import { EventBus } from "../src/core/eventBus";
import { ForgeLogger, getLogger, initializeLogger } from "../src/core/logger";
import { parseLogFormat, parseLogLevel } from "../src/core/logger/config";
import { formatDuration, truncateForLog } from "../src/core/logger/formatters";

function captureLogger(eventBus: EventBus): { logger: ForgeLogger; lines: () => unknown[] } {
  const raw: string[] = [];
  const base = pino({ level: "debug" }, { write: (msg: string) => raw.push(msg) });
  const logger = new ForgeLogger(eventBus, { level: "debug", format: "json" }, base);
  return { logger, lines: () => raw.map((line): unknown => JSON.parse(line)) };
}

describe("ForgeLogger", () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  test("should initialize the global logger", () => {
    const instance = initializeLogger(eventBus, { level: "silent", format: "json" });
    expect(instance).toBeInstanceOf(ForgeLogger);
    expect(getLogger()).toBe(instance);
    expect(instance.child({ toolName: "t" })).toBeInstanceOf(ForgeLogger);
  });

  test("should write messages with context", () => {
    const { logger, lines } = captureLogger(eventBus);

    logger.info("Tool list refreshed", { toolName: "square" });

    expect(lines()).toEqual([expect.objectContaining({ level: 30, msg: "Tool list refreshed", toolName: "square" })]);
  });

  test("should log event bus lifecycle events", () => {
    const { logger, lines } = captureLogger(eventBus);
    logger.attachEventBus();

    eventBus.emit("ToolCreatedEvent", { name: "square", origin: "local", overwritten: false });

    expect(lines()).toEqual([
      expect.objectContaining({
        msg: "Tool saved",
        event: "ToolCreatedEvent",
        type: "eventbus",
        payload: { name: "square", origin: "local", overwritten: false },
      }),
    ]);
  });

  test("should trace tool executions with truncated arguments", () => {
    const { logger, lines } = captureLogger(eventBus);

    logger.traceToolExecution("echo", ["x".repeat(130)], 12, false, "Tool echo failed: boom");

    const [line] = lines();
    expect(line).toMatchObject({
      level: 40,
      msg: "Tool echo failed (12ms)",
      toolName: "echo",
      success: false,
      error: "Tool echo failed: boom",
      args: [`${"x".repeat(120)}… (130 chars)`],
    });
  });

  test("should trace requests at warn for client errors", () => {
    const { logger, lines } = captureLogger(eventBus);

    logger.traceRequest("POST", "/message", 409, 3);

    expect(lines()[0]).toMatchObject({ level: 40, msg: "POST /message 409 (3ms)", statusCode: 409 });
  });

  test("should serialize errors", () => {
    const { logger, lines } = captureLogger(eventBus);

    logger.error(new Error("disk full"));

    expect(lines()[0]).toMatchObject({ level: 50, msg: "disk full", err: { message: "disk full", type: "Error" } });
  });
});

describe("logger helpers", () => {
  test("should parse levels and formats with fallbacks", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("loud")).toBe("info");
    expect(parseLogFormat("json")).toBe("json");
    expect(parseLogFormat(undefined)).toBe("pretty");
    warn.mockRestore();
  });

  test("should format durations", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(90000)).toBe("1m 30.00s");
  });
});
