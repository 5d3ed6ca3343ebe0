/**
 * Shared setup for CLI commands: config, logger, runtime.
 */

import "dotenv/config";
import { EventBus } from "../../core/eventBus";
import { loadConfig } from "../../core/config";
import { ForgeLogger, initializeLogger } from "../../core/logger";
import { ToolRuntime } from "../../core/runtime";
import { describeThrown } from "../../core/errors";

export interface CliContext {
  runtime: ToolRuntime;
  logger: ForgeLogger;
}

export async function openRuntime(): Promise<CliContext> {
  const config = loadConfig();
  const eventBus = new EventBus({ maxHistorySize: 1000 });
  const logger = initializeLogger(eventBus, config.logger);
  const runtime = await new ToolRuntime({ config, eventBus, logger }).initialize();
  return { runtime, logger };
}

/**
 * How a command gets its runtime: a fresh one per invocation, or the live one
 * inside `forge serve`.
 */
export type RuntimeRunner = (action: (ctx: CliContext) => Promise<void>) => Promise<void>;

function report(error: unknown): void {
  console.error(`Error: ${describeThrown(error).message}`);
  process.exitCode = 1;
}

/**
 * Run a command body against an initialized runtime. Errors are printed and
 * turn into exit code 1; the runtime is closed either way.
 */
export const withRuntime: RuntimeRunner = async (action) => {
  let ctx: CliContext | undefined;
  try {
    ctx = await openRuntime();
    await action(ctx);
  } catch (error: unknown) {
    report(error);
  } finally {
    await ctx?.runtime.close();
    ctx?.logger.flush();
  }
};

/**
 * Runner bound to an already open runtime; errors are printed, the runtime stays open.
 */
export function sharedRuntime(ctx: CliContext): RuntimeRunner {
  return async (action) => {
    try {
      await action(ctx);
    } catch (error: unknown) {
      console.error(`Error: ${describeThrown(error).message}`);
    }
  };
}
