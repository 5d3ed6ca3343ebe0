/**
 * Library entry, and a bootstrap that runs the peer gateway when executed
 * directly (`npm start`).
 */

import "dotenv/config";
import { EventBus } from "./core/eventBus";
import { loadConfig } from "./core/config";
import { initializeLogger } from "./core/logger";
import { ToolRuntime } from "./core/runtime";

export { ToolRuntime } from "./core/runtime";
export type { InboxMessage, RuntimeConfig, ToolRuntimeOptions } from "./core/runtime";
export { loadConfig, DEFAULT_TIMEOUTS, CONFIG_FILE_NAME } from "./core/config";
export type { ForgeConfig } from "./core/config";
export { EventBus } from "./core/eventBus";
export type { EventEnvelope, EventPayloads, EventType } from "./core/eventBus";
export * from "./core/errors";
export { ToolStore } from "./core/storage/toolStore";
export { ToolRegistry, Namespace, compile, renderValue } from "./core/tool-engine";
export { ApprovalQueue } from "./core/approval/approvalQueue";
export type { PendingProposal } from "./core/approval/approvalQueue";
export { assess, classify } from "./core/safety/classifier";
export type { RiskAssessment, RiskLevel } from "./core/safety/classifier";
export { NativeCapabilities, extractReadableText } from "./core/tools/nativeCapabilities";
export { NATIVE_CAPABILITY_NAMES } from "./core/tools/capabilityNames";
export { PeerClient } from "./core/peer/peerClient";
export type { FetchLike } from "./core/peer/peerClient";
export { applyMarkers, parseToolDefinitions, parseToolInvocations } from "./core/agent/markers";
export { initializeLogger, getLogger, ForgeLogger } from "./core/logger";
export type { Tool, ToolOrigin, ExecutionTimeouts } from "./core/types";

async function main(): Promise<void> {
  const config = loadConfig();
  const eventBus = new EventBus({ maxHistorySize: 10000, historyRetentionPolicy: "truncate" });
  const logger = initializeLogger(eventBus, config.logger);

  logger.info("Starting tool runtime", { toolsDir: config.toolsDir, peer: config.peer });
  const runtime = await new ToolRuntime({ config, eventBus, logger }).initialize();
  await runtime.startServer();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    runtime
      .close()
      .then(() => logger.flush())
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
}
