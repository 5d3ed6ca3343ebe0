/**
 * ToolRuntime: one object wiring the store, registry, approval queue, native
 * capabilities and peer gateway together. The CLI and embedders use this.
 */

import { EventBus } from "./eventBus";
import type { ForgeConfig } from "./config";
import type { ForgeLogger } from "./logger";
import { ToolStore } from "./storage/toolStore";
import { WriteLock } from "./utils/writeLock";
import { CreateResult, ToolRegistry } from "./tool-engine/registry";
import { ApprovalQueue, PendingProposal } from "./approval/approvalQueue";
import { NativeCapabilities, ToolCatalog } from "./tools/nativeCapabilities";
import { FetchLike, PeerClient } from "./peer/peerClient";
import { RiskAssessment, assess } from "./safety/classifier";
import type { Tool } from "./types";
import { PeerServerHandle, startPeerServer } from "../server";

export type RuntimeConfig = Pick<
  ForgeConfig,
  "toolsDir" | "configFile" | "executablePath" | "peer" | "timeouts" | "scrapeWordLimit"
>;

export interface ToolRuntimeOptions {
  config: RuntimeConfig;
  eventBus?: EventBus;
  logger?: ForgeLogger;
  /** Replaces node-fetch for scrape_url and send_message */
  fetch?: FetchLike;
}

export interface InboxMessage {
  senderId: string;
  message: string;
  receivedAt: number;
}

const INBOX_LIMIT = 100;

export class ToolRuntime implements ToolCatalog {
  readonly eventBus: EventBus;
  readonly store: ToolStore;
  readonly registry: ToolRegistry;
  readonly approvals: ApprovalQueue;
  readonly capabilities: NativeCapabilities;

  private readonly config: RuntimeConfig;
  private readonly logger?: ForgeLogger;
  private readonly peer: PeerClient;
  private readonly received: InboxMessage[] = [];
  private server?: PeerServerHandle;

  constructor(options: ToolRuntimeOptions) {
    this.config = options.config;
    this.eventBus = options.eventBus ?? new EventBus();
    this.logger = options.logger;

    const lock = new WriteLock();
    this.store = new ToolStore(this.config.toolsDir);
    this.peer = new PeerClient({ fetch: options.fetch, timeoutMs: this.config.timeouts.networkMs });
    this.capabilities = new NativeCapabilities({
      catalog: this,
      timeouts: this.config.timeouts,
      toolsDir: this.config.toolsDir,
      configFile: this.config.configFile,
      executablePath: this.config.executablePath,
      scrapeWordLimit: this.config.scrapeWordLimit,
      fetch: options.fetch,
      peer: this.peer,
      logger: this.logger,
    });
    this.registry = new ToolRegistry({
      store: this.store,
      eventBus: this.eventBus,
      lock,
      timeouts: this.config.timeouts,
      natives: () => this.capabilities.bindings(),
      logger: this.logger,
    });
    this.approvals = new ApprovalQueue(this.registry, lock, this.eventBus);
  }

  /**
   * Load the tool directory and publish the first namespace.
   * @throws CompileError if a stored tool is broken
   */
  async initialize(): Promise<this> {
    await this.registry.initialize();
    const tools = this.list();
    this.logger?.info(`Loaded ${tools.length} tool(s)`, { tools, toolsDir: this.store.dir });
    return this;
  }

  async createTool(name: string, source: string): Promise<CreateResult> {
    return this.registry.create(name, source, "local");
  }

  async execute(name: string, args: readonly unknown[] = []): Promise<string> {
    return this.registry.execute(name, args);
  }

  async removeTool(name: string): Promise<void> {
    await this.registry.remove(name);
  }

  list(): string[] {
    return this.registry.list();
  }

  inspect(name: string): string {
    return this.registry.inspect(name);
  }

  remove(name: string): Promise<void> {
    return this.removeTool(name);
  }

  /** Loaded tools with their origin */
  tools(): Tool[] {
    return this.list().flatMap((name) => {
      const tool = this.registry.get(name);
      return tool ? [tool] : [];
    });
  }

  assess(source: string): RiskAssessment {
    return assess(source);
  }

  async proposeTool(name: string, source: string, senderId: string): Promise<PendingProposal> {
    return this.approvals.enqueue(name, source, senderId);
  }

  listPending(): PendingProposal[] {
    return this.approvals.listPending();
  }

  async approve(name: string, senderId?: string): Promise<PendingProposal> {
    return this.approvals.approve(name, senderId);
  }

  async reject(name: string, senderId?: string): Promise<PendingProposal> {
    return this.approvals.reject(name, senderId);
  }

  /**
   * Start the peer gateway. A second call returns the running server.
   */
  async startServer(port: number = this.config.peer.port, host: string = this.config.peer.host): Promise<PeerServerHandle> {
    if (this.server) return this.server;
    this.server = await startPeerServer({
      host,
      port,
      logger: this.logger?.child({ component: "gateway" }),
      handlers: {
        receiveMessage: (message, senderId) => this.receiveMessage(message, senderId),
        receiveTool: (name, source, senderId) => this.proposeTool(name, source, senderId),
      },
    });
    return this.server;
  }

  async stopServer(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    await server?.close();
  }

  async sendMessage(url: string, body: string): Promise<string> {
    return this.peer.send(url, body);
  }

  /**
   * Offer a loaded tool to a peer.
   * @throws NotFoundError if the tool is not loaded
   */
  async shareTool(url: string, name: string): Promise<string> {
    return this.peer.shareTool(url, name, this.inspect(name));
  }

  /** Generic messages received by the gateway, oldest first */
  inbox(): InboxMessage[] {
    return this.received.map((entry) => ({ ...entry }));
  }

  async close(): Promise<void> {
    await this.stopServer();
  }

  private receiveMessage(message: string, senderId: string): void {
    this.received.push({ senderId, message, receivedAt: Date.now() });
    if (this.received.length > INBOX_LIMIT) {
      this.received.splice(0, this.received.length - INBOX_LIMIT);
    }
    this.eventBus.emit("PeerMessageEvent", { senderId, message });
  }
}
