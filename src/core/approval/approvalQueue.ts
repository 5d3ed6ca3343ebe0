/**
 * Approval queue for tools proposed by peers.
 *
 * A proposal is classified once, on arrival, and waits here until a human
 * approves or rejects it. Queue changes share the runtime's WriteLock, so an
 * approval and its install into the registry are one step for everyone else.
 */

import { ulid } from "ulid";
import { EventBus } from "../eventBus";
import { AlreadyQueuedError, NotFoundError } from "../errors";
import { RiskLevel, assess } from "../safety/classifier";
import type { Tool } from "../types";
import { WriteLock } from "../utils/writeLock";
import { validateToolDefinition } from "../tool-engine/compiler";

export interface PendingProposal {
  id: string;
  name: string;
  source: string;
  senderId: string;
  riskLevel: RiskLevel;
  /** Native capabilities and host-escape tokens that set the risk level */
  reasons: string[];
  receivedAt: number;
}

/**
 * Installs an approved tool. Called with the write lock held.
 */
export interface ToolInstaller {
  install(tool: Tool): Promise<unknown>;
}

export class ApprovalQueue {
  private entries: PendingProposal[] = [];

  constructor(
    private readonly installer: ToolInstaller,
    private readonly lock: WriteLock,
    private readonly eventBus: EventBus
  ) {}

  /**
   * Classify and queue a proposal.
   * @throws AlreadyQueuedError if the same sender already has this name pending
   * @throws CompileError if the name or source is not a valid tool definition
   */
  async enqueue(name: string, source: string, senderId: string): Promise<PendingProposal> {
    validateToolDefinition(name, source);
    const { level, capabilities, escapes } = assess(source);

    return this.lock.run(() => {
      if (this.entries.some((p) => p.name === name && p.senderId === senderId)) {
        throw new AlreadyQueuedError(name, senderId);
      }

      const proposal: PendingProposal = {
        id: ulid(),
        name,
        source,
        senderId,
        riskLevel: level,
        reasons: [...capabilities, ...escapes],
        receivedAt: Date.now(),
      };
      this.entries.push(proposal);

      this.eventBus.emit("ProposalQueuedEvent", { id: proposal.id, name, senderId, riskLevel: level });
      return proposal;
    });
  }

  /** Snapshot, in arrival order */
  listPending(): PendingProposal[] {
    return this.entries.map((p) => ({ ...p, reasons: [...p.reasons] }));
  }

  /**
   * Install a pending proposal as a remote tool and drop it from the queue.
   * Without `senderId`, the earliest proposal with that name is taken.
   * If the install fails the proposal stays queued.
   * @throws NotFoundError | CompileError | IOError
   */
  async approve(name: string, senderId?: string): Promise<PendingProposal> {
    return this.lock.run(async () => {
      const proposal = this.find(name, senderId);
      await this.installer.install({ name: proposal.name, source: proposal.source, origin: "remote" });
      this.drop(proposal);

      this.eventBus.emit("ProposalApprovedEvent", { id: proposal.id, name, senderId: proposal.senderId });
      return proposal;
    });
  }

  /**
   * @throws NotFoundError
   */
  async reject(name: string, senderId?: string): Promise<PendingProposal> {
    return this.lock.run(() => {
      const proposal = this.find(name, senderId);
      this.drop(proposal);

      this.eventBus.emit("ProposalRejectedEvent", { id: proposal.id, name, senderId: proposal.senderId });
      return proposal;
    });
  }

  get size(): number {
    return this.entries.length;
  }

  private find(name: string, senderId: string | undefined): PendingProposal {
    const proposal = this.entries.find((p) => p.name === name && (senderId === undefined || p.senderId === senderId));
    if (!proposal) {
      throw new NotFoundError("proposal", senderId === undefined ? name : `${name} from ${senderId}`);
    }
    return proposal;
  }

  private drop(proposal: PendingProposal): void {
    this.entries = this.entries.filter((p) => p.id !== proposal.id);
  }
}
