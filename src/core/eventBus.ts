/**
 * Minimal typed Event Bus with append-only history
 * - emits events in-process (sync)
 * - keeps a bounded in-memory history
 */

import { ulid } from "ulid";
import type { RiskLevel } from "./safety/classifier";
import type { ToolOrigin } from "./types";

export interface EventPayloads {
  ToolCreatedEvent: { name: string; origin: ToolOrigin; overwritten: boolean };
  ToolRemovedEvent: { name: string };
  NamespaceRebuiltEvent: { generation: number; tools: string[]; durationMs: number };
  ToolInvocationEvent: { name: string; args: unknown[]; generation: number };
  ToolResultEvent: { name: string; durationMs: number };
  ToolErrorEvent: { name: string; code: string; message: string };
  ProposalQueuedEvent: { id: string; name: string; senderId: string; riskLevel: RiskLevel };
  ProposalApprovedEvent: { id: string; name: string; senderId: string };
  ProposalRejectedEvent: { id: string; name: string; senderId: string };
  PeerMessageEvent: { senderId: string; message: string };
}

export type EventType = keyof EventPayloads;

export interface EventEnvelope<K extends EventType = EventType> {
  id: string;
  type: K;
  timestamp: number;
  payload: EventPayloads[K];
  meta?: Record<string, unknown>;
}

type Listener<K extends EventType> = (evt: EventEnvelope<K>) => void;
type AnyListener = (evt: EventEnvelope) => void;

function isEventOf<K extends EventType>(evt: EventEnvelope, type: K): evt is EventEnvelope<K> {
  return evt.type === type;
}

export interface EventBusConfig {
  maxHistorySize?: number; // Maximum number of events in memory
  historyRetentionPolicy?: "truncate" | "circular"; // How to handle overflow
}

export class EventBus {
  // keyed by the caller's listener so `off` can find the wrapper
  private listeners: Map<EventType, Map<unknown, AnyListener>> = new Map();
  private anyListeners: Set<AnyListener> = new Set();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 10000,
      historyRetentionPolicy: config.historyRetentionPolicy ?? "truncate",
    };
  }

  on<K extends EventType>(type: K, listener: Listener<K>): void {
    let typed = this.listeners.get(type);
    if (!typed) {
      typed = new Map();
      this.listeners.set(type, typed);
    }
    typed.set(listener, (evt) => {
      if (isEventOf(evt, type)) listener(evt);
    });
  }

  off<K extends EventType>(type: K, listener: Listener<K>): void {
    this.listeners.get(type)?.delete(listener);
  }

  onAny(listener: AnyListener): void {
    this.anyListeners.add(listener);
  }

  offAny(listener: AnyListener): void {
    this.anyListeners.delete(listener);
  }

  emit<K extends EventType>(type: K, payload: EventPayloads[K], meta?: Record<string, unknown>): EventEnvelope<K> {
    const envelope: EventEnvelope<K> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
      meta,
    };

    this.history.push(envelope);

    if (this.history.length > this.config.maxHistorySize) {
      if (this.config.historyRetentionPolicy === "truncate") {
        const excess = this.history.length - this.config.maxHistorySize;
        this.history.splice(0, excess);
      } else {
        this.history.shift();
      }
    }

    const typed = this.listeners.get(type);
    if (typed) {
      for (const l of [...typed.values()]) {
        this.deliver(() => l(envelope), type);
      }
    }

    for (const l of this.anyListeners) {
      this.deliver(() => l(envelope), "any");
    }

    return envelope;
  }

  /**
   * Get history with optional filtering
   */
  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[] {
    let filtered = this.history;

    const since = options?.since;
    if (since !== undefined) {
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    if (options?.type) {
      filtered = filtered.filter((e) => e.type === options.type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }

  private deliver(call: () => void, channel: string): void {
    try {
      call();
    } catch (e) {
      // A failing listener must not break the emitter.
      console.error(`[EventBus] Listener error for ${channel}:`, e);
    }
  }
}
