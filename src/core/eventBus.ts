/**
 * Minimal typed Event Bus with append-only history
 * - emits events in-process (sync)
 * - keeps a bounded history for diagnostics
 * - `on` returns a handle that unsubscribes the listener
 */

import { ulid } from "ulid";

export interface EventPayloads {
  ProviderRegisteredEvent: { providerId: string; replaced: boolean };
  ProviderRemovedEvent: { providerId: string };
  ProviderStateChangedEvent: {
    providerId: string;
    authenticated: boolean;
    modelCount: number;
    error?: string;
  };
  ActiveModelChangedEvent: { providerId: string; modelId: string } | { providerId: null; modelId: null };
  ModelRequestEvent: { providerId: string; modelId: string; messageCount: number };
  ModelResponseEvent: { providerId: string; modelId: string; deltaCount: number; durationMs: number };
  ModelErrorEvent: { providerId: string; modelId: string; code: string; message: string };
  ModelLoadEvent: { providerId: string; modelId: string; success: boolean; error?: string };
  SettingsChangedEvent: { keys: string[] };
  ListenerErrorEvent: { type: string; error: string; listener: string };
}

export type EventType = keyof EventPayloads;
export type EventPayload = EventPayloads[EventType];

export interface EventEnvelope {
  id: string;
  type: EventType;
  timestamp: number;
  payload: EventPayload;
  meta?: Record<string, unknown>;
}

export type Listener = (evt: EventEnvelope) => void;
export type Unsubscribe = () => void;

export interface EventBusConfig {
  maxHistorySize?: number; // Maximum number of events in memory
  historyRetentionPolicy?: "truncate" | "circular"; // How to handle overflow
}

export class EventBus {
  private listeners: Map<EventType | "any", Set<Listener>> = new Map();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 1000,
      historyRetentionPolicy: config.historyRetentionPolicy ?? "truncate",
    };
  }

  on(type: EventType | "any", listener: Listener): Unsubscribe {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
    return () => this.off(type, listener);
  }

  off(type: EventType | "any", listener: Listener): void {
    this.listeners.get(type)?.delete(listener);
  }

  listenerCount(type: EventType | "any"): number {
    return this.listeners.get(type)?.size ?? 0;
  }

  emit<K extends EventType>(type: K, payload: EventPayloads[K], meta?: Record<string, unknown>): EventEnvelope {
    const envelope: EventEnvelope = {
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

    this.notify(this.listeners.get(type), envelope);
    this.notify(this.listeners.get("any"), envelope);

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

  clear(): void {
    this.listeners.clear();
    this.history = [];
  }

  private notify(listeners: Set<Listener> | undefined, envelope: EventEnvelope): void {
    if (!listeners) return;
    // Snapshot so listeners may unsubscribe while being notified
    for (const listener of [...listeners]) {
      try {
        listener(envelope);
      } catch (e) {
        console.error(`[EventBus] Listener error for ${envelope.type}:`, e);
        if (envelope.type !== "ListenerErrorEvent") {
          this.emit("ListenerErrorEvent", {
            type: envelope.type,
            error: e instanceof Error ? e.message : String(e),
            listener: listener.name || "anonymous",
          });
        }
      }
    }
  }
}
