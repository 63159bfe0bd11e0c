import type { Agent } from "../agent/agent.js";
import type { HistoryManager } from "../history/manager.js";
import { createMessage, type Message, type MessageRole } from "./types.js";

export type StateInit = {
  historyManager?: HistoryManager | null;
  kv?: Record<string, unknown>;
};

/**
 * Shared, mutable conversation state owned by one pool.
 *
 * History is append-only and cumulative across runs. The agent registry is
 * filled by the pool; tools and routers read it.
 */
export class State {
  private readonly _history: Message[] = [];
  private readonly kv = new Map<string, unknown>();
  readonly agents = new Map<string, Agent>();
  historyManager: HistoryManager | null;

  constructor(init?: StateInit) {
    this.historyManager = init?.historyManager ?? null;
    for (const [key, value] of Object.entries(init?.kv ?? {})) {
      this.kv.set(key, value);
    }
  }

  /**
   * The canonical history. Read-only view; use append() to add entries.
   */
  get history(): readonly Message[] {
    return this._history;
  }

  /**
   * Append a message and mirror it into the history manager's store.
   * The in-memory entry is added before the store write so ordering holds
   * even if the store fails.
   */
  async append(message: Message): Promise<Message> {
    this._history.push(message);
    if (this.historyManager) {
      await this.historyManager.record(message);
    }
    return message;
  }

  async addMessage(role: MessageRole, content: string, agent?: string): Promise<Message> {
    return this.append(createMessage(role, content, agent !== undefined ? { agent } : undefined));
  }

  lastMessage(role?: MessageRole): Message | undefined {
    for (let idx = this._history.length - 1; idx >= 0; idx--) {
      const message = this._history[idx];
      if (message && (role === undefined || message.role === role)) {
        return message;
      }
    }
    return undefined;
  }

  get(key: string): unknown {
    return this.kv.get(key);
  }

  set(key: string, value: unknown): void {
    this.kv.set(key, value);
  }

  has(key: string): boolean {
    return this.kv.has(key);
  }

  delete(key: string): boolean {
    return this.kv.delete(key);
  }

  keys(): string[] {
    return Array.from(this.kv.keys());
  }

  /**
   * Plain snapshot of the key/value store.
   */
  toObject(): Record<string, unknown> {
    return Object.fromEntries(this.kv);
  }
}
