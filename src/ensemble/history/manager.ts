/**
 * Bounded-context history management.
 *
 * The manager decides which part of the canonical history an agent sees.
 * A view is always a new array: pruning never edits State.history. Only
 * the smart strategy with `compactStore` rewrites the backing store.
 */

import { EnsembleError } from "../errors.js";
import type { Model } from "../models/types.js";
import type { Message } from "../state/types.js";
import { withDeadline } from "../utils/deadline.js";
import { InMemoryHistoryStore } from "./inMemoryStore.js";
import {
  historySettingsSchema,
  type HistoryConfig,
  type HistorySettings,
  type HistoryStore,
  type HistoryViewOptions
} from "./types.js";

const DIGEST_ENTRY_CHARS = 120;

export function speakerOf(message: Message): string {
  return message.agent ?? message.role;
}

/**
 * Render messages as `[speaker] content` lines for prompts.
 */
export function formatTranscript(messages: readonly Message[]): string {
  return messages.map((m) => `[${speakerOf(m)}] ${m.content}`).join("\n");
}

function digest(messages: readonly Message[]): string {
  return messages
    .map((m) => {
      const text = m.content.length > DIGEST_ENTRY_CHARS
        ? `${m.content.slice(0, DIGEST_ENTRY_CHARS)}...`
        : m.content;
      return `- ${speakerOf(m)}: ${text}`;
    })
    .join("\n");
}

export class HistoryManager {
  readonly settings: Readonly<HistorySettings>;
  readonly store: HistoryStore;
  private readonly summarizer: Model | null;

  constructor(config?: HistoryConfig) {
    const parsed = historySettingsSchema.safeParse(config ?? {});
    if (!parsed.success) {
      throw new EnsembleError("CONFIG_ERROR", "Invalid history configuration", { issues: parsed.error.issues });
    }
    this.settings = Object.freeze(parsed.data);
    this.store = config?.store ?? new InMemoryHistoryStore();
    this.summarizer = config?.summarizer ?? null;
  }

  /**
   * The subset of `history` an agent invocation may see.
   */
  async view(history: readonly Message[], options?: HistoryViewOptions): Promise<Message[]> {
    const { autoManageContext, strategy, maxContextMessages } = this.settings;
    if (!autoManageContext || strategy === "none" || history.length <= maxContextMessages) {
      return [...history];
    }

    if (strategy === "truncate_oldest") {
      return history.slice(-maxContextMessages);
    }

    const view = await this.compact(history, options?.signal);
    if (this.settings.compactStore) {
      await this.store.clear();
      for (const message of view) {
        await this.store.append(message);
      }
    }
    return view;
  }

  async record(message: Message): Promise<void> {
    await this.store.append(message);
  }

  load(): Promise<Message[]> {
    return this.store.load();
  }

  clear(): Promise<void> {
    return this.store.clear();
  }

  /**
   * Smart compaction: pinned and system entries always survive, the newest
   * entries fill the remaining slots, and everything older collapses into a
   * single system summary placed first.
   */
  private async compact(history: readonly Message[], signal: AbortSignal | undefined): Promise<Message[]> {
    const isKept = (m: Message): boolean => m.pinned === true || m.role === "system";
    const pinnedCount = history.filter(isKept).length;
    const recentBudget = Math.max(0, this.settings.maxContextMessages - 1 - pinnedCount);

    const candidates = history.filter((m) => !isKept(m));
    const recent = new Set(recentBudget > 0 ? candidates.slice(-recentBudget) : []);
    const dropped = candidates.filter((m) => !recent.has(m));
    if (dropped.length === 0) {
      return [...history];
    }

    const body = await this.summarize(dropped, signal);
    const last = dropped[dropped.length - 1];
    const summary: Message = {
      role: "system",
      content: `Summary of ${dropped.length} earlier messages:\n${body}`,
      timestamp: last?.timestamp ?? new Date().toISOString()
    };
    return [summary, ...history.filter((m) => isKept(m) || recent.has(m))];
  }

  private async summarize(messages: readonly Message[], signal: AbortSignal | undefined): Promise<string> {
    const summarizer = this.summarizer;
    if (!summarizer) {
      return digest(messages);
    }
    const prompt =
      "Summarize the following conversation excerpt in a few sentences. " +
      "Keep facts, decisions and open questions.\n\n" +
      formatTranscript(messages);
    const { summarizerTimeout } = this.settings;
    const timeoutMs = summarizerTimeout === null ? null : Math.round(summarizerTimeout * 1000);
    const text = await withDeadline(
      (deadlineSignal) => summarizer.generate(prompt, { signal: deadlineSignal, ...(timeoutMs !== null && { timeoutMs }) }),
      { timeoutMs, signal, label: "History summarizer call" }
    );
    return text.trim();
  }
}
