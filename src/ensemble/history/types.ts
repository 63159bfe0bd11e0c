import { z } from "zod";
import type { Model } from "../models/types.js";
import type { Message } from "../state/types.js";

/**
 * Persistence behind a history manager. Implementations must return
 * messages in append order.
 */
export interface HistoryStore {
  append(message: Message): Promise<void>;
  load(): Promise<Message[]>;
  clear(): Promise<void>;
}

export const historyStrategySchema = z.enum(["none", "truncate_oldest", "smart"]);

export type HistoryStrategy = z.infer<typeof historyStrategySchema>;

export const historySettingsSchema = z.object({
  autoManageContext: z.boolean().default(true),
  maxContextMessages: z.number().int().min(1).default(20),
  strategy: historyStrategySchema.default("truncate_oldest"),
  /** Rewrite the backing store with the compacted view (smart only) */
  compactStore: z.boolean().default(false),
  /** Seconds per summarizer call; null = unbounded */
  summarizerTimeout: z.number().positive().nullable().default(null)
});

export type HistorySettings = z.infer<typeof historySettingsSchema>;

export type HistoryViewOptions = {
  /** Cancels a summarizer call in progress */
  signal?: AbortSignal;
};

export type HistoryConfig = z.input<typeof historySettingsSchema> & {
  store?: HistoryStore;
  /** Model used by the smart strategy to summarize compacted entries */
  summarizer?: Model;
};

export const messageSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
  agent: z.string().optional(),
  timestamp: z.string(),
  pinned: z.boolean().optional()
});
