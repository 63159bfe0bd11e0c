import type { Message } from "../state/types.js";
import type { HistoryStore } from "./types.js";

export class InMemoryHistoryStore implements HistoryStore {
  private messages: Message[] = [];

  append(message: Message): Promise<void> {
    this.messages.push({ ...message });
    return Promise.resolve();
  }

  load(): Promise<Message[]> {
    return Promise.resolve(this.messages.map((m) => ({ ...m })));
  }

  clear(): Promise<void> {
    this.messages = [];
    return Promise.resolve();
  }

  get size(): number {
    return this.messages.length;
  }
}
