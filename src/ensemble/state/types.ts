export type MessageRole = "user" | "assistant" | "system";

/**
 * One entry of the conversation history.
 * The pool appends only user and assistant messages; system messages are
 * summaries or pinned context produced by the history manager.
 */
export type Message = {
  role: MessageRole;
  content: string;
  /** Name of the agent that produced an assistant message */
  agent?: string;
  /** ISO-8601 */
  timestamp: string;
  /** Always kept by the smart history strategy */
  pinned?: boolean;
};

export function createMessage(
  role: MessageRole,
  content: string,
  extra?: { agent?: string; pinned?: boolean }
): Message {
  const message: Message = { role, content, timestamp: new Date().toISOString() };
  if (extra?.agent !== undefined) {
    message.agent = extra.agent;
  }
  if (extra?.pinned !== undefined) {
    message.pinned = extra.pinned;
  }
  return message;
}
