import type { EnsembleErrorCode } from "../errors.js";
import { errorMessage } from "../errors.js";
import { logWarning } from "../log.js";

export type PoolEventType =
  | "run_started"
  | "agent_started"
  | "agent_completed"
  | "tool_invoked"
  | "run_completed";

export type PoolEventBase = {
  type: PoolEventType;
  timestamp: string;
  runId: string;
};

export type RunStartedEvent = PoolEventBase & {
  type: "run_started";
  input: string;
  maxIter: number;
};

export type AgentStartedEvent = PoolEventBase & {
  type: "agent_started";
  agent: string;
  callCount: number;
};

export type AgentCompletedEvent = PoolEventBase & {
  type: "agent_completed";
  agent: string;
  callCount: number;
  durationMs: number;
  toolsUsed: string[];
};

export type ToolInvokedEvent = PoolEventBase & {
  type: "tool_invoked";
  agent: string;
  tool: string;
  ok: boolean;
};

/**
 * Emitted exactly once per run. `cancelled` means the consumer stopped
 * iterating a stream before it finished.
 */
export type RunCompletedEvent = PoolEventBase & {
  type: "run_completed";
  status: "ok" | "error" | "cancelled";
  calls: number;
  durationMs: number;
  error?: { code: EnsembleErrorCode; message: string };
};

export type PoolEvent =
  | RunStartedEvent
  | AgentStartedEvent
  | AgentCompletedEvent
  | ToolInvokedEvent
  | RunCompletedEvent;

export type PoolEventHandler = (event: PoolEvent) => void | Promise<void>;

/**
 * Fire-and-forget delivery in a microtask. Handler failures are logged
 * and never reach the run.
 */
export function emitEvent(handler: PoolEventHandler | undefined, event: PoolEvent): void {
  if (!handler) return;
  queueMicrotask(() => {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          logWarning(`pool event handler failed on ${event.type}: ${errorMessage(err)}`);
        });
      }
    } catch (err) {
      logWarning(`pool event handler failed on ${event.type}: ${errorMessage(err)}`);
    }
  });
}

/**
 * Structured items yielded by Pool.streamObserve().
 */
export type PoolStreamEvent =
  | { type: "agent_start"; agent: string; callCount: number }
  | { type: "token"; agent: string; text: string }
  | { type: "tool"; agent: string; tool: string; args: Record<string, unknown>; result: unknown; ok: boolean }
  | { type: "agent_end"; agent: string; output: string; toolsUsed: string[] }
  | { type: "final"; output: string };
