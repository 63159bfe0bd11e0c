/**
 * Pool: the run loop.
 *
 * A run appends the user input, then repeatedly asks the router for the
 * next agent, invokes it and appends its output, until the router stops or
 * `maxIter` invocations have completed. Runs on one pool are serialized.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { Agent, AgentResult, AgentRunOptions } from "../agent/agent.js";
import { EnsembleError, RoutingError, TimeoutError, toEnsembleError } from "../errors.js";
import { HistoryManager } from "../history/manager.js";
import type { HistoryConfig } from "../history/types.js";
import { logWarning } from "../log.js";
import type { Model } from "../models/types.js";
import { stopRouter, toRouter } from "../router/router.js";
import type { LastResult, Router, RouterLike } from "../router/types.js";
import { State } from "../state/state.js";
import type { Tool } from "../tools/tool.js";
import { ConcurrencyLimiter } from "../utils/concurrencyLimiter.js";
import { withDeadline } from "../utils/deadline.js";
import { emitEvent, type PoolEvent, type PoolEventHandler, type PoolStreamEvent } from "./events.js";

export const DEFAULT_MAX_ITER = 5;

const poolSettingsSchema = z.object({
  maxIter: z.number().int().min(0).default(DEFAULT_MAX_ITER),
  tracing: z.boolean().default(false),
  /** 0 = wait indefinitely for a previous run to finish */
  queueTimeoutMs: z.number().int().min(0).default(0)
});

export type PoolSettings = z.infer<typeof poolSettingsSchema>;

export type PoolOptions = z.input<typeof poolSettingsSchema> & {
  agents: Iterable<Agent>;
  /** Defaults to a router that stops immediately */
  router?: RouterLike;
  state?: State;
  /** Overrides the state's history manager */
  history?: HistoryManager | HistoryConfig;
  /** Assigned to agents that have no model */
  defaultModel?: Model;
  onEvent?: PoolEventHandler;
  /** Tools and agents kept for packaging that take no part in runs */
  catalog?: {
    tools?: Iterable<Tool>;
    agents?: Iterable<Agent>;
  };
};

export type PoolCatalog = {
  readonly tools: ReadonlyMap<string, Tool>;
  readonly agents: ReadonlyMap<string, Agent>;
};

export type PoolRunOptions = {
  signal?: AbortSignal;
};

/**
 * Package form of the pool section; the router is described separately.
 */
export type PoolDescriptor = {
  agents: string[];
  maxIter: number;
  tracing: boolean;
};

export class Pool {
  readonly state: State;
  readonly router: Router;
  readonly maxIter: number;
  readonly tracing: boolean;
  readonly defaultModel: Model | null;
  readonly catalog: PoolCatalog;
  private readonly limiter: ConcurrencyLimiter;
  private readonly onEvent: PoolEventHandler | undefined;

  constructor(options: PoolOptions) {
    const parsed = poolSettingsSchema.safeParse(options);
    if (!parsed.success) {
      throw new EnsembleError("CONFIG_ERROR", "Invalid pool configuration", { issues: parsed.error.issues });
    }
    this.maxIter = parsed.data.maxIter;
    this.tracing = parsed.data.tracing;
    this.limiter = new ConcurrencyLimiter({ maxConcurrent: 1, queueTimeoutMs: parsed.data.queueTimeoutMs });
    this.onEvent = options.onEvent;
    this.defaultModel = options.defaultModel ?? null;
    this.catalog = {
      tools: new Map(Array.from(options.catalog?.tools ?? [], (tool) => [tool.name, tool])),
      agents: new Map(Array.from(options.catalog?.agents ?? [], (agent) => [agent.name, agent]))
    };

    this.state = options.state ?? new State();
    for (const agent of options.agents) {
      if (this.state.agents.has(agent.name)) {
        logWarning(`duplicate agent name '${agent.name}'; the last one registered wins`);
      }
      this.state.agents.set(agent.name, agent);
    }
    if (options.history !== undefined) {
      this.state.historyManager = options.history instanceof HistoryManager
        ? options.history
        : new HistoryManager(options.history);
    }
    if (this.tracing) {
      for (const agent of this.state.agents.values()) {
        if (!agent.tracingExplicit) agent.setTracing(true);
      }
    }

    this.router = toRouter(options.router ?? stopRouter());
    this.prepare();
  }

  get agents(): ReadonlyMap<string, Agent> {
    return this.state.agents;
  }

  get agentNames(): string[] {
    return Array.from(this.state.agents.keys());
  }

  /**
   * Run to completion and return the last output produced by this call,
   * or "" when no agent ran.
   */
  async run(input: string, options?: PoolRunOptions): Promise<string> {
    const execution = this.execute(input, options, false);
    let step = await execution.next();
    while (!step.done) {
      step = await execution.next();
    }
    return step.value;
  }

  /**
   * Yields each agent's output text as it is produced; returns the final output.
   */
  async *stream(input: string, options?: PoolRunOptions): AsyncGenerator<string, string, undefined> {
    const events = this.execute(input, options, true);
    let finished = false;
    try {
      let step = await events.next();
      while (!step.done) {
        if (step.value.type === "token") yield step.value.text;
        step = await events.next();
      }
      finished = true;
      return step.value;
    } finally {
      if (!finished) await events.return("");
    }
  }

  /**
   * Yields structured progress events; returns the final output.
   */
  streamObserve(input: string, options?: PoolRunOptions): AsyncGenerator<PoolStreamEvent, string, undefined> {
    return this.execute(input, options, true);
  }

  toJSON(): PoolDescriptor {
    return { agents: this.agentNames, maxIter: this.maxIter, tracing: this.tracing };
  }

  /**
   * Fill missing models and hand the registry to stateful routers.
   */
  private prepare(): void {
    if (this.defaultModel) {
      for (const agent of this.state.agents.values()) {
        if (!agent.model) agent.model = this.defaultModel;
      }
    }
    this.router.bindAgents?.(this.state.agents);
  }

  private async *execute(
    input: string,
    options: PoolRunOptions | undefined,
    streaming: boolean
  ): AsyncGenerator<PoolStreamEvent, string, undefined> {
    const release = await this.limiter.acquire();
    const runId = randomUUID();
    const startedAt = Date.now();
    const signal = options?.signal;
    let callCount = 0;
    let completion: "ok" | "error" | null = null;

    const emit = (event: DistributiveOmit<PoolEvent, "timestamp" | "runId">): void => {
      emitEvent(this.onEvent, { ...event, timestamp: new Date().toISOString(), runId });
    };

    try {
      this.prepare();
      emit({ type: "run_started", input, maxIter: this.maxIter });
      await this.state.addMessage("user", input);

      let lastResult: LastResult | null = null;
      let currentInput = input;
      let output = "";

      while (callCount < this.maxIter) {
        throwIfAborted(signal);
        const decision = await withDeadline(
          (routerSignal) => this.router.decide(this.state, callCount, lastResult, { signal: routerSignal }),
          { timeoutMs: null, signal, label: "Routing decision" }
        );
        const name = decision.nextAgentName;
        if (name === null) break;
        const agent = this.state.agents.get(name);
        if (!agent) {
          throw new RoutingError(name, this.agentNames);
        }

        emit({ type: "agent_started", agent: name, callCount });
        if (streaming) yield { type: "agent_start", agent: name, callCount };
        const agentStartedAt = Date.now();

        const pending: PoolStreamEvent[] = [];
        const agentOptions: AgentRunOptions = {
          ...(signal !== undefined && { signal }),
          onToolCall: (record) => {
            emit({ type: "tool_invoked", agent: record.agent, tool: record.tool, ok: record.ok });
            if (streaming) pending.push({ type: "tool", ...record });
          }
        };

        let result: AgentResult;
        if (streaming) {
          const chunks = agent.stream(currentInput, this.state, agentOptions);
          let drained = false;
          try {
            let step = await chunks.next();
            while (!step.done) {
              yield* pending.splice(0);
              yield { type: "token", agent: name, text: step.value };
              step = await chunks.next();
            }
            drained = true;
            yield* pending.splice(0);
            result = step.value;
          } finally {
            // Consumer stopped early: let the agent release its model stream
            if (!drained) await chunks.return({ output: "", toolsUsed: [] });
          }
        } else {
          result = await agent.run(currentInput, this.state, agentOptions);
        }

        await this.state.addMessage("assistant", result.output, name);
        emit({
          type: "agent_completed",
          agent: name,
          callCount,
          durationMs: Date.now() - agentStartedAt,
          toolsUsed: [...result.toolsUsed]
        });
        if (streaming) yield { type: "agent_end", agent: name, output: result.output, toolsUsed: [...result.toolsUsed] };

        lastResult = { agent: name, output: result.output, toolsUsed: [...result.toolsUsed] };
        currentInput = result.output;
        output = result.output;
        callCount++;
      }

      completion = "ok";
      emit({ type: "run_completed", status: "ok", calls: callCount, durationMs: Date.now() - startedAt });
      if (streaming) yield { type: "final", output };
      return output;
    } catch (err) {
      completion = "error";
      const failure = toEnsembleError(err);
      emit({
        type: "run_completed",
        status: "error",
        calls: callCount,
        durationMs: Date.now() - startedAt,
        error: { code: failure.code, message: failure.message }
      });
      throw err;
    } finally {
      if (completion === null) {
        emit({ type: "run_completed", status: "cancelled", calls: callCount, durationMs: Date.now() - startedAt });
      }
      release();
    }
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new TimeoutError("Run was aborted", null, "aborted");
  }
}

export function createPool(options: PoolOptions): Pool {
  return new Pool(options);
}
