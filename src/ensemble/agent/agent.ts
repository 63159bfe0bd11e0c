/**
 * Agent: a persona bound to a model and a set of tools.
 *
 * One invocation renders a prompt from the persona, the tool catalogue and
 * the visible history, calls the model, and dispatches any tool requests
 * in the reply through the tool runtime before asking the model again.
 */

import { z } from "zod";
import { EnsembleError, ModelError, TimeoutError, errorMessage } from "../errors.js";
import { formatTranscript } from "../history/manager.js";
import { logTrace, logWarning } from "../log.js";
import type { Model } from "../models/types.js";
import type { State } from "../state/state.js";
import type { Tool } from "../tools/tool.js";
import { isToolErrorResult, type ToolArgs } from "../tools/types.js";
import { withDeadline } from "../utils/deadline.js";
import {
  TOOL_PROTOCOL,
  describeTools,
  mayBeToolRequest,
  parseToolRequests,
  renderToolResult,
  type ToolRequest
} from "./toolCalls.js";

export const DEFAULT_MAX_TOOL_ROUNDS = 5;

const agentSettingsSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  persona: z.string().default(""),
  /** Seconds; null = unbounded */
  modelTimeout: z.number().positive().nullable().default(null),
  maxToolRounds: z.number().int().min(0).default(DEFAULT_MAX_TOOL_ROUNDS)
});

export type AgentConfig = z.input<typeof agentSettingsSchema> & {
  model?: Model | null;
  tools?: Iterable<Tool>;
  /** Unset = inherit the pool's tracing flag */
  tracing?: boolean;
};

export type AgentResult = {
  output: string;
  toolsUsed: string[];
};

export type ToolCallRecord = {
  agent: string;
  tool: string;
  args: ToolArgs;
  result: unknown;
  ok: boolean;
};

export type AgentRunOptions = {
  signal?: AbortSignal;
  onToolCall?: (record: ToolCallRecord) => void;
};

/**
 * JSON form of an agent inside a package document.
 */
export type AgentDescriptor = {
  name: string;
  description: string;
  persona: string;
  tools: string[];
  /** Set on the agent itself; tracing inherited from a pool is written as false */
  tracing: boolean;
};

type ModelReply = {
  text: string;
  /** Chunks were already yielded to the caller */
  released: boolean;
};

export class Agent {
  readonly name: string;
  readonly description: string;
  readonly persona: string;
  readonly tools: ReadonlyMap<string, Tool>;
  readonly modelTimeout: number | null;
  readonly maxToolRounds: number;
  model: Model | null;
  private _tracing: boolean;
  private _tracingExplicit: boolean;

  constructor(config: AgentConfig) {
    const parsed = agentSettingsSchema.safeParse(config);
    if (!parsed.success) {
      throw new EnsembleError("CONFIG_ERROR", `Invalid agent configuration '${String(config.name)}'`, {
        issues: parsed.error.issues
      });
    }
    this.name = parsed.data.name;
    this.description = parsed.data.description;
    this.persona = parsed.data.persona;
    this.modelTimeout = parsed.data.modelTimeout;
    this.maxToolRounds = parsed.data.maxToolRounds;
    this.model = config.model ?? null;
    this.tools = new Map(Array.from(config.tools ?? [], (tool) => [tool.name, tool]));
    this._tracing = config.tracing ?? false;
    this._tracingExplicit = config.tracing !== undefined;
  }

  get tracing(): boolean {
    return this._tracing;
  }

  /**
   * True when tracing was set on the agent itself; the pool flag then does not apply.
   */
  get tracingExplicit(): boolean {
    return this._tracingExplicit;
  }

  setTracing(enabled: boolean, options?: { explicit?: boolean }): void {
    this._tracing = enabled;
    if (options?.explicit) this._tracingExplicit = true;
  }

  async run(input: string, state: State, options?: AgentRunOptions): Promise<AgentResult> {
    const execution = this.execute(input, state, options, false);
    let step = await execution.next();
    while (!step.done) {
      step = await execution.next();
    }
    return step.value;
  }

  /**
   * Yields output text as the model produces it. Replies that may be tool
   * requests are held back until they are complete.
   */
  stream(input: string, state: State, options?: AgentRunOptions): AsyncGenerator<string, AgentResult, undefined> {
    return this.execute(input, state, options, true);
  }

  toJSON(): AgentDescriptor {
    return {
      name: this.name,
      description: this.description,
      persona: this.persona,
      tools: Array.from(this.tools.keys()),
      tracing: this._tracingExplicit && this._tracing
    };
  }

  async buildPrompt(input: string, state: State, signal?: AbortSignal): Promise<string> {
    const visible = state.historyManager
      ? await state.historyManager.view(state.history, signal !== undefined ? { signal } : undefined)
      : [...state.history];

    const sections: string[] = [];
    if (this.persona) sections.push(this.persona);
    if (this.tools.size > 0) {
      sections.push(`Available tools:\n${describeTools(this.tools.values())}\n${TOOL_PROTOCOL}`);
    }
    if (visible.length > 0) {
      sections.push(`Conversation so far:\n${formatTranscript(visible)}`);
    }
    sections.push(`Input:\n${input}`);
    return sections.join("\n\n");
  }

  private async *execute(
    input: string,
    state: State,
    options: AgentRunOptions | undefined,
    streaming: boolean
  ): AsyncGenerator<string, AgentResult, undefined> {
    const model = this.requireModel();
    const usesTools = this.tools.size > 0;
    const basePrompt = await this.buildPrompt(input, state, options?.signal);
    const toolsUsed: string[] = [];
    const results: string[] = [];

    let prompt = basePrompt;
    for (let round = 0; ; round++) {
      const canCallTools = usesTools && round < this.maxToolRounds;
      let reply: ModelReply;
      if (streaming && model.stream) {
        reply = yield* this.streamReply(model, prompt, canCallTools, options?.signal);
      } else {
        reply = { text: await this.generate(model, prompt, options?.signal), released: false };
      }

      const requests = canCallTools && !reply.released ? parseToolRequests(reply.text) : null;
      if (!requests) {
        if (streaming && !reply.released) yield reply.text;
        return { output: reply.text, toolsUsed };
      }

      for (const request of requests) {
        results.push(await this.dispatch(request, state, toolsUsed, options));
      }
      prompt =
        `${basePrompt}\n\nTool results:\n${results.join("\n")}\n\n` +
        "Answer the input using these results, or request more tools.";
    }
  }

  private async dispatch(
    request: ToolRequest,
    state: State,
    toolsUsed: string[],
    options: AgentRunOptions | undefined
  ): Promise<string> {
    const tool = this.tools.get(request.tool);
    const label = `[${request.tool}] ${renderToolResult(request.args)}`;
    if (!tool) {
      const error = { success: false, error: `Unknown tool '${request.tool}'` };
      this.trace(`unknown tool requested: ${request.tool}`);
      options?.onToolCall?.({ agent: this.name, tool: request.tool, args: request.args, result: error, ok: false });
      return `${label} -> ${renderToolResult(error)}`;
    }

    this.trace(`tool ${tool.name} <- ${renderToolResult(request.args)}`);
    const result = await tool.run(request.args, {
      state,
      ...(options?.signal !== undefined && { signal: options.signal }),
      onRetry: (info) => this.trace(`tool ${info.tool} retry after attempt ${info.attempt + 1} in ${info.delayMs}ms: ${info.error.message}`)
    });
    toolsUsed.push(tool.name);
    const ok = !isToolErrorResult(result);
    this.trace(`tool ${tool.name} -> ${ok ? "ok" : "error"}`);
    options?.onToolCall?.({ agent: this.name, tool: tool.name, args: request.args, result, ok });
    return `${label} -> ${renderToolResult(result)}`;
  }

  private async generate(model: Model, prompt: string, signal: AbortSignal | undefined): Promise<string> {
    this.trace(`model ${model.provider}/${model.model} <- ${prompt.length} chars`);
    const timeoutMs = this.timeoutMs();
    try {
      const text = await withDeadline(
        (deadlineSignal) =>
          model.generate(prompt, {
            signal: deadlineSignal,
            ...(timeoutMs !== null && { timeoutMs })
          }),
        { timeoutMs, signal, label: `Model call for agent '${this.name}'` }
      );
      this.trace(`model -> ${text.length} chars`);
      return text;
    } catch (err) {
      throw this.modelFailure(model, err);
    }
  }

  private async *streamReply(
    model: Model,
    prompt: string,
    canCallTools: boolean,
    signal: AbortSignal | undefined
  ): AsyncGenerator<string, ModelReply, undefined> {
    if (!model.stream) {
      return { text: await this.generate(model, prompt, signal), released: false };
    }
    this.trace(`model ${model.provider}/${model.model} <- ${prompt.length} chars (stream)`);

    const timeoutMs = this.timeoutMs();
    const controller = new AbortController();
    const stopped = (): TimeoutError | null => {
      const reason: unknown = controller.signal.reason;
      return reason instanceof TimeoutError ? reason : null;
    };
    const onAbort = (): void => {
      controller.abort(new TimeoutError(`Model call for agent '${this.name}' was aborted`, timeoutMs, "aborted"));
    };
    const timer = timeoutMs === null
      ? undefined
      : setTimeout(() => {
          controller.abort(new TimeoutError(`Model call for agent '${this.name}' timed out after ${timeoutMs}ms`, timeoutMs));
        }, timeoutMs);
    if (signal?.aborted) onAbort();
    signal?.addEventListener("abort", onAbort, { once: true });

    const iterator = model.stream(prompt, {
      signal: controller.signal,
      ...(timeoutMs !== null && { timeoutMs })
    })[Symbol.asyncIterator]();
    let text = "";
    let released = !canCallTools;
    let finished = false;
    try {
      for (;;) {
        const step = await nextBefore(iterator, controller.signal);
        if (step.done) break;
        text += step.value;
        if (released) {
          yield step.value;
        } else if (!mayBeToolRequest(text)) {
          released = true;
          yield text;
        }
      }
      finished = true;
    } catch (err) {
      finished = true;
      throw this.modelFailure(model, stopped() ?? err);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      if (!finished || controller.signal.aborted) {
        // A stream stuck in an await never settles return(); only wait for idle ones
        const idle = !controller.signal.aborted;
        if (idle) controller.abort();
        await closeStream(iterator, idle);
      }
    }
    this.trace(`model -> ${text.length} chars (stream)`);
    return { text, released };
  }

  private modelFailure(model: Model, err: unknown): EnsembleError {
    if (err instanceof TimeoutError || err instanceof ModelError) return err;
    return new ModelError("unknown", `Model call failed for agent '${this.name}': ${errorMessage(err)}`, {
      provider: model.provider,
      cause: err
    });
  }

  private requireModel(): Model {
    if (!this.model) {
      throw new ModelError("not_configured", `Agent '${this.name}' has no model configured`, { retryable: false });
    }
    return this.model;
  }

  private timeoutMs(): number | null {
    return this.modelTimeout === null ? null : Math.round(this.modelTimeout * 1000);
  }

  private trace(message: string): void {
    if (this._tracing) logTrace(`[${this.name}] ${message}`);
  }
}

/**
 * Next stream item, or a rejection with the signal's reason as soon as it
 * aborts, whether or not the stream itself reacts to the signal.
 */
function nextBefore<T>(iterator: AsyncIterator<T>, signal: AbortSignal): Promise<IteratorResult<T>> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    iterator.next().then(
      (step) => {
        signal.removeEventListener("abort", onAbort);
        resolve(step);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

async function closeStream(iterator: AsyncIterator<string>, wait: boolean): Promise<void> {
  const closing = iterator.return?.();
  if (!closing) return;
  const settled = closing.then(
    () => undefined,
    (err: unknown) => logWarning(`model stream did not close cleanly: ${errorMessage(err)}`)
  );
  if (wait) await settled;
}

export function createAgent(config: AgentConfig): Agent {
  return new Agent(config);
}
