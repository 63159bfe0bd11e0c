import { z } from "zod";
import { EnsembleError, ModelError, TimeoutError, errorMessage } from "../errors.js";
import { formatTranscript } from "../history/manager.js";
import type { Model } from "../models/types.js";
import type { State } from "../state/state.js";
import { withDeadline } from "../utils/deadline.js";
import { DecisionRouter } from "./router.js";
import type { DecideOptions, LastResult, RouterDescriptor } from "./types.js";

export const STOP_TOKEN = "STOP";

export const DEFAULT_ROUTER_PERSONA =
  "You coordinate a team of agents. Pick the agent that should act next, or STOP when the task is complete.";

const HISTORY_WINDOW = 10;

const routingAgentSettingsSchema = z.object({
  name: z.string().min(1),
  /** Seconds; null = unbounded */
  timeout: z.number().positive().nullable().default(null)
});

export type RoutingAgentConfig = z.input<typeof routingAgentSettingsSchema> & {
  model: Model;
  persona?: string;
  /** Candidate agents; all registered agents when omitted */
  agents?: readonly string[];
};

/**
 * Model-backed router. The reply must be one candidate name or STOP;
 * anything unrecognized stops the run.
 */
export class RoutingAgent extends DecisionRouter {
  readonly name: string;
  readonly persona: string;
  readonly timeout: number | null;
  model: Model;
  private readonly candidates: readonly string[] | null;

  constructor(config: RoutingAgentConfig) {
    super();
    const parsed = routingAgentSettingsSchema.safeParse(config);
    if (!parsed.success) {
      throw new EnsembleError("CONFIG_ERROR", `Invalid routing agent configuration '${String(config.name)}'`, {
        issues: parsed.error.issues
      });
    }
    this.name = parsed.data.name;
    this.timeout = parsed.data.timeout;
    this.model = config.model;
    this.persona = config.persona ?? DEFAULT_ROUTER_PERSONA;
    this.candidates = config.agents ? [...config.agents] : null;
  }

  candidateNames(): string[] {
    return this.candidates ? [...this.candidates] : Array.from(this.agents.keys());
  }

  async select(state: State, lastResult: LastResult | null, options?: DecideOptions): Promise<string | null> {
    const names = this.candidateNames();
    if (names.length === 0) return null;

    const prompt = this.buildPrompt(state, lastResult, names);
    const timeoutMs = this.timeout === null ? null : Math.round(this.timeout * 1000);
    let reply: string;
    try {
      reply = await withDeadline(
        (signal) => this.model.generate(prompt, { signal, ...(timeoutMs !== null && { timeoutMs }) }),
        { timeoutMs, signal: options?.signal, label: `Routing model call for '${this.name}'` }
      );
    } catch (err) {
      if (err instanceof ModelError || err instanceof TimeoutError) throw err;
      throw new ModelError("unknown", `Routing model call failed for '${this.name}': ${errorMessage(err)}`, {
        provider: this.model.provider,
        cause: err
      });
    }
    return matchCandidate(reply, names);
  }

  buildPrompt(state: State, lastResult: LastResult | null, names: readonly string[]): string {
    const roster = names
      .map((name) => {
        const description = this.agents.get(name)?.description;
        return description ? `- ${name}: ${description}` : `- ${name}`;
      })
      .join("\n");
    const sections = [this.persona, `Agents:\n${roster}`];
    const recent = state.history.slice(-HISTORY_WINDOW);
    if (recent.length > 0) {
      sections.push(`Conversation:\n${formatTranscript(recent)}`);
    }
    if (lastResult) {
      sections.push(`Last result from ${lastResult.agent}:\n${lastResult.output}`);
    }
    sections.push(`Reply with exactly one agent name from the list, or ${STOP_TOKEN}.`);
    return sections.join("\n\n");
  }

  describe(): RouterDescriptor {
    return {
      type: "routing_agent",
      name: this.name,
      persona: this.persona,
      agents: this.candidateNames(),
      ...(this.timeout !== null && { timeout: this.timeout })
    };
  }
}

/**
 * Exact match first, then case-insensitive; otherwise null.
 */
export function matchCandidate(reply: string, names: readonly string[]): string | null {
  const answer = reply.trim().replace(/^["'`]+|["'`.]+$/g, "");
  if (!answer || answer.toUpperCase() === STOP_TOKEN) return null;
  if (names.includes(answer)) return answer;
  const lowered = answer.toLowerCase();
  return names.find((name) => name.toLowerCase() === lowered) ?? null;
}
