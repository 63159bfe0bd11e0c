import { z } from "zod";
import type { Agent } from "../agent/agent.js";
import type { State } from "../state/state.js";

/**
 * `nextAgentName: null` ends the run.
 */
export type RouterResult = {
  nextAgentName: string | null;
};

export type LastResult = {
  agent: string;
  output: string;
  toolsUsed: string[];
};

export const routerDescriptorSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("stop") }),
  z.object({ type: z.literal("round_robin"), agents: z.array(z.string()) }),
  z.object({ type: z.literal("function"), name: z.string().min(1) }),
  z.object({
    type: z.literal("routing_agent"),
    name: z.string().min(1),
    persona: z.string(),
    agents: z.array(z.string()),
    timeout: z.number().positive().optional()
  }),
  z.object({
    type: z.literal("semantic"),
    name: z.string().min(1),
    agents: z.array(z.string()),
    threshold: z.number().min(-1).max(1),
    timeout: z.number().positive().optional()
  })
]);

export type RouterDescriptor = z.infer<typeof routerDescriptorSchema>;

export type DecideOptions = {
  /** Aborted when the run is cancelled */
  signal?: AbortSignal;
};

/**
 * Decides which agent acts next. Routers never validate names; the pool does.
 */
export interface Router {
  decide(
    state: State,
    callCount: number,
    lastResult: LastResult | null,
    options?: DecideOptions
  ): RouterResult | Promise<RouterResult>;
  /** Receives the pool's live agent registry at construction and before every run */
  bindAgents?(agents: ReadonlyMap<string, Agent>): void;
  /** Package form; routers without one cannot be serialized */
  describe?(): RouterDescriptor;
}

export type RouterFunction = (
  state: State,
  callCount: number,
  lastResult: LastResult | null,
  options?: DecideOptions
) => RouterResult | Promise<RouterResult>;

export type RouterLike = Router | RouterFunction;
