import type { Agent } from "../agent/agent.js";
import type { State } from "../state/state.js";
import type {
  DecideOptions,
  LastResult,
  Router,
  RouterDescriptor,
  RouterFunction,
  RouterLike,
  RouterResult
} from "./types.js";

const STOP: RouterResult = Object.freeze({ nextAgentName: null });

/**
 * Plain routing function with a name, so it can be referenced from a package.
 */
export class FunctionRouter implements Router {
  readonly name: string;
  private readonly fn: RouterFunction;

  constructor(fn: RouterFunction, name?: string) {
    this.fn = fn;
    this.name = name ?? (fn.name || "router");
  }

  decide(
    state: State,
    callCount: number,
    lastResult: LastResult | null,
    options?: DecideOptions
  ): RouterResult | Promise<RouterResult> {
    return this.fn(state, callCount, lastResult, options);
  }

  describe(): RouterDescriptor {
    return { type: "function", name: this.name };
  }
}

/**
 * Base for stateful routers that pick by conversation state. The pool
 * tracks the call count; subclasses only choose a name or null.
 */
export abstract class DecisionRouter implements Router {
  protected agents: ReadonlyMap<string, Agent> = new Map();

  bindAgents(agents: ReadonlyMap<string, Agent>): void {
    this.agents = agents;
  }

  abstract select(
    state: State,
    lastResult: LastResult | null,
    options?: DecideOptions
  ): string | null | Promise<string | null>;

  async decide(
    state: State,
    _callCount: number,
    lastResult: LastResult | null,
    options?: DecideOptions
  ): Promise<RouterResult> {
    return { nextAgentName: await this.select(state, lastResult, options) };
  }
}

export function toRouter(router: RouterLike): Router {
  return typeof router === "function" ? new FunctionRouter(router) : router;
}

export function stopRouter(): Router {
  return {
    decide: () => STOP,
    describe: () => ({ type: "stop" })
  };
}

/**
 * Cycles through `names` by call count. Never stops on its own; an empty
 * list always stops.
 */
export function roundRobinRouter(names: readonly string[]): Router {
  const order = [...names];
  return {
    decide: (_state, callCount) => ({ nextAgentName: order[callCount % order.length] ?? null }),
    describe: () => ({ type: "round_robin", agents: [...order] })
  };
}
