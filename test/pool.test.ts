import { afterEach, describe, expect, it, vi } from "vitest";
import { Agent } from "../src/ensemble/agent/agent.js";
import { EnsembleError, RoutingError } from "../src/ensemble/errors.js";
import { HistoryManager } from "../src/ensemble/history/manager.js";
import type { PoolEvent, PoolStreamEvent } from "../src/ensemble/pool/events.js";
import { DEFAULT_MAX_ITER, Pool, createPool } from "../src/ensemble/pool/pool.js";
import { DecisionRouter, roundRobinRouter } from "../src/ensemble/router/router.js";
import { RoutingAgent } from "../src/ensemble/router/routingAgent.js";
import type { LastResult, Router, RouterResult } from "../src/ensemble/router/types.js";
import { State } from "../src/ensemble/state/state.js";
import type { Message } from "../src/ensemble/state/types.js";
import { createTool } from "../src/ensemble/tools/tool.js";
import { ChunkedModel, ClosableStreamModel, HangingModel, ScriptedModel, StalledStreamModel, collect } from "./helpers.js";

type RouterCall = { callCount: number; lastResult: LastResult | null };

/**
 * Picks `names` in order, then stops. Records what the pool passed in.
 */
function scriptedRouter(names: (string | null)[]): Router & { calls: RouterCall[] } {
  const calls: RouterCall[] = [];
  return {
    calls,
    decide(_state, callCount, lastResult): RouterResult {
      calls.push({ callCount, lastResult });
      return { nextAgentName: names[calls.length - 1] ?? null };
    }
  };
}

function echoAgent(name: string, reply = `${name} says hi`): Agent {
  return new Agent({ name, model: new ScriptedModel([reply]) });
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("Pool construction", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses defaults", () => {
    const pool = new Pool({ agents: [] });
    expect(pool.maxIter).toBe(DEFAULT_MAX_ITER);
    expect(pool.tracing).toBe(false);
    expect(pool.toJSON()).toEqual({ agents: [], maxIter: 5, tracing: false });
  });

  it("rejects invalid settings", () => {
    expect(() => new Pool({ agents: [], maxIter: -1 })).toThrow(EnsembleError);
    expect(() => new Pool({ agents: [], maxIter: 1.5 })).toThrow("Invalid pool configuration");
  });

  it("keeps the last agent registered under a duplicate name", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const first = echoAgent("worker", "first");
    const second = echoAgent("worker", "second");

    const pool = new Pool({ agents: [first, second] });

    expect(pool.agentNames).toEqual(["worker"]);
    expect(pool.agents.get("worker")).toBe(second);
    expect(write).toHaveBeenCalledWith("[ensemble] warn: duplicate agent name 'worker'; the last one registered wins\n");
  });

  it("assigns the default model only to agents without one", () => {
    const own = new ScriptedModel(["own"]);
    const fallback = new ScriptedModel(["fallback"]);
    const withModel = new Agent({ name: "a", model: own });
    const withoutModel = new Agent({ name: "b" });

    new Pool({ agents: [withModel, withoutModel], defaultModel: fallback });

    expect(withModel.model).toBe(own);
    expect(withoutModel.model).toBe(fallback);
  });

  it("applies pool tracing unless the agent set its own", () => {
    const inherits = new Agent({ name: "a" });
    const optedOut = new Agent({ name: "b", tracing: false });

    new Pool({ agents: [inherits, optedOut], tracing: true });

    expect(inherits.tracing).toBe(true);
    expect(optedOut.tracing).toBe(false);
  });

  it("binds the agent registry to stateful routers", () => {
    class FirstAgentRouter extends DecisionRouter {
      select(): string | null {
        return this.agents.keys().next().value ?? null;
      }

      get bound(): number {
        return this.agents.size;
      }
    }
    const router = new FirstAgentRouter();

    new Pool({ agents: [echoAgent("a"), echoAgent("b")], router });

    expect(router.bound).toBe(2);
  });

  it("replaces the state's history manager when history is given", () => {
    const state = new State({ historyManager: new HistoryManager({ maxContextMessages: 50 }) });
    const manager = new HistoryManager({ maxContextMessages: 3 });

    new Pool({ agents: [], state, history: manager });
    expect(state.historyManager).toBe(manager);

    new Pool({ agents: [], state, history: { maxContextMessages: 7 } });
    expect(state.historyManager?.settings.maxContextMessages).toBe(7);
  });
});

describe("Pool.run", () => {
  it("returns an empty string when the router stops immediately", async () => {
    const pool = new Pool({ agents: [echoAgent("a")] });

    expect(await pool.run("hello")).toBe("");
    expect(pool.state.history.map((m) => [m.role, m.content])).toEqual([["user", "hello"]]);
  });

  it("calls the router with call count 0 and no last result first", async () => {
    const router = scriptedRouter(["a", "b", null]);
    const pool = new Pool({ agents: [echoAgent("a"), echoAgent("b")], router });

    expect(await pool.run("go")).toBe("b says hi");
    expect(router.calls).toEqual([
      { callCount: 0, lastResult: null },
      { callCount: 1, lastResult: { agent: "a", output: "a says hi", toolsUsed: [] } },
      { callCount: 2, lastResult: { agent: "b", output: "b says hi", toolsUsed: [] } }
    ]);
  });

  it("hands each agent the previous output as its input", async () => {
    const second = new ScriptedModel(["done"]);
    const pool = new Pool({
      agents: [echoAgent("a", "draft"), new Agent({ name: "b", model: second })],
      router: scriptedRouter(["a", "b"])
    });

    await pool.run("start");

    expect(second.prompts[0]?.endsWith("Input:\ndraft")).toBe(true);
  });

  it("records who said what", async () => {
    const pool = new Pool({
      agents: [echoAgent("agent1"), echoAgent("agent2")],
      router: roundRobinRouter(["agent1", "agent2"]),
      maxIter: 3
    });

    await pool.run("hi");

    expect(pool.state.history.map((m) => [m.role, m.agent, m.content])).toEqual([
      ["user", undefined, "hi"],
      ["assistant", "agent1", "agent1 says hi"],
      ["assistant", "agent2", "agent2 says hi"],
      ["assistant", "agent1", "agent1 says hi"]
    ]);
  });

  it("stops at maxIter", async () => {
    const pool = new Pool({ agents: [echoAgent("a")], router: roundRobinRouter(["a"]), maxIter: 2 });

    await pool.run("x");

    expect(pool.state.history.filter((m) => m.role === "assistant")).toHaveLength(2);
  });

  it("lets the router stop well before a large maxIter", async () => {
    const router = scriptedRouter(["a", "a", "a"]);
    const pool = new Pool({ agents: [echoAgent("a")], router, maxIter: 1000 });

    await pool.run("x");

    expect(router.calls).toHaveLength(4);
    expect(pool.state.history.filter((m) => m.role === "assistant")).toHaveLength(3);
  });

  it("never consults the router with maxIter 0", async () => {
    const router = scriptedRouter(["a"]);
    const pool = new Pool({ agents: [echoAgent("a")], router, maxIter: 0 });

    expect(await pool.run("x")).toBe("");
    expect(router.calls).toHaveLength(0);
    expect(pool.state.history).toHaveLength(1);
  });

  it("keeps history across runs", async () => {
    const pool = new Pool({ agents: [echoAgent("a")], router: scriptedRouter(["a", null, "a"]) });

    await pool.run("first");
    const output = await pool.run("second");

    expect(output).toBe("a says hi");
    expect(pool.state.history.map((m) => m.content)).toEqual(["first", "a says hi", "second", "a says hi"]);
  });

  it("fails with RoutingError for an unknown agent", async () => {
    const pool = new Pool({ agents: [echoAgent("a")], router: scriptedRouter(["ghost"]) });

    const err = await pool.run("x").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RoutingError);
    expect(err).toMatchObject({ message: "Router selected unknown agent 'ghost'", details: { agentName: "ghost", known: ["a"] } });
    expect(pool.state.history).toEqual([expect.objectContaining({ role: "user", content: "x" })]);
  });

  it("accepts a plain routing function", async () => {
    const pool = createPool({
      agents: [echoAgent("a")],
      router: (_state, callCount) => ({ nextAgentName: callCount === 0 ? "a" : null })
    });

    expect(await pool.run("x")).toBe("a says hi");
  });

  it("shares the key/value store with tools", async () => {
    const remember = createTool({
      name: "remember",
      parameters: { value: { type: "string" } },
      operation: (args, context) => {
        context.state?.set("remembered", args.value);
        return "ok";
      }
    });
    const agent = new Agent({
      name: "keeper",
      model: new ScriptedModel(['{"tool": "remember", "args": {"value": "tea"}}', "Noted."]),
      tools: [remember]
    });
    const pool = new Pool({ agents: [agent], router: scriptedRouter(["keeper"]) });

    await pool.run("remember tea");

    expect(pool.state.get("remembered")).toBe("tea");
  });

  it("runs one call at a time", async () => {
    let active = 0;
    let peak = 0;
    const slowModel = new ScriptedModel([]);
    slowModel.generate = async () => {
      active++;
      peak = Math.max(peak, active);
      await nextTick();
      active--;
      return "done";
    };
    const pool = new Pool({
      agents: [new Agent({ name: "a", model: slowModel })],
      router: (_state, callCount) => ({ nextAgentName: callCount === 0 ? "a" : null })
    });

    await Promise.all([pool.run("one"), pool.run("two")]);

    expect(peak).toBe(1);
    expect(pool.state.history.map((m) => m.content)).toEqual(["one", "done", "two", "done"]);
  });

  it("stops between turns when the signal aborts", async () => {
    const controller = new AbortController();
    const abortOnReply = {
      append: (message: Message) => {
        if (message.role === "assistant") controller.abort();
        return Promise.resolve();
      },
      load: () => Promise.resolve([]),
      clear: () => Promise.resolve()
    };
    const pool = new Pool({
      agents: [echoAgent("a")],
      router: roundRobinRouter(["a"]),
      history: { store: abortOnReply }
    });

    await expect(pool.run("x", { signal: controller.signal })).rejects.toMatchObject({
      code: "TIMEOUT",
      reason: "aborted",
      message: "Run was aborted"
    });
    expect(pool.state.history.filter((m) => m.role === "assistant")).toHaveLength(1);
  });

  it("propagates agent failures", async () => {
    const pool = new Pool({ agents: [new Agent({ name: "idle" })], router: scriptedRouter(["idle"]) });
    await expect(pool.run("x")).rejects.toMatchObject({ type: "not_configured" });
  });

  it("cancels a routing model call through the signal", async () => {
    const controller = new AbortController();
    const pool = new Pool({
      agents: [echoAgent("a")],
      router: new RoutingAgent({ name: "lead", model: new HangingModel() })
    });

    const pending = pool.run("hi", { signal: controller.signal });
    await nextTick();
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: "TIMEOUT", reason: "aborted" });
    expect(pool.state.history.map((m) => m.content)).toEqual(["hi"]);
  });

  it("settles an aborted run even when the router ignores the signal", async () => {
    const controller = new AbortController();
    let routerSignal: AbortSignal | undefined;
    const pool = new Pool({
      agents: [echoAgent("a")],
      router: (_state, _callCount, _lastResult, options) => {
        routerSignal = options?.signal;
        return new Promise<RouterResult>(() => undefined);
      }
    });

    const pending = pool.run("hi", { signal: controller.signal });
    await nextTick();
    controller.abort();

    await expect(pending).rejects.toMatchObject({ message: "Routing decision was aborted", reason: "aborted" });
    expect(routerSignal?.aborted).toBe(true);
  });

  it("cancels a running agent through the signal", async () => {
    const controller = new AbortController();
    const pool = new Pool({ agents: [new Agent({ name: "a", model: new HangingModel() })], router: scriptedRouter(["a"]) });

    const pending = pool.run("x", { signal: controller.signal });
    await nextTick();
    controller.abort();

    await expect(pending).rejects.toMatchObject({ reason: "aborted" });
  });
});

describe("Pool events", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports the run lifecycle in order", async () => {
    const events: PoolEvent[] = [];
    const add = createTool({ name: "add", parameters: { a: { type: "number" } }, operation: (args) => Number(args.a) + 1 });
    const agent = new Agent({
      name: "calc",
      model: new ScriptedModel(['{"tool": "add", "args": {"a": 1}}', "2"]),
      tools: [add]
    });
    const pool = new Pool({ agents: [agent], router: scriptedRouter(["calc"]), onEvent: (event) => void events.push(event) });

    await pool.run("1+1");
    await nextTick();

    expect(events.map((e) => e.type)).toEqual([
      "run_started",
      "agent_started",
      "tool_invoked",
      "agent_completed",
      "run_completed"
    ]);
    expect(new Set(events.map((e) => e.runId)).size).toBe(1);
    expect(events[0]).toMatchObject({ input: "1+1", maxIter: 5 });
    expect(events[2]).toMatchObject({ agent: "calc", tool: "add", ok: true });
    expect(events[3]).toMatchObject({ agent: "calc", callCount: 0, toolsUsed: ["add"] });
    expect(events[4]).toMatchObject({ status: "ok", calls: 1 });
  });

  it("reports a failed run once", async () => {
    const events: PoolEvent[] = [];
    const pool = new Pool({ agents: [], router: scriptedRouter(["ghost"]), onEvent: (event) => void events.push(event) });

    await expect(pool.run("x")).rejects.toBeInstanceOf(RoutingError);
    await nextTick();

    const completed = events.filter((e) => e.type === "run_completed");
    expect(completed).toHaveLength(1);
    expect(completed[0]).toMatchObject({
      status: "error",
      calls: 0,
      error: { code: "ROUTING_ERROR", message: "Router selected unknown agent 'ghost'" }
    });
  });

  it("logs handler failures without failing the run", async () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const pool = new Pool({
      agents: [],
      onEvent: () => {
        throw new Error("handler broke");
      }
    });

    await expect(pool.run("x")).resolves.toBe("");
    await nextTick();

    expect(write).toHaveBeenCalledWith("[ensemble] warn: pool event handler failed on run_started: handler broke\n");
  });
});

describe("Pool streaming", () => {
  it("streams token text and returns the final output", async () => {
    const pool = new Pool({
      agents: [new Agent({ name: "a", model: new ChunkedModel(["Hello world"], 5) })],
      router: scriptedRouter(["a"])
    });

    const { items, result } = await collect(pool.stream("hi"));

    expect(items).toEqual(["Hello", " worl", "d"]);
    expect(result).toBe("Hello world");
    expect(pool.state.lastMessage()?.content).toBe("Hello world");
  });

  it("observes structured progress", async () => {
    const add = createTool({ name: "add", parameters: { a: { type: "number" } }, operation: (args) => Number(args.a) + 1 });
    const pool = new Pool({
      agents: [
        new Agent({ name: "calc", model: new ChunkedModel(['{"tool": "add", "args": {"a": 1}}', "It is 2"], 8), tools: [add] })
      ],
      router: scriptedRouter(["calc"])
    });

    const { items, result } = await collect(pool.streamObserve("1+1"));

    const expected: PoolStreamEvent[] = [
      { type: "agent_start", agent: "calc", callCount: 0 },
      { type: "tool", agent: "calc", tool: "add", args: { a: 1 }, result: 2, ok: true },
      { type: "token", agent: "calc", text: "It is 2" },
      { type: "agent_end", agent: "calc", output: "It is 2", toolsUsed: ["add"] },
      { type: "final", output: "It is 2" }
    ];
    expect(items).toEqual(expected);
    expect(result).toBe("It is 2");
  });

  it("times out an agent whose stream stalls", async () => {
    const pool = new Pool({
      agents: [new Agent({ name: "a", model: new StalledStreamModel(), modelTimeout: 0.02 })],
      router: scriptedRouter(["a"])
    });

    await expect(collect(pool.stream("hi"))).rejects.toThrow("Model call for agent 'a' timed out after 20ms");
    expect(pool.state.history).toHaveLength(1);
  });

  it("closes the agent's model stream when the consumer stops early", async () => {
    const model = new ClosableStreamModel(["one two three"]);
    const pool = new Pool({ agents: [new Agent({ name: "a", model })], router: scriptedRouter(["a"]) });

    for await (const chunk of pool.stream("hi")) {
      expect(chunk).toBe("one ");
      break;
    }

    expect(model.closed).toBe(true);
  });

  it("reports a cancelled run and frees the pool when the consumer stops early", async () => {
    const events: PoolEvent[] = [];
    const pool = new Pool({
      agents: [new Agent({ name: "a", model: new ChunkedModel(["one two three"], 4) })],
      router: roundRobinRouter(["a"]),
      onEvent: (event) => void events.push(event)
    });

    for await (const chunk of pool.stream("go")) {
      expect(chunk).toBe("one ");
      break;
    }
    await nextTick();

    expect(events.filter((e) => e.type === "run_completed")).toMatchObject([{ status: "cancelled", calls: 0 }]);
    await expect(pool.run("again")).resolves.toBe("one two three");
  });
});
