/**
 * Package documents: a JSON description of tools, agents and the pool.
 *
 * Operations, models and function routers are code and never serialized;
 * loadPackage() resolves them by name from the caller's resolvers.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { Agent } from "../agent/agent.js";
import { EnsembleError, errorMessage } from "../errors.js";
import type { EmbeddingModel, Model } from "../models/types.js";
import { Pool, DEFAULT_MAX_ITER, type PoolOptions } from "../pool/pool.js";
import { FunctionRouter, roundRobinRouter, stopRouter } from "../router/router.js";
import { RoutingAgent } from "../router/routingAgent.js";
import { SemanticRouter } from "../router/semantic.js";
import { routerDescriptorSchema, type Router, type RouterDescriptor, type RouterLike } from "../router/types.js";
import { createBuiltinToolRegistry } from "../tools/builtin/index.js";
import type { ToolRegistry } from "../tools/registry.js";
import { Tool } from "../tools/tool.js";
import { toolDefinitionSchema } from "../tools/types.js";

export const PACKAGE_FORMAT = "ensemble.package";
export const PACKAGE_VERSION = 1;

const agentEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  persona: z.string().default(""),
  tools: z.array(z.string()).default([]),
  tracing: z.boolean().default(false)
});

const poolEntrySchema = z.object({
  agents: z.array(z.string()),
  router: routerDescriptorSchema.default({ type: "stop" }),
  maxIter: z.number().int().min(0).default(DEFAULT_MAX_ITER),
  tracing: z.boolean().default(false)
});

export const packageSchema = z.object({
  format: z.literal(PACKAGE_FORMAT),
  version: z.literal(PACKAGE_VERSION),
  tools: z.array(toolDefinitionSchema).default([]),
  agents: z.array(agentEntrySchema),
  pool: poolEntrySchema
});

export type PackageDocument = z.infer<typeof packageSchema>;

export type PackageResolvers = {
  /** Source of tool operations; defaults to the built-in registry */
  tools?: ToolRegistry;
  /** Function routers by name */
  routers?: Record<string, RouterLike>;
  /** Models by agent or routing-agent name */
  models?: Record<string, Model>;
  defaultModel?: Model;
  /** Embedding models by semantic router name */
  embeddingModels?: Record<string, EmbeddingModel>;
  /** Runtime options that are not part of the document */
  pool?: Omit<PoolOptions, "agents" | "router" | "maxIter" | "tracing" | "defaultModel" | "catalog">;
};

function badPackage(message: string, details?: unknown): EnsembleError {
  return new EnsembleError("BAD_PACKAGE", message, details);
}

export function parsePackage(document: unknown): PackageDocument {
  const parsed = packageSchema.safeParse(document);
  if (!parsed.success) {
    throw badPackage("Invalid package document", { issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Describe a pool as a package document. Catalog entries come first, in
 * their original order, so a loaded package serializes back unchanged.
 */
export function toPackage(pool: Pool): PackageDocument {
  const tools = new Map<string, Tool>();
  const addTool = (tool: Tool): void => {
    const seen = tools.get(tool.name);
    if (seen && seen !== tool) {
      throw badPackage(`Two different tools are named '${tool.name}'`, { tool: tool.name });
    }
    tools.set(tool.name, tool);
  };

  const agents = new Map<string, Agent>(pool.catalog.agents);
  for (const agent of pool.agents.values()) {
    agents.set(agent.name, agent);
  }
  for (const tool of pool.catalog.tools.values()) {
    addTool(tool);
  }
  for (const agent of agents.values()) {
    for (const tool of agent.tools.values()) {
      addTool(tool);
    }
  }

  const router = pool.router.describe?.();
  if (!router) {
    throw badPackage("The pool's router has no package form; use a named FunctionRouter or a built-in router");
  }

  return {
    format: PACKAGE_FORMAT,
    version: PACKAGE_VERSION,
    tools: Array.from(tools.values(), (tool) => tool.toJSON()),
    agents: Array.from(agents.values(), (agent) => agent.toJSON()),
    pool: { ...pool.toJSON(), router }
  };
}

export async function loadPackage(document: unknown, resolvers: PackageResolvers = {}): Promise<Pool> {
  const doc = parsePackage(document);
  const registry = resolvers.tools ?? createBuiltinToolRegistry();

  const tools = new Map<string, Tool>();
  for (const entry of doc.tools) {
    if (!registry.has(entry.name)) {
      throw badPackage(`No operation registered for tool '${entry.name}'`, { known: registry.names() });
    }
    tools.set(entry.name, new Tool({ ...entry, operation: registry.get(entry.name).operation }));
  }

  const agents = new Map<string, Agent>();
  for (const entry of doc.agents) {
    const agentTools = entry.tools.map((name) => {
      const tool = tools.get(name) ?? (registry.has(name) ? registry.get(name) : undefined);
      if (!tool) throw badPackage(`Agent '${entry.name}' uses unknown tool '${name}'`);
      return tool;
    });
    const model = resolvers.models?.[entry.name];
    agents.set(entry.name, new Agent({
      name: entry.name,
      description: entry.description,
      persona: entry.persona,
      tools: agentTools,
      ...(model !== undefined && { model }),
      // false is the inherit-from-pool default, not an explicit opt-out
      ...(entry.tracing && { tracing: true })
    }));
  }

  const members = doc.pool.agents.map((name) => {
    const agent = agents.get(name);
    if (!agent) throw badPackage(`Pool references unknown agent '${name}'`);
    return agent;
  });

  const router = await buildRouter(doc.pool.router, agents, resolvers);
  return new Pool({
    ...resolvers.pool,
    agents: members,
    router,
    maxIter: doc.pool.maxIter,
    tracing: doc.pool.tracing,
    ...(resolvers.defaultModel !== undefined && { defaultModel: resolvers.defaultModel }),
    catalog: { tools: tools.values(), agents: agents.values() }
  });
}

async function buildRouter(
  descriptor: RouterDescriptor,
  agents: ReadonlyMap<string, Agent>,
  resolvers: PackageResolvers
): Promise<Router> {
  switch (descriptor.type) {
    case "stop":
      return stopRouter();
    case "round_robin":
      return roundRobinRouter(descriptor.agents);
    case "function": {
      const router = resolvers.routers?.[descriptor.name];
      if (!router) throw badPackage(`No router function registered as '${descriptor.name}'`);
      return typeof router === "function" ? new FunctionRouter(router, descriptor.name) : router;
    }
    case "routing_agent": {
      const model = resolvers.models?.[descriptor.name] ?? resolvers.defaultModel;
      if (!model) throw badPackage(`No model for routing agent '${descriptor.name}'`);
      return new RoutingAgent({
        name: descriptor.name,
        model,
        persona: descriptor.persona,
        agents: descriptor.agents,
        ...(descriptor.timeout !== undefined && { timeout: descriptor.timeout })
      });
    }
    case "semantic": {
      const model = resolvers.embeddingModels?.[descriptor.name];
      if (!model) throw badPackage(`No embedding model for semantic router '${descriptor.name}'`);
      const targets = descriptor.agents.map((name) => {
        const agent = agents.get(name);
        if (!agent) throw badPackage(`Semantic router '${descriptor.name}' references unknown agent '${name}'`);
        return { name, description: agent.description };
      });
      return SemanticRouter.create({
        name: descriptor.name,
        model,
        agents: targets,
        threshold: descriptor.threshold,
        ...(descriptor.timeout !== undefined && { timeout: descriptor.timeout })
      });
    }
  }
}

export async function readPackageFile(filePath: string): Promise<PackageDocument> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw badPackage(`Cannot read package file ${filePath}: ${errorMessage(err)}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw badPackage(`Package file ${filePath} is not valid JSON: ${errorMessage(err)}`);
  }
  return parsePackage(data);
}

export async function writePackageFile(filePath: string, source: Pool | PackageDocument): Promise<void> {
  const document = source instanceof Pool ? toPackage(source) : parsePackage(source);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
}
