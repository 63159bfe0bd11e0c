import { z } from "zod";
import { EnsembleError, ModelError } from "../errors.js";
import type { EmbeddingModel } from "../models/types.js";
import type { State } from "../state/state.js";
import { withDeadline } from "../utils/deadline.js";
import { DecisionRouter } from "./router.js";
import type { DecideOptions, LastResult, RouterDescriptor } from "./types.js";

export const DEFAULT_SEMANTIC_THRESHOLD = 0.5;

const semanticSettingsSchema = z.object({
  name: z.string().min(1).default("semantic"),
  /** Cosine similarity; the same range a package document accepts */
  threshold: z.number().min(-1).max(1).default(DEFAULT_SEMANTIC_THRESHOLD),
  /** Seconds per embedding call; null = unbounded */
  timeout: z.number().positive().nullable().default(null)
});

export type SemanticRouteTarget = {
  name: string;
  description: string;
};

export type SemanticRouterConfig = z.input<typeof semanticSettingsSchema> & {
  model: EmbeddingModel;
  agents: readonly SemanticRouteTarget[];
};

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Routes the opening user message to the agent whose description is most
 * similar, then stops after that agent has answered.
 */
export class SemanticRouter extends DecisionRouter {
  readonly name: string;
  readonly threshold: number;
  readonly timeout: number | null;
  /** Milliseconds per embedding call; null = unbounded */
  private readonly timeoutMs: number | null;
  private readonly model: EmbeddingModel;
  private readonly routes: ReadonlyArray<{ name: string; embedding: number[] }>;

  private constructor(
    settings: SemanticSettings,
    model: EmbeddingModel,
    routes: ReadonlyArray<{ name: string; embedding: number[] }>
  ) {
    super();
    this.name = settings.name;
    this.threshold = settings.threshold;
    this.timeout = settings.timeout;
    this.timeoutMs = settings.timeout === null ? null : Math.round(settings.timeout * 1000);
    this.model = model;
    this.routes = routes;
  }

  /**
   * Embeds every agent description once, up front.
   */
  static async create(config: SemanticRouterConfig): Promise<SemanticRouter> {
    const parsed = semanticSettingsSchema.safeParse(config);
    if (!parsed.success) {
      throw new EnsembleError("CONFIG_ERROR", "Invalid semantic router configuration", {
        issues: parsed.error.issues
      });
    }
    const settings = parsed.data;
    const timeoutMs = settings.timeout === null ? null : Math.round(settings.timeout * 1000);
    const descriptions = config.agents.map((agent) => agent.description);
    const embeddings = descriptions.length > 0
      ? await embedWithin(config.model, descriptions, timeoutMs, undefined, settings.name)
      : [];
    if (embeddings.length !== config.agents.length) {
      throw new ModelError(
        "invalid_request",
        `Expected ${config.agents.length} embeddings, got ${embeddings.length}`,
        { provider: config.model.provider }
      );
    }
    const routes = config.agents.map((agent, idx) => ({ name: agent.name, embedding: embeddings[idx] ?? [] }));
    return new SemanticRouter(settings, config.model, routes);
  }

  get agentNames(): string[] {
    return this.routes.map((route) => route.name);
  }

  async select(state: State, lastResult: LastResult | null, options?: DecideOptions): Promise<string | null> {
    if (lastResult !== null || this.routes.length === 0) return null;
    const query = state.lastMessage("user");
    if (!query) return null;

    const [embedding] = await embedWithin(this.model, [query.content], this.timeoutMs, options?.signal, this.name);
    if (!embedding) return null;

    let best: { name: string; score: number } | null = null;
    for (const route of this.routes) {
      const score = cosineSimilarity(embedding, route.embedding);
      if (best === null || score > best.score) {
        best = { name: route.name, score };
      }
    }
    return best !== null && best.score >= this.threshold ? best.name : null;
  }

  describe(): RouterDescriptor {
    return {
      type: "semantic",
      name: this.name,
      agents: this.agentNames,
      threshold: this.threshold,
      ...(this.timeout !== null && { timeout: this.timeout })
    };
  }
}

type SemanticSettings = z.infer<typeof semanticSettingsSchema>;

function embedWithin(
  model: EmbeddingModel,
  texts: string[],
  timeoutMs: number | null,
  signal: AbortSignal | undefined,
  routerName: string
): Promise<number[][]> {
  return withDeadline(
    (deadlineSignal) => model.embed(texts, { signal: deadlineSignal, ...(timeoutMs !== null && { timeoutMs }) }),
    { timeoutMs, signal, label: `Embedding call for semantic router '${routerName}'` }
  );
}
