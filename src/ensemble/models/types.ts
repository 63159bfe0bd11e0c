/**
 * Model boundary.
 *
 * The orchestrator treats a model as an opaque `generate(prompt) -> text`
 * call that may be slow or remote. Failures surface as ModelError; model
 * calls are never retried by the core.
 */

export type GenerateOptions = {
  /** Abort signal for cancellation */
  signal?: AbortSignal;
  /** Request timeout in ms */
  timeoutMs?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Temperature (0-2, lower = more deterministic) */
  temperature?: number;
};

export interface Model {
  readonly provider: string;
  readonly model: string;

  generate(prompt: string, options?: GenerateOptions): Promise<string>;

  /**
   * Optional incremental variant. Chunks concatenate to the generate() text.
   */
  stream?(prompt: string, options?: GenerateOptions): AsyncIterable<string>;
}

export type EmbedOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

export interface EmbeddingModel {
  readonly provider: string;

  /**
   * Returns one vector per input text, in input order.
   */
  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

export type ModelClientConfig = {
  /** API key (required for cloud providers) */
  apiKey?: string;
  /** Base URL for API (for self-hosted or proxy) */
  baseUrl?: string;
  /** Chat model identifier */
  model: string;
  /** Embedding model identifier */
  embeddingModel?: string;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  defaultTemperature?: number;
};

/**
 * Model used when no provider keys are configured.
 */
export class StubModel implements Model {
  readonly provider = "stub";
  readonly model = "none";

  generate(_prompt: string, _options?: GenerateOptions): Promise<string> {
    return Promise.resolve("[Model execution disabled. Set OPENAI_API_KEY to enable generation.]");
  }
}
