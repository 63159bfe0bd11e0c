/**
 * OpenAI-compatible model client.
 *
 * Works with:
 * - OpenAI API
 * - Azure OpenAI
 * - OpenAI-compatible APIs (Ollama, LM Studio, vLLM, etc.)
 */

import { z } from "zod";
import { ModelError, type ModelErrorType } from "../errors.js";
import { logWarning } from "../log.js";
import type { EmbedOptions, EmbeddingModel, GenerateOptions, Model, ModelClientConfig } from "./types.js";

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
      finish_reason: z.string().nullable().optional()
    })
  ),
  model: z.string().optional()
});

const chatChunkSchema = z.object({
  choices: z.array(z.object({ delta: z.object({ content: z.string().nullable().optional() }) }))
});

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) }))
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string() })
});

export class OpenAIModel implements Model, EmbeddingModel {
  readonly provider = "openai";
  readonly model: string;
  readonly embeddingModel: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly defaultTemperature: number;

  constructor(config: ModelClientConfig) {
    if (!config.apiKey) {
      throw new ModelError("not_configured", "OpenAI model requires apiKey", { provider: "openai" });
    }
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.embeddingModel = config.embeddingModel ?? "text-embedding-3-small";
    this.baseUrl = config.baseUrl ?? "https://api.openai.com/v1";
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? 60_000;
    this.defaultMaxTokens = config.defaultMaxTokens ?? 4096;
    this.defaultTemperature = config.defaultTemperature ?? 0.7;
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    const json = await this.post("/chat/completions", this.chatBody(prompt, options), options?.timeoutMs, options?.signal);
    const parsed = chatResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ModelError("provider_error", "Malformed chat completion response", { provider: this.provider });
    }
    return parsed.data.choices[0]?.message.content ?? "";
  }

  async embed(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    if (texts.length === 0) return [];
    const json = await this.post(
      "/embeddings",
      { model: this.embeddingModel, input: texts },
      options?.timeoutMs,
      options?.signal
    );
    const parsed = embeddingResponseSchema.safeParse(json);
    if (!parsed.success || parsed.data.data.length !== texts.length) {
      throw new ModelError("provider_error", "Malformed embeddings response", { provider: this.provider });
    }
    return [...parsed.data.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }

  /**
   * Chat completion over server-sent events. Yields content deltas.
   */
  async *stream(prompt: string, options?: GenerateOptions): AsyncGenerator<string, void, undefined> {
    const { response, close } = await this.open("/chat/completions", {
      ...this.chatBody(prompt, options),
      stream: true
    }, options?.timeoutMs, options?.signal);

    let reader: ReadableStreamDefaultReader<Uint8Array> | undefined;
    // false while the body may still have unread data
    let drained = false;
    try {
      if (!response.body) {
        throw new ModelError("provider_error", "Streaming response has no body", { provider: this.provider });
      }
      reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffer = "";
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          drained = true;
          break;
        }
        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split("\n");
        buffer = lines.pop() ?? "";
        for (const line of lines) {
          const payload = line.startsWith("data:") ? line.slice(5).trim() : "";
          if (!payload) continue;
          if (payload === "[DONE]") return;
          const chunk = chatChunkSchema.safeParse(safeJson(payload));
          const delta = chunk.success ? chunk.data.choices[0]?.delta.content : undefined;
          if (delta) yield delta;
        }
      }
    } catch (err) {
      drained = true;
      throw this.toModelError(err);
    } finally {
      close();
      if (reader && !drained) await reader.cancel();
    }
  }

  private chatBody(prompt: string, options: GenerateOptions | undefined): Record<string, unknown> {
    return {
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: options?.maxTokens ?? this.defaultMaxTokens,
      temperature: options?.temperature ?? this.defaultTemperature
    };
  }

  private async post(
    endpoint: string,
    body: unknown,
    timeoutMsOverride: number | undefined,
    signal: AbortSignal | undefined
  ): Promise<unknown> {
    const { response, close } = await this.open(endpoint, body, timeoutMsOverride, signal);
    try {
      const data: unknown = await response.json();
      return data;
    } catch (err) {
      throw this.toModelError(err);
    } finally {
      close();
    }
  }

  /**
   * Send a request and return the successful response. `close` ends the
   * timeout and detaches the caller's signal; call it once the body is read.
   */
  private async open(
    endpoint: string,
    body: unknown,
    timeoutMsOverride: number | undefined,
    signal: AbortSignal | undefined
  ): Promise<{ response: Response; close: () => void }> {
    const timeoutMs = timeoutMsOverride ?? this.defaultTimeoutMs;
    const controller = new AbortController();

    // Wire up external abort signal
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort);

    const timeoutId = setTimeout(() => {
      controller.abort(new ModelError("timeout", `Request timed out after ${timeoutMs}ms`, {
        provider: this.provider,
        retryable: true
      }));
    }, timeoutMs);
    const close = (): void => {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    };

    try {
      const response = await fetch(`${this.baseUrl}${endpoint}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Authorization": `Bearer ${this.apiKey}`
        },
        body: JSON.stringify(body),
        signal: controller.signal
      });

      if (!response.ok) {
        throw await this.handleErrorResponse(response);
      }
      return { response, close };
    } catch (err) {
      close();
      const reason: unknown = controller.signal.reason;
      throw reason instanceof ModelError ? reason : this.toModelError(err);
    }
  }

  private toModelError(err: unknown): ModelError {
    if (err instanceof ModelError) {
      return err;
    }
    if (err instanceof Error) {
      if (err.name === "AbortError" || err.name === "TimeoutError") {
        return new ModelError("timeout", "Request aborted", { provider: this.provider, retryable: true });
      }
      return new ModelError("unknown", err.message, { provider: this.provider, cause: err });
    }
    return new ModelError("unknown", "Unknown error during model call", { provider: this.provider });
  }

  private async handleErrorResponse(response: Response): Promise<ModelError> {
    const status = response.status;
    let message = `HTTP ${status}`;
    let errorType: ModelErrorType;
    let retryAfterMs: number | undefined;

    const text = await response.text();
    const parsedBody = safeJson(text);
    const errorBody = errorBodySchema.safeParse(parsedBody);
    if (errorBody.success) {
      message = errorBody.data.error.message;
    }

    const retryAfter = response.headers.get("Retry-After");
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        retryAfterMs = seconds * 1000;
      }
    }

    switch (status) {
      case 401:
      case 403:
        errorType = "auth_error";
        break;
      case 429:
        errorType = "rate_limited";
        retryAfterMs = retryAfterMs ?? 5000;
        break;
      case 400:
        if (message.toLowerCase().includes("context length") ||
            message.toLowerCase().includes("maximum context")) {
          errorType = "context_length";
        } else {
          errorType = "invalid_request";
        }
        break;
      default:
        errorType = status >= 500 ? "provider_error" : "unknown";
    }

    const errorOptions: { provider: string; statusCode: number; retryAfterMs?: number } = {
      provider: this.provider,
      statusCode: status
    };
    if (retryAfterMs !== undefined) {
      errorOptions.retryAfterMs = retryAfterMs;
    }

    return new ModelError(errorType, message, errorOptions);
  }
}

function safeJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

const envNumberSchemas = {
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive(),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive(),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2)
};

/**
 * Numeric setting from the environment; unset or invalid values leave the
 * client default in place.
 */
function envNumber(env: NodeJS.ProcessEnv, key: keyof typeof envNumberSchemas): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const parsed = envNumberSchemas[key].safeParse(raw);
  if (!parsed.success) {
    logWarning(`ignoring invalid ${key}='${raw}'`);
    return undefined;
  }
  return parsed.data;
}

/**
 * Create an OpenAI model from environment variables.
 */
export function createOpenAIModelFromEnv(env: NodeJS.ProcessEnv = process.env): OpenAIModel | null {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    return null;
  }

  const timeoutMs = envNumber(env, "OPENAI_TIMEOUT_MS");
  const maxTokens = envNumber(env, "OPENAI_MAX_TOKENS");
  const temperature = envNumber(env, "OPENAI_TEMPERATURE");
  const config: ModelClientConfig = {
    apiKey,
    model: env.OPENAI_MODEL ?? "gpt-4o",
    ...(timeoutMs !== undefined && { defaultTimeoutMs: timeoutMs }),
    ...(maxTokens !== undefined && { defaultMaxTokens: maxTokens }),
    ...(temperature !== undefined && { defaultTemperature: temperature })
  };

  const baseUrl = env.OPENAI_BASE_URL;
  if (baseUrl) {
    config.baseUrl = baseUrl;
  }
  const embeddingModel = env.OPENAI_EMBEDDING_MODEL;
  if (embeddingModel) {
    config.embeddingModel = embeddingModel;
  }

  return new OpenAIModel(config);
}
