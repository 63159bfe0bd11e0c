/**
 * Model module.
 *
 * Exports:
 * - Model and embedding interfaces
 * - OpenAI-compatible client
 * - Factory for creating a model from env
 */

export type { GenerateOptions, EmbedOptions, Model, EmbeddingModel, ModelClientConfig } from "./types.js";
export { StubModel } from "./types.js";
export { OpenAIModel, createOpenAIModelFromEnv } from "./openai.js";

import { StubModel, type Model } from "./types.js";
import { createOpenAIModelFromEnv } from "./openai.js";

/**
 * Create a model from environment variables.
 * Returns StubModel if no provider keys are configured.
 */
export function createModelFromEnv(env: NodeJS.ProcessEnv = process.env): Model {
  return createOpenAIModelFromEnv(env) ?? new StubModel();
}
