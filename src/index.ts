export {
  EnsembleError,
  ModelError,
  RoutingError,
  TimeoutError,
  ToolExecutionError,
  ValidationError,
  errorMessage,
  errorResult,
  okResult,
  toEnsembleError
} from "./ensemble/errors.js";
export type { EnsembleErrorCode, ModelErrorType, RunEnvelope } from "./ensemble/errors.js";
export { logTrace, logWarning } from "./ensemble/log.js";
export type { LogLevel } from "./ensemble/log.js";

export { Agent, createAgent, DEFAULT_MAX_TOOL_ROUNDS } from "./ensemble/agent/agent.js";
export type { AgentConfig, AgentDescriptor, AgentResult, AgentRunOptions, ToolCallRecord } from "./ensemble/agent/agent.js";
export { parseToolRequests } from "./ensemble/agent/toolCalls.js";
export type { ToolRequest } from "./ensemble/agent/toolCalls.js";

export { HistoryManager, formatTranscript } from "./ensemble/history/manager.js";
export { InMemoryHistoryStore } from "./ensemble/history/inMemoryStore.js";
export { SqliteHistoryStore } from "./ensemble/history/sqliteStore.js";
export type { HistoryConfig, HistorySettings, HistoryStore, HistoryStrategy, HistoryViewOptions } from "./ensemble/history/types.js";

export { OpenAIModel, StubModel, createModelFromEnv, createOpenAIModelFromEnv } from "./ensemble/models/index.js";
export type { EmbedOptions, EmbeddingModel, GenerateOptions, Model, ModelClientConfig } from "./ensemble/models/index.js";

export {
  PACKAGE_FORMAT,
  PACKAGE_VERSION,
  loadPackage,
  packageSchema,
  parsePackage,
  readPackageFile,
  toPackage,
  writePackageFile
} from "./ensemble/package/package.js";
export type { PackageDocument, PackageResolvers } from "./ensemble/package/package.js";

export { DEFAULT_MAX_ITER, Pool, createPool } from "./ensemble/pool/pool.js";
export type { PoolCatalog, PoolDescriptor, PoolOptions, PoolRunOptions } from "./ensemble/pool/pool.js";
export type { PoolEvent, PoolEventHandler, PoolEventType, PoolStreamEvent } from "./ensemble/pool/events.js";

export * from "./ensemble/router/index.js";

export { State } from "./ensemble/state/state.js";
export type { StateInit } from "./ensemble/state/state.js";
export { createMessage } from "./ensemble/state/types.js";
export type { Message, MessageRole } from "./ensemble/state/types.js";

export { Tool, createTool } from "./ensemble/tools/tool.js";
export type { ToolConfig } from "./ensemble/tools/tool.js";
export { ToolBuilder } from "./ensemble/tools/builder.js";
export type { ToolMetadata } from "./ensemble/tools/builder.js";
export { ToolRegistry } from "./ensemble/tools/registry.js";
export { BUILTIN_TOOL_NAMES, createBuiltinToolRegistry, createHttpRequestTool } from "./ensemble/tools/builtin/index.js";
export type { HttpRequestResult } from "./ensemble/tools/builtin/index.js";
export { isToolErrorResult } from "./ensemble/tools/types.js";
export type {
  OnError,
  ParamType,
  ParameterSchema,
  ParameterSpec,
  ToolArgs,
  ToolContext,
  ToolDefinition,
  ToolErrorResult,
  ToolOperation,
  ToolRunOptions
} from "./ensemble/tools/types.js";

export { CapacityExceededError, ConcurrencyLimiter } from "./ensemble/utils/concurrencyLimiter.js";
