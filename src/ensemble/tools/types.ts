/**
 * Tool runtime types.
 *
 * A tool declares its parameters as a small, JSON-serializable schema
 * (name -> type constraint, optional default) and its execution policy
 * (timeout, retries, backoff, error handling). Both round-trip through
 * the package format.
 */

import { z } from "zod";
import type { State } from "../state/state.js";

export const paramTypeSchema = z.enum(["string", "number", "integer", "boolean", "object", "array", "null", "any"]);

export type ParamType = z.infer<typeof paramTypeSchema>;

export const parameterSpecSchema = z.object({
  type: z.union([paramTypeSchema, z.array(paramTypeSchema).min(1)]),
  description: z.string().optional(),
  /** Defaults to true unless a default is declared */
  required: z.boolean().optional(),
  default: z.unknown().optional()
});

export type ParameterSpec = z.infer<typeof parameterSpecSchema>;

export type ParameterSchema = Record<string, ParameterSpec>;

export const onErrorSchema = z.enum(["raise", "return_error"]);

export type OnError = z.infer<typeof onErrorSchema>;

export const toolPolicySchema = z.object({
  /** Seconds; null = unbounded */
  timeout: z.number().positive().nullable().default(null),
  maxRetries: z.number().int().min(0).default(0),
  /** Seconds before the first retry */
  retryDelay: z.number().min(0).default(1),
  /** Exponential backoff: retryDelay * 2^attempt */
  retryBackoff: z.boolean().default(true),
  onError: onErrorSchema.default("raise")
});

export const toolDefinitionSchema = toolPolicySchema.extend({
  name: z.string().regex(/^[A-Za-z0-9_.-]+$/, "Tool names may only contain letters, digits, '_', '.' and '-'"),
  description: z.string().default(""),
  parameters: z.record(parameterSpecSchema).default({})
});

export type ToolDefinition = z.infer<typeof toolDefinitionSchema>;

export type ToolDefinitionInput = z.input<typeof toolDefinitionSchema>;

export type ToolArgs = Record<string, unknown>;

export type ToolContext = {
  tool: string;
  /** 0 for the first try */
  attempt: number;
  /** Aborted when the attempt times out or the caller cancels */
  signal: AbortSignal;
  state: State | null;
};

export type ToolOperation<TResult = unknown> = (args: ToolArgs, context: ToolContext) => TResult | Promise<TResult>;

export type ToolRetryInfo = {
  tool: string;
  /** Attempt that just failed */
  attempt: number;
  delayMs: number;
  error: Error;
};

export type ToolRunOptions = {
  /** Seconds; overrides the declared timeout */
  timeout?: number;
  signal?: AbortSignal;
  state?: State;
  onRetry?: (info: ToolRetryInfo) => void;
};

export type ToolErrorType = "validation" | "timeout" | "execution";

/**
 * Structured failure produced instead of throwing when `onError` is `return_error`.
 */
export type ToolErrorResult = {
  success: false;
  error: string;
  errorType: ToolErrorType;
  attempts: number;
  statusCode?: number;
};

export function isToolErrorResult(value: unknown): value is ToolErrorResult {
  return (
    typeof value === "object" &&
    value !== null &&
    "success" in value &&
    value.success === false &&
    "errorType" in value &&
    "error" in value &&
    typeof value.error === "string"
  );
}
