import { ValidationError } from "../errors.js";
import { Tool } from "./tool.js";
import type { ToolDefinitionInput, ToolOperation } from "./types.js";

export type ToolMetadata = Omit<ToolDefinitionInput, "name"> & {
  /** Defaults to the function's name */
  name?: string;
};

/**
 * Builds tools from plain functions. Inference happens once, here; the
 * resulting Tool carries a frozen definition.
 */
export const ToolBuilder = {
  fromCallable<TResult>(fn: ToolOperation<TResult>, metadata: ToolMetadata = {}): Tool<TResult> {
    const name = metadata.name ?? fn.name;
    if (!name) {
      throw new ValidationError("Cannot infer a tool name from an anonymous function; pass metadata.name");
    }
    if (metadata.parameters === undefined && fn.length > 0) {
      throw new ValidationError(`Tool '${name}' takes arguments but declares no parameters`, { tool: name });
    }
    return new Tool({
      ...metadata,
      name,
      description: metadata.description ?? `Run ${name}`,
      operation: fn
    });
  }
};
