import { EnsembleError } from "../../errors.js";
import { ToolRegistry } from "../registry.js";
import type { Tool } from "../tool.js";
import { createHttpRequestTool } from "./httpRequest.js";

export { createHttpRequestTool, httpRequest, validateUrl, isBlockedAddress } from "./httpRequest.js";
export type { HttpRequestResult } from "./httpRequest.js";

const BUILTIN_FACTORIES: Record<string, () => Tool> = {
  http_request: createHttpRequestTool
};

export const BUILTIN_TOOL_NAMES: readonly string[] = Object.keys(BUILTIN_FACTORIES);

/**
 * Fresh registry holding the requested built-in tools (all by default).
 */
export function createBuiltinToolRegistry(names: readonly string[] = BUILTIN_TOOL_NAMES): ToolRegistry {
  const registry = new ToolRegistry();
  for (const name of names) {
    const factory = BUILTIN_FACTORIES[name];
    if (!factory) {
      throw new EnsembleError("CONFIG_ERROR", `Unknown built-in tool '${name}'`, { known: BUILTIN_TOOL_NAMES });
    }
    registry.register(factory());
  }
  return registry;
}
