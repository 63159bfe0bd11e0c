import { z } from "zod";
import type { Tool } from "../tools/tool.js";
import type { ToolArgs } from "../tools/types.js";

export type ToolRequest = {
  tool: string;
  args: ToolArgs;
};

const toolRequestSchema = z.object({
  tool: z.string().min(1),
  args: z.record(z.unknown()).default({})
});

const toolReplySchema = z.union([
  toolRequestSchema.transform((request): ToolRequest[] => [request]),
  z.object({ tools: z.array(toolRequestSchema).min(1) }).transform(({ tools }): ToolRequest[] => tools)
]);

const FENCE = /^```(?:json)?[ \t]*\r?\n([\s\S]*?)\r?\n?```$/;

/**
 * Tool requests in a model response, or null when the response is a
 * final answer. Accepts a bare JSON object or one in a ```json fence.
 */
export function parseToolRequests(response: string): ToolRequest[] | null {
  const trimmed = response.trim();
  const candidate = (FENCE.exec(trimmed)?.[1] ?? trimmed).trim();
  if (!candidate.startsWith("{")) return null;

  let data: unknown;
  try {
    data = JSON.parse(candidate);
  } catch {
    return null;
  }
  const parsed = toolReplySchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

/**
 * True while a partial response could still turn out to be a tool request.
 */
export function mayBeToolRequest(partial: string): boolean {
  const head = partial.trimStart();
  return head.length === 0 || head.startsWith("{") || head.startsWith("`");
}

export function describeTools(tools: Iterable<Tool>): string {
  const lines: string[] = [];
  for (const tool of tools) {
    lines.push(`- ${tool.name}: ${tool.description}`);
    if (Object.keys(tool.parameters).length > 0) {
      lines.push(`  parameters: ${JSON.stringify(tool.parameters)}`);
    }
  }
  return lines.join("\n");
}

export const TOOL_PROTOCOL =
  'To use tools, reply with only a JSON object: {"tool": "<name>", "args": {...}} ' +
  'or {"tools": [{"tool": "<name>", "args": {...}}]}. Otherwise reply with your answer.';

/**
 * JSON rendering of a tool result for the follow-up prompt.
 */
export function renderToolResult(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "null";
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
