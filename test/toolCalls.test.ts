import { describe, expect, it } from "vitest";
import {
  describeTools,
  mayBeToolRequest,
  parseToolRequests,
  renderToolResult
} from "../src/ensemble/agent/toolCalls.js";
import { createTool } from "../src/ensemble/tools/tool.js";

describe("parseToolRequests", () => {
  it("reads a single bare request", () => {
    expect(parseToolRequests('{"tool": "search", "args": {"q": "tea"}}')).toEqual([
      { tool: "search", args: { q: "tea" } }
    ]);
  });

  it("reads a request inside a json fence", () => {
    const reply = '```json\n{"tool": "search", "args": {"q": "tea"}}\n```';
    expect(parseToolRequests(reply)).toEqual([{ tool: "search", args: { q: "tea" } }]);
  });

  it("reads a list of requests", () => {
    const reply = '{"tools": [{"tool": "a", "args": {"x": 1}}, {"tool": "b"}]}';
    expect(parseToolRequests(reply)).toEqual([
      { tool: "a", args: { x: 1 } },
      { tool: "b", args: {} }
    ]);
  });

  it("treats prose as a final answer", () => {
    expect(parseToolRequests("The answer is 42.")).toBeNull();
    expect(parseToolRequests("")).toBeNull();
  });

  it("treats JSON that is not a request as a final answer", () => {
    expect(parseToolRequests('{"answer": 42}')).toBeNull();
    expect(parseToolRequests('{"tools": []}')).toBeNull();
    expect(parseToolRequests('{"tool": ""}')).toBeNull();
  });

  it("treats malformed JSON as a final answer", () => {
    expect(parseToolRequests('{"tool": "search", ')).toBeNull();
  });
});

describe("mayBeToolRequest", () => {
  it("holds back empty and JSON-looking prefixes", () => {
    expect(mayBeToolRequest("")).toBe(true);
    expect(mayBeToolRequest("  ")).toBe(true);
    expect(mayBeToolRequest('{"to')).toBe(true);
    expect(mayBeToolRequest("``")).toBe(true);
  });

  it("releases prose", () => {
    expect(mayBeToolRequest("Sure")).toBe(false);
  });
});

describe("renderToolResult", () => {
  it("renders values as JSON and strings as-is", () => {
    expect(renderToolResult({ ok: true })).toBe('{"ok":true}');
    expect(renderToolResult(3)).toBe("3");
    expect(renderToolResult("plain")).toBe("plain");
    expect(renderToolResult(undefined)).toBe("null");
  });

  it("falls back to String for values JSON cannot encode", () => {
    expect(renderToolResult(10n)).toBe("10");
  });
});

describe("describeTools", () => {
  it("lists names, descriptions and parameters", () => {
    const tools = [
      createTool({ name: "now", description: "Current time", operation: () => "12:00" }),
      createTool({
        name: "search",
        description: "Search the web",
        parameters: { q: { type: "string" } },
        operation: () => []
      })
    ];

    expect(describeTools(tools)).toBe(
      '- now: Current time\n- search: Search the web\n  parameters: {"q":{"type":"string"}}'
    );
  });
});
