import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  EnsembleError,
  ModelError,
  RoutingError,
  TimeoutError,
  ToolExecutionError,
  ValidationError,
  errorResult,
  okResult,
  toEnsembleError
} from "../src/ensemble/errors.js";

describe("EnsembleError", () => {
  it("creates error with code and message", () => {
    const err = new EnsembleError("BAD_PACKAGE", "Test message");
    expect(err.code).toBe("BAD_PACKAGE");
    expect(err.message).toBe("Test message");
    expect(err.name).toBe("EnsembleError");
  });

  it("includes details when provided", () => {
    const err = new EnsembleError("CONFIG_ERROR", "Bad option", { option: "maxIter" });
    expect(err.details).toEqual({ option: "maxIter" });
  });

  it("toJSON excludes details when undefined", () => {
    const json = new EnsembleError("INTERNAL", "Something went wrong").toJSON();
    expect(json).toEqual({ code: "INTERNAL", message: "Something went wrong" });
    expect("details" in json).toBe(false);
  });
});

describe("error taxonomy", () => {
  it("gives each subclass its fixed code", () => {
    expect(new ValidationError("v").code).toBe("VALIDATION_ERROR");
    expect(new TimeoutError("t", 100).code).toBe("TIMEOUT");
    expect(new ToolExecutionError("search", "x").code).toBe("TOOL_EXECUTION_ERROR");
    expect(new RoutingError("ghost", ["a"]).code).toBe("ROUTING_ERROR");
    expect(new ModelError("auth_error", "m").code).toBe("MODEL_ERROR");
  });

  it("RoutingError names the unknown agent", () => {
    const err = new RoutingError("ghost", ["alpha", "beta"]);
    expect(err.message).toBe("Router selected unknown agent 'ghost'");
    expect(err.agentName).toBe("ghost");
    expect(err.details).toEqual({ agentName: "ghost", known: ["alpha", "beta"] });
  });

  it("TimeoutError records bound and reason", () => {
    const timeout = new TimeoutError("slow", 250);
    expect(timeout.timeoutMs).toBe(250);
    expect(timeout.reason).toBe("timeout");
    expect(new TimeoutError("stop", null, "aborted").reason).toBe("aborted");
  });

  it("ToolExecutionError keeps status code and cause", () => {
    const cause = new Error("boom");
    const err = new ToolExecutionError("fetcher", "failed", { statusCode: 502, cause });
    expect(err.statusCode).toBe(502);
    expect(err.cause).toBe(cause);
    expect(err.tool).toBe("fetcher");
  });

  it("ModelError defaults retryable from its type", () => {
    expect(new ModelError("rate_limited", "x").retryable).toBe(true);
    expect(new ModelError("provider_error", "x").retryable).toBe(true);
    expect(new ModelError("auth_error", "x").retryable).toBe(false);
    expect(new ModelError("not_configured", "x").retryable).toBe(false);
  });

  it("ModelError serializes provider details", () => {
    const err = new ModelError("rate_limited", "slow down", { provider: "openai", statusCode: 429, retryAfterMs: 5000 });
    expect(err.toJSON()).toEqual({
      code: "MODEL_ERROR",
      message: "slow down",
      details: { type: "rate_limited", retryable: true, retryAfterMs: 5000, provider: "openai", statusCode: 429 }
    });
  });
});

describe("toEnsembleError", () => {
  it("returns EnsembleError unchanged", () => {
    const original = new ValidationError("bad args");
    expect(toEnsembleError(original)).toBe(original);
  });

  it("converts regular Error to INTERNAL", () => {
    const result = toEnsembleError(new Error("Something failed"));
    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Something failed");
    expect(result.details).toHaveProperty("name", "Error");
    expect(result.details).toHaveProperty("stack");
  });

  it("converts ZodError to VALIDATION_ERROR", () => {
    const parsed = z.object({ name: z.string() }).safeParse({});
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      const result = toEnsembleError(parsed.error);
      expect(result.code).toBe("VALIDATION_ERROR");
      expect(result.message).toBe("Validation error");
      expect(result.details).toHaveProperty("issues");
    }
  });

  it("converts unknown values to INTERNAL", () => {
    const result = toEnsembleError("string error");
    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Unknown error");
    expect(result.details).toEqual({ err: "string error" });
  });
});

describe("Result helpers", () => {
  it("okResult wraps value", () => {
    const value = { output: "done" };
    const result = okResult(value);
    expect(result.kind).toBe("ok");
    if (result.kind === "ok") {
      expect(result.value).toBe(value);
    }
  });

  it("errorResult creates error envelope", () => {
    const result = errorResult(new EnsembleError("BAD_PACKAGE", "Invalid package", { file: "team.json" }));
    expect(result).toEqual({
      kind: "error",
      code: "BAD_PACKAGE",
      message: "Invalid package",
      details: { file: "team.json" }
    });
  });
});
