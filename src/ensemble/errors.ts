export type EnsembleErrorCode =
  | "VALIDATION_ERROR"
  | "TIMEOUT"
  | "TOOL_EXECUTION_ERROR"
  | "ROUTING_ERROR"
  | "MODEL_ERROR"
  | "BAD_PACKAGE"
  | "CONFIG_ERROR"
  | "HISTORY_STORE"
  | "INTERNAL";

export class EnsembleError extends Error {
  readonly code: EnsembleErrorCode;
  readonly details?: unknown;

  constructor(code: EnsembleErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "EnsembleError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }

  toJSON(): { code: EnsembleErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

/**
 * Tool arguments missing or of the wrong shape. Never retried.
 */
export class ValidationError extends EnsembleError {
  constructor(message: string, details?: unknown) {
    super("VALIDATION_ERROR", message, details);
    this.name = "ValidationError";
  }
}

/**
 * An operation exceeded its time bound or was aborted by the caller.
 */
export class TimeoutError extends EnsembleError {
  readonly timeoutMs: number | null;
  readonly reason: "timeout" | "aborted";

  constructor(message: string, timeoutMs: number | null, reason: "timeout" | "aborted" = "timeout") {
    super("TIMEOUT", message, { timeoutMs, reason });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
    this.reason = reason;
  }
}

/**
 * The operation wrapped by a tool threw.
 */
export class ToolExecutionError extends EnsembleError {
  readonly tool: string;
  readonly statusCode?: number;

  constructor(tool: string, message: string, options?: { statusCode?: number; cause?: unknown }) {
    super("TOOL_EXECUTION_ERROR", message, { tool }, { cause: options?.cause });
    this.name = "ToolExecutionError";
    this.tool = tool;
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }
}

/**
 * The router selected an agent the pool does not know. Fatal for the run.
 */
export class RoutingError extends EnsembleError {
  readonly agentName: string;

  constructor(agentName: string, known: string[]) {
    super("ROUTING_ERROR", `Router selected unknown agent '${agentName}'`, { agentName, known });
    this.name = "RoutingError";
    this.agentName = agentName;
  }
}

/**
 * Error types from model providers, normalized for the orchestrator.
 */
export type ModelErrorType =
  | "rate_limited"      // Provider rate limit hit
  | "timeout"           // Request timed out
  | "auth_error"        // Invalid API key or auth failure
  | "invalid_request"   // Malformed request (terminal error)
  | "provider_error"    // Provider-side issue (5xx)
  | "context_length"    // Input too long for model
  | "not_configured"    // Agent has no model
  | "unknown";

export class ModelError extends EnsembleError {
  readonly type: ModelErrorType;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly provider?: string;
  readonly statusCode?: number;

  constructor(
    type: ModelErrorType,
    message: string,
    options?: {
      retryable?: boolean;
      retryAfterMs?: number;
      provider?: string;
      statusCode?: number;
      cause?: unknown;
    }
  ) {
    super("MODEL_ERROR", message, { type }, { cause: options?.cause });
    this.name = "ModelError";
    this.type = type;
    this.retryable = options?.retryable ?? isDefaultRetryable(type);
    if (options?.retryAfterMs !== undefined) {
      this.retryAfterMs = options.retryAfterMs;
    }
    if (options?.provider !== undefined) {
      this.provider = options.provider;
    }
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }

  override toJSON(): { code: EnsembleErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      details: {
        type: this.type,
        retryable: this.retryable,
        ...(this.retryAfterMs !== undefined && { retryAfterMs: this.retryAfterMs }),
        ...(this.provider !== undefined && { provider: this.provider }),
        ...(this.statusCode !== undefined && { statusCode: this.statusCode })
      }
    };
  }
}

function isDefaultRetryable(type: ModelErrorType): boolean {
  switch (type) {
    case "rate_limited":
    case "timeout":
    case "provider_error":
      return true;
    default:
      return false;
  }
}

export function toEnsembleError(err: unknown): EnsembleError {
  if (err instanceof EnsembleError) return err;
  if (err instanceof Error) {
    if (err.name === "ZodError") {
      return new ValidationError("Validation error", { issues: "issues" in err ? err.issues : undefined });
    }
    return new EnsembleError("INTERNAL", err.message, { name: err.name, stack: err.stack });
  }
  return new EnsembleError("INTERNAL", "Unknown error", { err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Result envelope for CLI and JSON surfaces.
 */
export type RunEnvelope<T> =
  | { kind: "ok"; value: T }
  | { kind: "error"; code: EnsembleErrorCode; message: string; details?: unknown };

export function okResult<T>(value: T): RunEnvelope<T> {
  return { kind: "ok", value };
}

export function errorResult(err: EnsembleError): RunEnvelope<never> {
  return {
    kind: "error",
    code: err.code,
    message: err.message,
    ...(err.details !== undefined && { details: err.details })
  };
}
