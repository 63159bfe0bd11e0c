import { z } from "zod";
import {
  EnsembleError,
  TimeoutError,
  ToolExecutionError,
  ValidationError,
  errorMessage
} from "../errors.js";
import {
  toolDefinitionSchema,
  type ParamType,
  type ParameterSchema,
  type ParameterSpec,
  type ToolArgs,
  type ToolDefinition,
  type ToolDefinitionInput,
  type ToolErrorResult,
  type ToolErrorType,
  type ToolOperation,
  type ToolRunOptions
} from "./types.js";
import { sleep, withDeadline } from "../utils/deadline.js";

export type ToolConfig<TResult> = ToolDefinitionInput & {
  operation: ToolOperation<TResult>;
};

function zodForType(type: ParamType): z.ZodTypeAny {
  switch (type) {
    case "string":
      return z.string();
    case "number":
      return z.number();
    case "integer":
      return z.number().int();
    case "boolean":
      return z.boolean();
    case "object":
      return z.record(z.unknown());
    case "array":
      return z.array(z.unknown());
    case "null":
      return z.null();
    case "any":
      return z.unknown();
  }
}

function zodForSpec(spec: ParameterSpec): z.ZodTypeAny {
  const types = Array.isArray(spec.type) ? spec.type : [spec.type];
  const [first, second, ...rest] = types.map(zodForType);
  if (!first) return z.unknown();
  const base = second ? z.union([first, second, ...rest]) : first;
  return isRequired(spec) ? base : base.optional();
}

function isRequired(spec: ParameterSpec): boolean {
  return spec.default === undefined && spec.required !== false;
}

function compileArgsSchema(parameters: ParameterSchema): z.ZodType<ToolArgs> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(parameters)) {
    shape[name] = zodForSpec(spec);
  }
  return z.object(shape);
}

/**
 * A named, schema-validated operation wrapped in timeout, retry and
 * error-policy handling. Tool values are immutable; the runtime keeps no
 * state across calls.
 */
export class Tool<TResult = unknown> {
  readonly definition: Readonly<ToolDefinition>;
  readonly operation: ToolOperation<TResult>;
  private readonly argsSchema: z.ZodType<ToolArgs>;

  constructor(config: ToolConfig<TResult>) {
    const { operation, ...definition } = config;
    const parsed = toolDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw new EnsembleError("CONFIG_ERROR", `Invalid tool definition '${String(definition.name)}'`, {
        issues: parsed.error.issues
      });
    }
    this.definition = Object.freeze(parsed.data);
    this.operation = operation;
    this.argsSchema = compileArgsSchema(parsed.data.parameters);
  }

  get name(): string {
    return this.definition.name;
  }

  get description(): string {
    return this.definition.description;
  }

  get parameters(): ParameterSchema {
    return this.definition.parameters;
  }

  /**
   * Validate, then execute under the effective timeout, retrying timeouts
   * and execution failures up to `maxRetries` times. Validation failures
   * are never retried.
   */
  async run(args: ToolArgs, options?: ToolRunOptions): Promise<TResult | ToolErrorResult> {
    let validated: ToolArgs;
    try {
      validated = this.validate(args);
    } catch (err) {
      return this.fail(this.normalize(err), 0);
    }

    const timeoutSeconds = options?.timeout ?? this.definition.timeout;
    const timeoutMs = timeoutSeconds === null ? null : Math.round(timeoutSeconds * 1000);
    const { maxRetries, retryDelay, retryBackoff } = this.definition;

    let attempt = 0;
    for (;;) {
      try {
        return await this.invoke(validated, timeoutMs, attempt, options);
      } catch (err) {
        const failure = this.normalize(err);
        const retryable = !(failure instanceof ValidationError) &&
          !(failure instanceof TimeoutError && failure.reason === "aborted");
        if (!retryable || attempt >= maxRetries) {
          return this.fail(failure, attempt + 1);
        }
        const delayMs = retryDelay * 1000 * (retryBackoff ? 2 ** attempt : 1);
        options?.onRetry?.({ tool: this.name, attempt, delayMs, error: failure });
        try {
          await sleep(delayMs, options?.signal);
        } catch (waitErr) {
          return this.fail(this.normalize(waitErr), attempt + 1);
        }
        attempt++;
      }
    }
  }

  /**
   * Fill declared defaults for missing optional parameters, then check the
   * arguments against the parameter schema.
   */
  validate(args: ToolArgs): ToolArgs {
    const filled: ToolArgs = { ...args };
    for (const [name, spec] of Object.entries(this.definition.parameters)) {
      if (filled[name] === undefined && spec.default !== undefined) {
        filled[name] = structuredClone(spec.default);
      }
    }
    const parsed = this.argsSchema.safeParse(filled);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(args)"}: ${issue.message}`)
        .join("; ");
      throw new ValidationError(`Invalid arguments for tool '${this.name}': ${detail}`, {
        tool: this.name,
        issues: parsed.error.issues
      });
    }
    return parsed.data;
  }

  toJSON(): ToolDefinition {
    return {
      name: this.definition.name,
      description: this.definition.description,
      parameters: structuredClone(this.definition.parameters),
      timeout: this.definition.timeout,
      maxRetries: this.definition.maxRetries,
      retryDelay: this.definition.retryDelay,
      retryBackoff: this.definition.retryBackoff,
      onError: this.definition.onError
    };
  }

  private invoke(
    args: ToolArgs,
    timeoutMs: number | null,
    attempt: number,
    options: ToolRunOptions | undefined
  ): Promise<TResult> {
    return withDeadline(
      (signal) => this.operation(args, { tool: this.name, attempt, signal, state: options?.state ?? null }),
      { timeoutMs, signal: options?.signal, label: `Tool '${this.name}'` }
    );
  }

  private normalize(err: unknown): EnsembleError {
    if (err instanceof TimeoutError || err instanceof ValidationError || err instanceof ToolExecutionError) {
      return err;
    }
    const statusCode = readStatusCode(err);
    return new ToolExecutionError(this.name, `Tool '${this.name}' failed: ${errorMessage(err)}`, {
      cause: err,
      ...(statusCode !== undefined && { statusCode })
    });
  }

  private fail(failure: EnsembleError, attempts: number): ToolErrorResult {
    if (this.definition.onError === "raise") {
      throw failure;
    }
    const result: ToolErrorResult = {
      success: false,
      error: failure.message,
      errorType: errorTypeOf(failure),
      attempts
    };
    if (failure instanceof ToolExecutionError && failure.statusCode !== undefined) {
      result.statusCode = failure.statusCode;
    }
    return result;
  }
}

function errorTypeOf(failure: EnsembleError): ToolErrorType {
  if (failure instanceof ValidationError) return "validation";
  if (failure instanceof TimeoutError) return "timeout";
  return "execution";
}

function readStatusCode(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
}

export function createTool<TResult>(config: ToolConfig<TResult>): Tool<TResult> {
  return new Tool(config);
}
