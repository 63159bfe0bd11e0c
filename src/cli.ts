#!/usr/bin/env node
import { Command } from "commander";
import path from "node:path";
import process from "node:process";
import chalk from "chalk";
import { z } from "zod";
import { EnsembleError, TimeoutError, errorResult, okResult, toEnsembleError } from "./ensemble/errors.js";
import { createModelFromEnv, createOpenAIModelFromEnv } from "./ensemble/models/index.js";
import type { EmbeddingModel } from "./ensemble/models/types.js";
import { loadPackage, readPackageFile, type PackageDocument } from "./ensemble/package/package.js";
import { createBuiltinToolRegistry } from "./ensemble/tools/builtin/index.js";

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0,           // Run finished
  ERROR: 30,       // Invalid package or fatal error during the run
  CANCELLED: 40    // Cancelled by user (SIGINT/SIGTERM)
} as const;

const runOptionsSchema = z.object({
  stream: z.boolean().default(false),
  json: z.boolean().default(false),
  maxIter: z.coerce.number().int().min(0).optional()
});

const inspectOptionsSchema = z.object({
  json: z.boolean().default(false)
});

const program = new Command();

program.name("ensemble").description("Multi-agent orchestration engine").version("0.1.0");

program
  .command("inspect")
  .description("Validate a package file and print its tools, agents and pool")
  .argument("<file>", "Package JSON file")
  .option("--json", "Print the normalized document", false)
  .action(async (file: string, rawOpts: unknown) => {
    const opts = inspectOptionsSchema.parse(rawOpts);
    try {
      const doc = await readPackageFile(path.resolve(file));
      if (opts.json) {
        process.stdout.write(JSON.stringify(doc, null, 2) + "\n");
      } else {
        outputPackageHuman(doc);
      }
      process.exit(EXIT_CODES.OK);
    } catch (err) {
      reportError(toEnsembleError(err), opts.json);
      process.exit(EXIT_CODES.ERROR);
    }
  });

program
  .command("run")
  .description("Load a package and run its pool on one input")
  .argument("<file>", "Package JSON file")
  .argument("<input>", "User input for the run")
  .option("--stream", "Print output as it is produced", false)
  .option("--json", "Print a JSON result envelope", false)
  .option("--max-iter <n>", "Override the pool's maxIter")
  .action(async (file: string, input: string, rawOpts: unknown) => {
    const opts = runOptionsSchema.parse(rawOpts);

    // Setup abort controller for graceful shutdown
    const abortController = new AbortController();
    let cancelled = false;

    const handleSignal = (signal: string) => {
      if (cancelled) {
        // Force exit on second signal
        process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
        process.exit(EXIT_CODES.CANCELLED);
      }
      cancelled = true;
      process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
      abortController.abort();
    };

    process.on("SIGINT", () => handleSignal("SIGINT"));
    process.on("SIGTERM", () => handleSignal("SIGTERM"));

    try {
      const doc = await readPackageFile(path.resolve(file));
      if (opts.maxIter !== undefined) {
        doc.pool.maxIter = opts.maxIter;
      }

      const model = createModelFromEnv();
      const pool = await loadPackage(doc, {
        tools: createBuiltinToolRegistry(),
        defaultModel: model,
        embeddingModels: embeddingModelsFor(doc)
      });

      process.stderr.write(chalk.blue(`Running ${path.basename(file)}: "${input}"\n`));
      process.stderr.write(chalk.dim(`  Agents: ${pool.agentNames.join(", ") || "(none)"}\n`));
      process.stderr.write(chalk.dim(`  Model: ${model.provider}/${model.model}\n`));
      process.stderr.write(chalk.dim(`  Max iterations: ${pool.maxIter}\n\n`));

      let output: string;
      const runOptions = { signal: abortController.signal };
      if (opts.stream && !opts.json) {
        const chunks = pool.stream(input, runOptions);
        let step = await chunks.next();
        while (!step.done) {
          process.stdout.write(step.value);
          step = await chunks.next();
        }
        output = step.value;
        process.stdout.write("\n");
      } else {
        output = await pool.run(input, runOptions);
      }

      if (opts.json) {
        const history = pool.state.history.filter((m) => m.role !== "system");
        process.stdout.write(JSON.stringify(okResult({ output, history }), null, 2) + "\n");
      } else if (!opts.stream) {
        process.stdout.write(output + "\n");
      }
      process.exit(cancelled ? EXIT_CODES.CANCELLED : EXIT_CODES.OK);
    } catch (err) {
      const failure = toEnsembleError(err);
      reportError(failure, opts.json);
      const aborted = failure instanceof TimeoutError && failure.reason === "aborted";
      process.exit(cancelled || aborted ? EXIT_CODES.CANCELLED : EXIT_CODES.ERROR);
    }
  });

/**
 * Semantic routers need an embedding model; only the OpenAI client provides one.
 */
function embeddingModelsFor(doc: PackageDocument): Record<string, EmbeddingModel> {
  const router = doc.pool.router;
  if (router.type !== "semantic") return {};
  const model = createOpenAIModelFromEnv();
  if (!model) {
    throw new EnsembleError("CONFIG_ERROR", `Semantic router '${router.name}' needs OPENAI_API_KEY for embeddings`);
  }
  return { [router.name]: model };
}

function reportError(err: EnsembleError, json: boolean): void {
  if (json) {
    process.stdout.write(JSON.stringify(errorResult(err), null, 2) + "\n");
    return;
  }
  process.stderr.write(chalk.red(`✗ [${err.code}] ${err.message}\n`));
}

/**
 * Output a package summary in human-readable format.
 */
function outputPackageHuman(doc: PackageDocument): void {
  process.stdout.write(chalk.green(`✓ ${doc.format} v${doc.version}\n`));

  process.stdout.write(chalk.bold(`Tools (${doc.tools.length})\n`));
  for (const tool of doc.tools) {
    const timeout = tool.timeout === null ? "no timeout" : `${tool.timeout}s timeout`;
    process.stdout.write(`  ${tool.name}`);
    process.stdout.write(chalk.dim(` ${timeout}, ${tool.maxRetries} retries, on error: ${tool.onError}\n`));
  }

  process.stdout.write(chalk.bold(`Agents (${doc.agents.length})\n`));
  for (const agent of doc.agents) {
    process.stdout.write(`  ${agent.name}`);
    const tools = agent.tools.length > 0 ? ` tools: ${agent.tools.join(", ")}` : "";
    process.stdout.write(chalk.dim(`${agent.description ? ` - ${agent.description}` : ""}${tools}\n`));
  }

  const { router } = doc.pool;
  process.stdout.write(chalk.bold("Pool\n"));
  process.stdout.write(chalk.dim(`  agents: ${doc.pool.agents.join(", ") || "(none)"}\n`));
  process.stdout.write(chalk.dim(`  router: ${router.type}${"name" in router ? ` (${router.name})` : ""}\n`));
  process.stdout.write(chalk.dim(`  maxIter: ${doc.pool.maxIter}, tracing: ${doc.pool.tracing}\n`));
}

await program.parseAsync(process.argv);
