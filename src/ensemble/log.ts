export type LogLevel = "silent" | "warn" | "trace";

function currentLevel(): LogLevel {
  const raw = process.env.ENSEMBLE_LOG_LEVEL;
  if (raw === "silent" || raw === "warn" || raw === "trace") return raw;
  return "warn";
}

export function logWarning(message: string): void {
  if (currentLevel() === "silent") return;
  process.stderr.write(`[ensemble] warn: ${message}\n`);
}

/**
 * Trace lines are written for agents with tracing on, unless logging is silenced.
 */
export function logTrace(message: string): void {
  if (currentLevel() === "silent") return;
  process.stderr.write(`[ensemble] trace: ${message}\n`);
}
