import { TimeoutError } from "../errors.js";

export type DeadlineOptions = {
  /** null = no bound */
  timeoutMs: number | null;
  /** Caller cancellation */
  signal?: AbortSignal | undefined;
  /** Used in error messages, e.g. "Tool 'search'" */
  label: string;
};

/**
 * Run `task` with a signal that aborts when the deadline passes or the
 * caller's signal fires. The returned promise settles with TimeoutError in
 * both cases, even if the task ignores its signal.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => T | Promise<T>,
  options: DeadlineOptions
): Promise<T> {
  const { timeoutMs, signal, label } = options;
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      settle();
    };

    const onAbort = (): void => {
      controller.abort();
      finish(() => reject(new TimeoutError(`${label} was aborted`, timeoutMs, "aborted")));
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort);

    if (timeoutMs !== null) {
      timer = setTimeout(() => {
        controller.abort();
        finish(() => reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs)));
      }, timeoutMs);
    }

    Promise.resolve()
      .then(() => task(controller.signal))
      .then(
        (value) => finish(() => resolve(value)),
        (err: unknown) => finish(() => reject(err))
      );
  });
}

/**
 * Resolve after `ms`, or reject with TimeoutError("aborted") when `signal` fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TimeoutError("Wait aborted", null, "aborted"));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new TimeoutError("Wait aborted", null, "aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
