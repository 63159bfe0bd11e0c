/**
 * Error thrown when queue wait times out.
 */
export class CapacityExceededError extends Error {
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number) {
    super(message);
    this.name = "CapacityExceededError";
    this.retryAfterMs = retryAfterMs;
  }
}

export type ConcurrencyLimiterOptions = {
  maxConcurrent: number;
  /** Timeout for waiting in queue (ms). 0 = no timeout */
  queueTimeoutMs?: number;
};

/**
 * Queues tasks and runs at most `maxConcurrent` at once.
 * With `maxConcurrent: 1` it is the critical section that serializes pool runs.
 */
export class ConcurrencyLimiter {
  private readonly maxConcurrent: number;
  private readonly queueTimeoutMs: number;
  private currentCount = 0;
  private readonly queue: Array<{
    resolve: () => void;
    reject: (err: Error) => void;
    timeoutId?: ReturnType<typeof setTimeout>;
  }> = [];

  constructor(options: number | ConcurrencyLimiterOptions) {
    if (typeof options === "number") {
      this.maxConcurrent = options;
      this.queueTimeoutMs = 0;
    } else {
      this.maxConcurrent = options.maxConcurrent;
      this.queueTimeoutMs = options.queueTimeoutMs ?? 0;
    }
    if (this.maxConcurrent < 1) {
      throw new Error("maxConcurrent must be at least 1");
    }
  }

  /**
   * The number of tasks currently holding a slot.
   */
  get running(): number {
    return this.currentCount;
  }

  /**
   * The number of tasks waiting in the queue.
   */
  get queued(): number {
    return this.queue.length;
  }

  /**
   * Run a task with concurrency limiting.
   * @throws CapacityExceededError if queue wait times out
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  /**
   * Take a slot, waiting in the queue if needed. The returned function
   * releases it; calling it more than once has no effect.
   */
  async acquire(): Promise<() => void> {
    // The slot is handed over directly by release(), so a waiter does not
    // increment the count itself.
    if (this.currentCount >= this.maxConcurrent) {
      await this.waitForSlot();
    } else {
      this.currentCount++;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        if (next.timeoutId) {
          clearTimeout(next.timeoutId);
        }
        next.resolve();
      } else {
        this.currentCount--;
      }
    };
  }

  private waitForSlot(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const entry: typeof this.queue[number] = { resolve, reject };

      if (this.queueTimeoutMs > 0) {
        entry.timeoutId = setTimeout(() => {
          const idx = this.queue.indexOf(entry);
          if (idx !== -1) {
            this.queue.splice(idx, 1);
          }
          reject(
            new CapacityExceededError(
              `Queue wait exceeded ${this.queueTimeoutMs}ms timeout`,
              this.queueTimeoutMs
            )
          );
        }, this.queueTimeoutMs);
      }

      this.queue.push(entry);
    });
  }
}
