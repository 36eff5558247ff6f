/**
 * Simple FIFO throttler to space out provider calls.
 * Ensures deterministic ordering and a minimum interval between task starts.
 * A task that outlives `timeoutMs` rejects with TimeoutError and releases the queue.
 */

export interface ThrottlerOptions {
  minIntervalMs?: number;
  timeoutMs?: number;
}

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class RequestThrottler {
  private lastStart = 0;
  private chain: Promise<unknown> = Promise.resolve();
  private readonly minIntervalMs: number;
  private readonly timeoutMs: number | null;

  constructor(options: ThrottlerOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.timeoutMs = options.timeoutMs ?? null;
  }

  async schedule<T>(fn: () => Promise<T>, label: string = 'task'): Promise<T> {
    const run = this.chain.then(async () => {
      const now = Date.now();
      const waitMs = Math.max(0, this.minIntervalMs - (now - this.lastStart));
      if (waitMs > 0) {
        await sleep(waitMs);
      }
      this.lastStart = Date.now();
      return this.timeoutMs === null ? fn() : withTimeout(fn(), this.timeoutMs, label);
    });
    // Keep chain alive but swallow errors so subsequent tasks still run
    this.chain = run.catch(() => undefined);
    return run;
  }
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
