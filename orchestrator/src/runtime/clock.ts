/**
 * Time source for the engines, worker and scheduler. `sleep` resolves early,
 * without throwing, once `signal` aborts.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted || ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timeoutId);
        resolve();
      };
      const timeoutId = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

/**
 * Test clock. Every `sleep` moves time forward by the requested amount and
 * yields one macrotask, so long timeouts elapse instantly while concurrent
 * sessions still interleave.
 */
export class ManualClock implements Clock {
  private currentMs: number;

  constructor(epochMs = 0) {
    this.currentMs = epochMs;
  }

  now(): number {
    return this.currentMs;
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return;
    }
    if (ms > 0) {
      this.currentMs += ms;
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export const systemClock: Clock = new SystemClock();
