import type { RateLimitConfig } from "../core/types.js";

interface Waiter {
  resolve: () => void;
  reject: (reason: unknown) => void;
  signal: AbortSignal | undefined;
  onAbort: () => void;
}

/**
 * Token bucket shared by every request of a client. It starts out unlimited
 * and is configured from the limit the server advertises.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private config: RateLimitConfig;
  private queue: Waiter[] = [];
  private timer: ReturnType<typeof setTimeout> | undefined;

  constructor(config: Partial<RateLimitConfig> = {}) {
    this.config = {
      tokensPerSecond: config.tokensPerSecond ?? Infinity,
      maxTokens: config.maxTokens ?? 0,
    };
    this.tokens = this.config.maxTokens;
    this.lastRefill = Date.now();
  }

  get limit(): number {
    return this.config.tokensPerSecond;
  }

  get burst(): number {
    return this.config.maxTokens;
  }

  isUnlimited(): boolean {
    return this.config.tokensPerSecond === Infinity;
  }

  /**
   * Applies a server-advertised limit (requests per second): 2/3 of it
   * becomes the sustained rate and 1/3 the burst. A missing or non-positive
   * limit disables limiting.
   */
  configureFromLimit(limit: number | undefined): void {
    if (limit === undefined || !(limit > 0)) {
      this.configure(Infinity, 0);
      return;
    }
    this.configure(limit * 0.66, Math.max(1, Math.floor(limit * 0.33)));
  }

  configure(tokensPerSecond: number, maxTokens: number): void {
    clearTimeout(this.timer);
    this.timer = undefined;
    this.config = { ...this.config, tokensPerSecond, maxTokens };
    this.tokens = maxTokens;
    this.lastRefill = Date.now();
    this.drain();
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    if (this.isUnlimited()) {
      return;
    }

    this.refill();
    if (this.queue.length === 0 && this.tokens >= 1) {
      this.tokens--;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        signal,
        onAbort: () => {
          this.queue = this.queue.filter((w) => w !== waiter);
          reject(signal?.reason);
        },
      };
      signal?.addEventListener("abort", waiter.onAbort, { once: true });
      this.queue.push(waiter);
      this.schedule();
    });
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = Math.max(0, (now - this.lastRefill) / 1000);
    const tokensToAdd = elapsed * this.config.tokensPerSecond;

    if (tokensToAdd > 0) {
      this.tokens = Math.min(this.config.maxTokens, this.tokens + tokensToAdd);
      this.lastRefill = now;
    }
  }

  private drain(): void {
    if (this.isUnlimited()) {
      this.release(this.queue.length);
      return;
    }

    this.refill();
    let granted = 0;
    while (granted < this.queue.length && this.tokens >= 1) {
      this.tokens--;
      granted++;
    }
    this.release(granted);
    this.schedule();
  }

  private release(count: number): void {
    const released = this.queue.splice(0, count);
    for (const waiter of released) {
      waiter.signal?.removeEventListener("abort", waiter.onAbort);
      waiter.resolve();
    }
  }

  private schedule(): void {
    if (this.timer !== undefined || this.queue.length === 0 || this.isUnlimited()) {
      return;
    }

    const deficit = Math.max(0, 1 - this.tokens);
    const waitMs = (deficit / this.config.tokensPerSecond) * 1000;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.drain();
    }, waitMs);
  }
}
