/**
 * Retry policy with rate-limit aware backoff
 *
 * - A cancelled call is never retried
 * - 429 responses are always retried, waiting at least until X-RateLimit-Reset
 * - Transport errors and 5xx responses are retried only when server-error
 *   retries are enabled, with a linear jitter backoff
 */

import { parseRateLimitReset } from "../core/header-parser.js";
import type { RawResponse, RetryConfig, RetryLogHook } from "../core/types.js";
import { HEADER_RATE_RESET } from "../core/types.js";

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  retryMax: 30,
  retryWaitMin: 100,
  retryWaitMax: 400,
  serverErrorWaitMin: 700,
  serverErrorWaitMax: 900,
};

export type AttemptOutcome = { response: RawResponse } | { error: unknown };

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryStrategyOptions {
  retryServerErrors?: boolean;
  retryLogHook?: RetryLogHook;
  /** Called when X-RateLimit-Reset is present but not a number. */
  onInvalidResetHeader?: (raw: string) => void;
  sleep?: SleepFunction;
  random?: () => number;
}

export type RetryObserver = (
  attemptNum: number,
  waitMs: number,
  response: RawResponse | undefined
) => void;

export interface RetryResult {
  response: RawResponse;
  attempts: number;
}

/**
 * Sleeps for ms milliseconds, rejecting with the signal's reason if it is
 * aborted first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Backoff for 429 responses: the reset hint (when longer than min) plus
 * jitter bounded by max - min.
 */
export function rateLimitBackoff(
  min: number,
  max: number,
  response: RawResponse | undefined,
  random: () => number = Math.random,
  onInvalidResetHeader?: (raw: string) => void
): number {
  const jitter = random() * (max - min);

  let floor = min;
  if (response) {
    const reset = parseRateLimitReset(response.headers.get(HEADER_RATE_RESET));
    if (reset.kind === "invalid") {
      onInvalidResetHeader?.(reset.raw);
    } else if (reset.kind === "value" && reset.value > 0 && reset.value * 1000 > floor) {
      floor = reset.value * 1000;
    }
  }

  return floor + jitter;
}

/**
 * Linear backoff with jitter: a random wait between min and max, multiplied
 * by the (1-based) attempt number.
 */
export function linearJitterBackoff(
  min: number,
  max: number,
  attemptNum: number,
  random: () => number = Math.random
): number {
  const multiplier = attemptNum + 1;
  if (max <= min) {
    return min * multiplier;
  }
  return (min + random() * (max - min)) * multiplier;
}

export class RetryStrategy {
  private config: RetryConfig;
  private retryServerErrors: boolean;
  private options: RetryStrategyOptions;
  private sleepFn: SleepFunction;
  private random: () => number;

  constructor(config: Partial<RetryConfig> = {}, options: RetryStrategyOptions = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.retryServerErrors = options.retryServerErrors ?? false;
    this.options = options;
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  get retryMax(): number {
    return this.config.retryMax;
  }

  setRetryServerErrors(retry: boolean): void {
    this.retryServerErrors = retry;
  }

  /**
   * Decides whether an attempt should be retried. Throws the abort reason
   * when the signal has fired, whatever the outcome was.
   */
  shouldRetry(outcome: AttemptOutcome, signal?: AbortSignal): boolean {
    signal?.throwIfAborted();

    if ("error" in outcome) {
      return this.retryServerErrors;
    }

    const status = outcome.response.status;
    return status === 429 || (this.retryServerErrors && status >= 500);
  }

  /**
   * Computes the wait before the next attempt. The retry log hook runs first.
   */
  backoff(attemptNum: number, response: RawResponse | undefined): number {
    this.options.retryLogHook?.(attemptNum, response);

    if (response?.status === 429) {
      return rateLimitBackoff(
        this.config.retryWaitMin,
        this.config.retryWaitMax,
        response,
        this.random,
        this.options.onInvalidResetHeader
      );
    }

    return linearJitterBackoff(
      this.config.serverErrorWaitMin,
      this.config.serverErrorWaitMax,
      attemptNum,
      this.random
    );
  }

  async execute(
    send: (attempt: number) => Promise<RawResponse>,
    signal?: AbortSignal,
    onRetry?: RetryObserver
  ): Promise<RetryResult> {
    for (let attempt = 0; ; attempt++) {
      let outcome: AttemptOutcome;
      try {
        outcome = { response: await send(attempt) };
      } catch (error) {
        outcome = { error };
      }

      const retry = this.shouldRetry(outcome, signal);
      if (!retry || attempt >= this.config.retryMax) {
        if ("error" in outcome) {
          throw outcome.error;
        }
        return { response: outcome.response, attempts: attempt + 1 };
      }

      const response = "response" in outcome ? outcome.response : undefined;
      const wait = this.backoff(attempt, response);
      onRetry?.(attempt, wait, response);
      await this.sleepFn(wait, signal);
    }
  }
}
