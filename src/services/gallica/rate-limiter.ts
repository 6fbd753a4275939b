/**
 * Request Rate Limiter for the Gallica API
 *
 * One instance gates every outbound request (search, snippets, text downloads).
 * Enforces a minimum interval between request starts and a cap on requests
 * in flight. Waiters are released strictly in arrival order.
 *
 * Queueing never throws; an aborted waiter leaves the queue and rejects with
 * TimeoutError so its place is not held by a dead request.
 */

import { TimeoutError } from './errors.js';

/**
 * Time source. Injected so tests can drive the limiter deterministically.
 */
export interface Clock {
  now(): number;
  /** Run callback after ms; returns a cancel function */
  schedule(callback: () => void, ms: number): () => void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  schedule: (callback, ms) => {
    const timer = setTimeout(callback, ms);
    return () => clearTimeout(timer);
  },
};

export interface RateLimiterConfig {
  /** Minimum delay between two request starts (default: 1000) */
  minIntervalMs: number;
  /** Maximum requests in flight (default: 1) */
  maxConcurrent: number;
  clock: Clock;
}

export interface RateLimiterStatus {
  inFlight: number;
  queued: number;
  /** Milliseconds until the interval allows the next start */
  nextSlotInMs: number;
}

interface Waiter {
  grant: () => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

const DEFAULT_CONFIG: RateLimiterConfig = {
  minIntervalMs: 1000,
  maxConcurrent: 1,
  clock: systemClock,
};

export class RequestRateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly queue: Waiter[] = [];
  private inFlight = 0;
  private lastStartAt: number | null = null;
  private cancelTimer: (() => void) | null = null;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be >= 1, got ${this.config.maxConcurrent}`);
    }
    if (this.config.minIntervalMs < 0) {
      throw new RangeError(`minIntervalMs must be >= 0, got ${this.config.minIntervalMs}`);
    }
  }

  /**
   * Wait for a request slot. Every successful acquire() must be paired with release().
   *
   * @param signal - aborting it removes the caller from the queue
   * @throws TimeoutError when the signal aborts before a slot is granted
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortedWhileQueued(signal));
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, signal };

      if (signal) {
        waiter.onAbort = () => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) {
            this.queue.splice(index, 1);
            reject(abortedWhileQueued(signal));
          }
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.queue.push(waiter);
      this.pump();
    });
  }

  /**
   * Give back a slot obtained from acquire()
   */
  release(): void {
    if (this.inFlight === 0) {
      console.error('[RateLimiter] release() called without a matching acquire()');
      return;
    }
    this.inFlight--;
    this.pump();
  }

  /**
   * Run fn inside a slot; the slot is released however fn settles.
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStatus(): RateLimiterStatus {
    return {
      inFlight: this.inFlight,
      queued: this.queue.length,
      nextSlotInMs: this.waitTime(),
    };
  }

  private waitTime(): number {
    if (this.lastStartAt === null) return 0;
    return Math.max(0, this.lastStartAt + this.config.minIntervalMs - this.config.clock.now());
  }

  /**
   * Grant slots to queued waiters while capacity and the interval allow.
   * At most one timer is pending at a time.
   */
  private pump(): void {
    while (this.queue.length > 0 && this.inFlight < this.config.maxConcurrent) {
      if (this.cancelTimer) return;

      const wait = this.waitTime();
      if (wait > 0) {
        this.cancelTimer = this.config.clock.schedule(() => {
          this.cancelTimer = null;
          this.pump();
        }, wait);
        return;
      }

      const waiter = this.queue.shift();
      if (!waiter) return;
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort);
      }
      this.inFlight++;
      this.lastStartAt = this.config.clock.now();
      waiter.grant();
    }
  }
}

function abortedWhileQueued(signal: AbortSignal): TimeoutError {
  const reason: unknown = signal.reason;
  if (reason instanceof TimeoutError) return reason;
  return new TimeoutError('Request aborted while waiting for a rate limiter slot', 0);
}
