import { performance } from 'perf_hooks';
import { RateLimiterMisuseError } from '../proxy/errors';
import type { ByteLimiter } from '../proxy/types';

export interface RateLimiterOptions {
  /** Ceiling in bytes per second; 0 means unlimited. */
  bytesPerSecond: number;
  /** Largest amount that may go out without waiting. Defaults to one second's worth. */
  burstBytes?: number;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Token bucket shared by every relay that should count against one ceiling.
 *
 * The budget refills continuously at `bytesPerSecond` up to `burstBytes`.
 * A request is debited as soon as it is made, which may take the budget
 * below zero; the caller then waits until the debt is paid back. Because the
 * debit happens synchronously, callers are granted bytes strictly in the
 * order they asked, and over any one-second window at most
 * `bytesPerSecond + burstBytes` bytes are released.
 */
export class RateLimiter implements ByteLimiter {
  readonly bytesPerSecond: number;
  readonly burstBytes: number;
  private budget: number;
  private lastRefill: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RateLimiterOptions) {
    const { bytesPerSecond } = options;
    if (!Number.isInteger(bytesPerSecond) || bytesPerSecond < 0) {
      throw new RateLimiterMisuseError(`bytesPerSecond must be a non-negative integer, got ${bytesPerSecond}`);
    }
    const burstBytes = options.burstBytes ?? bytesPerSecond;
    if (!Number.isFinite(burstBytes) || burstBytes < 0) {
      throw new RateLimiterMisuseError(`burstBytes must be a non-negative number, got ${burstBytes}`);
    }

    this.bytesPerSecond = bytesPerSecond;
    this.burstBytes = burstBytes;
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? defaultSleep;
    this.budget = burstBytes;
    this.lastRefill = this.now();
  }

  get unlimited(): boolean {
    return this.bytesPerSecond === 0;
  }

  /** Bytes that could go out right now without waiting. Negative while in debt. */
  available(): number {
    if (this.unlimited) return Infinity;
    this.refill();
    return this.budget;
  }

  /**
   * Debits `bytes` from the budget and returns how long, in milliseconds, the
   * caller must wait before sending them.
   */
  reserve(bytes: number): number {
    if (!Number.isInteger(bytes) || bytes < 0) {
      throw new RateLimiterMisuseError(`Cannot acquire ${bytes} bytes`);
    }
    if (this.unlimited || bytes === 0) return 0;

    this.refill();
    this.budget -= bytes;
    if (this.budget >= 0) return 0;
    return Math.ceil((-this.budget * 1000) / this.bytesPerSecond);
  }

  /** Resolves once `bytes` may be sent without exceeding the ceiling. */
  async acquire(bytes: number): Promise<void> {
    const delay = this.reserve(bytes);
    if (delay > 0) {
      await this.sleep(delay);
    }
  }

  private refill() {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    this.lastRefill = now;
    if (elapsed <= 0) return;
    this.budget = Math.min(this.burstBytes, this.budget + (elapsed * this.bytesPerSecond) / 1000);
  }
}

