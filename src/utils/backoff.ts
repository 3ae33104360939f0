import type { DelayRange } from '../types/index.js';

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface BackoffOptions {
  /** Wait between two units of work. */
  unitDelay: DelayRange;
  /** Wait before a search request. */
  searchDelay?: DelayRange;
  /** Consecutive counted failures that trigger a cooldown. */
  maxConsecutiveFailures?: number;
  cooldownMs?: number;
  /** Successes between two long pauses. */
  longPauseEvery?: number;
  longPause?: DelayRange;
}

/**
 * Every deliberate wait of a pass: jittered delay between units, delay before
 * searches, a cooldown after a run of throttling-shaped failures and a long
 * pause every N successes.
 */
export class BackoffPolicy {
  private consecutiveFailures = 0;
  private successes = 0;

  constructor(
    private readonly options: BackoffOptions,
    private readonly sleeper: Sleeper = sleep,
    private readonly random: () => number = Math.random
  ) {}

  get consecutiveFailureCount(): number {
    return this.consecutiveFailures;
  }

  get successCount(): number {
    return this.successes;
  }

  jitter(range: DelayRange): number {
    return Math.round(range.minMs + this.random() * (range.maxMs - range.minMs));
  }

  /** Sleeps the inter-unit delay. Returns the waited milliseconds. */
  async betweenUnits(): Promise<number> {
    const ms = this.jitter(this.options.unitDelay);
    await this.sleeper(ms);
    return ms;
  }

  async beforeSearch(): Promise<number> {
    if (!this.options.searchDelay) return 0;
    const ms = this.jitter(this.options.searchDelay);
    await this.sleeper(ms);
    return ms;
  }

  /**
   * Counts a success and sleeps the inter-unit delay, plus a long pause when
   * the success count reaches a multiple of `longPauseEvery`. Returns the
   * long pause in milliseconds, 0 when none was taken.
   */
  async afterSuccess(): Promise<number> {
    this.successes++;
    this.consecutiveFailures = 0;
    await this.betweenUnits();

    const every = this.options.longPauseEvery;
    if (every && this.options.longPause && this.successes % every === 0) {
      const ms = this.jitter(this.options.longPause);
      await this.sleeper(ms);
      return ms;
    }
    return 0;
  }

  /**
   * Records a failure. Failures that do not count reset the streak. Returns
   * true once the streak reaches the cooldown threshold.
   */
  recordFailure(counts: boolean): boolean {
    if (!counts) {
      this.consecutiveFailures = 0;
      return false;
    }

    this.consecutiveFailures++;
    const limit = this.options.maxConsecutiveFailures;
    return limit !== undefined && this.consecutiveFailures >= limit;
  }

  async cooldown(): Promise<number> {
    const ms = this.options.cooldownMs ?? 0;
    await this.sleeper(ms);
    this.consecutiveFailures = 0;
    return ms;
  }
}
