export type Clock = () => number;

/** Wall-clock allowance of one run, checked between units of work. */
export class RunBudget {
  private readonly startedAt: number;
  private readonly maxRuntimeMs: number;

  constructor(
    maxRuntimeMinutes: number,
    private readonly clock: Clock = Date.now
  ) {
    this.startedAt = clock();
    this.maxRuntimeMs = maxRuntimeMinutes * 60 * 1000;
  }

  elapsedMs(): number {
    return this.clock() - this.startedAt;
  }

  expired(): boolean {
    return this.elapsedMs() > this.maxRuntimeMs;
  }

  remainingMinutes(): number {
    return Math.max(0, (this.maxRuntimeMs - this.elapsedMs()) / 60000);
  }

  /** Share of the allowance used, in [0, 1]. */
  progress(): number {
    if (this.maxRuntimeMs <= 0) return 1;
    return Math.min(1, this.elapsedMs() / this.maxRuntimeMs);
  }

  progressBar(length = 20): string {
    const progress = this.progress();
    const filled = Math.floor(length * progress);
    return `|${'█'.repeat(filled)}${'-'.repeat(length - filled)}| ${(progress * 100).toFixed(1)}%`;
  }
}
