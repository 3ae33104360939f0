import { LedgerStore } from './LedgerStore.js';
import { Logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { BackoffPolicy } from '../utils/backoff.js';
import { RunBudget, type Clock } from '../utils/runBudget.js';
import type { Ledger, ResolutionStatus, TrackRecord } from '../types/index.js';

export type StopReason = 'completed' | 'deadline' | 'interrupted' | 'nothing_to_do';

export interface ResolutionOptions {
  maxRuntimeMinutes: number;
  /** Units between two named checkpoint messages. */
  saveEvery: number;
  /** Re-query rows previously marked `no_yt`. */
  retrySoftTerminal: boolean;
}

export interface ResolutionDependencies {
  store: LedgerStore;
  backoff: BackoffPolicy;
  clock?: Clock;
}

export interface ResolutionRunStats {
  source: string;
  unitsTotal: number;
  unitsProcessed: number;
  tracksUpdated: number;
  /** Statuses of the whole ledger after the run. */
  statusCounts: Record<ResolutionStatus, number>;
  /** Statuses written by this run only. */
  runOutcomes: Record<ResolutionStatus, number>;
  stopReason: StopReason;
  elapsedMs: number;
}

export interface UnitOutcome {
  /** Indexes of the rows whose status or URL was written. */
  rows: number[];
  /** Whether the unit reached the external source; units that did not skip the delay. */
  contacted: boolean;
}

function emptyCounts(): Record<ResolutionStatus, number> {
  return { '': 0, done: 0, no_yt: 0, no_isrc: 0, error: 0 };
}

export function countStatuses(rows: readonly TrackRecord[]): Record<ResolutionStatus, number> {
  const counts = emptyCounts();
  for (const row of rows) counts[row.status]++;
  return counts;
}

/**
 * Resumable pass over a ledger. Subclasses choose the unit of work (a row or
 * a group of rows) and how one unit is resolved; this class owns the budget,
 * interrupts, checkpoints and pacing.
 */
export abstract class ResolutionWorkflow<Unit> {
  protected abstract readonly source: string;
  protected abstract readonly unitName: string;

  private stopRequested = false;
  protected readonly store: LedgerStore;
  protected readonly backoff: BackoffPolicy;
  private readonly clock: Clock;

  constructor(
    dependencies: ResolutionDependencies,
    protected readonly options: ResolutionOptions
  ) {
    this.store = dependencies.store;
    this.backoff = dependencies.backoff;
    this.clock = dependencies.clock ?? Date.now;
  }

  /** Units to process, in ledger order. */
  abstract planUnits(rows: readonly TrackRecord[]): Unit[];

  protected abstract describeUnit(unit: Unit, rows: readonly TrackRecord[]): string;

  protected abstract resolveUnit(unit: Unit, rows: TrackRecord[]): Promise<UnitOutcome>;

  /** Stops the pass before the next unit. */
  requestStop(): void {
    this.stopRequested = true;
  }

  async run(ledger: Ledger, outputPath: string): Promise<ResolutionRunStats> {
    this.stopRequested = false;
    const budget = new RunBudget(this.options.maxRuntimeMinutes, this.clock);
    const units = this.planUnits(ledger.rows);
    const stats: ResolutionRunStats = {
      source: this.source,
      unitsTotal: units.length,
      unitsProcessed: 0,
      tracksUpdated: 0,
      statusCounts: countStatuses(ledger.rows),
      runOutcomes: emptyCounts(),
      stopReason: 'completed',
      elapsedMs: 0,
    };

    Logger.info(`🔎 ${this.source}: ${ledger.rows.length} rows, ${units.length} ${this.unitName}s to process`);

    if (units.length === 0) {
      Logger.info(`Nothing to do for ${this.source}`);
      stats.stopReason = 'nothing_to_do';
      await this.store.save(ledger, outputPath);
      return stats;
    }

    const unregister = ErrorHandler.onShutdown(() => this.requestStop());

    try {
      for (let index = 0; index < units.length; index++) {
        if (this.stopRequested) {
          stats.stopReason = 'interrupted';
          Logger.info('🛑 Stop requested, finishing run');
          break;
        }
        if (budget.expired()) {
          stats.stopReason = 'deadline';
          Logger.info(`⏰ Maximum runtime of ${this.options.maxRuntimeMinutes} minutes reached, stopping`);
          break;
        }

        const unit = units[index];
        Logger.info(`[${index + 1}/${units.length}] ${this.describeUnit(unit, ledger.rows)}`);

        const outcome = await this.resolveUnit(unit, ledger.rows);
        stats.unitsProcessed++;
        stats.tracksUpdated += outcome.rows.length;
        for (const rowIndex of outcome.rows) stats.runOutcomes[ledger.rows[rowIndex].status]++;

        await this.store.save(ledger, outputPath);
        if (stats.unitsProcessed % this.options.saveEvery === 0) {
          Logger.info(`💾 Checkpoint: ${stats.unitsProcessed} ${this.unitName}s processed, saved to ${outputPath}`);
        }
        Logger.info(`Time Progress: ${budget.progressBar()}`);

        const isLast = index === units.length - 1;
        if (outcome.contacted && !isLast && !this.stopRequested) {
          await this.backoff.betweenUnits();
        }
      }
    } finally {
      unregister();
      await this.store.save(ledger, outputPath);
    }

    stats.statusCounts = countStatuses(ledger.rows);
    stats.elapsedMs = budget.elapsedMs();

    Logger.info(`📊 ${this.source} run finished`, {
      stopReason: stats.stopReason,
      processed: `${stats.unitsProcessed}/${stats.unitsTotal}`,
      tracksUpdated: stats.tracksUpdated,
      elapsedMinutes: (stats.elapsedMs / 60000).toFixed(2),
      output: outputPath,
    });

    return stats;
  }
}
