import { ResolutionWorkflow, type ResolutionDependencies, type ResolutionOptions, type UnitOutcome } from './ResolutionWorkflow.js';
import { Logger, errorText } from '../utils/logger.js';
import { markStatus, needsResolution, resolveRecord } from '../utils/trackStatus.js';
import { ResolutionStatus, UrlOrigin, type LookupAdapter, type TrackRecord } from '../types/index.js';

/** Per-row pass: one identifier lookup per track. */
export class TrackResolutionWorkflow extends ResolutionWorkflow<number> {
  protected readonly source = 'songstats';
  protected readonly unitName = 'track';

  constructor(
    private readonly lookup: LookupAdapter,
    dependencies: ResolutionDependencies,
    options: ResolutionOptions
  ) {
    super(dependencies, options);
  }

  planUnits(rows: readonly TrackRecord[]): number[] {
    const indexes: number[] = [];
    rows.forEach((row, index) => {
      if (needsResolution(row, this.options.retrySoftTerminal)) indexes.push(index);
    });
    return indexes;
  }

  protected describeUnit(index: number, rows: readonly TrackRecord[]): string {
    const row = rows[index];
    return `${row.artistNames} - ${row.trackName} (ISRC ${row.isrc || 'none'})`;
  }

  protected async resolveUnit(index: number, rows: TrackRecord[]): Promise<UnitOutcome> {
    const row = rows[index];

    if (!row.isrc) {
      markStatus(row, ResolutionStatus.NoLookupKey);
      Logger.info('  ⚠️  No ISRC, skipping lookup');
      return { rows: [index], contacted: false };
    }

    let url: string | null;
    try {
      url = await this.lookup.lookup(row.isrc);
    } catch (error) {
      Logger.warn('  ❌ Lookup failed', {
        track: row.trackUri,
        isrc: row.isrc,
        source: this.source,
        error: errorText(error),
      });
      markStatus(row, ResolutionStatus.Error);
      return { rows: [index], contacted: true };
    }

    if (url) {
      resolveRecord(row, url, UrlOrigin.Songstats);
      Logger.info(`  ✅ ${url}`);
    } else {
      markStatus(row, ResolutionStatus.NoCandidate);
      Logger.info('  ➖ No YouTube link on the page');
    }
    return { rows: [index], contacted: true };
  }
}
