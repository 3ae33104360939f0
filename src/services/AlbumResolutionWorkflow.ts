import { ResolutionWorkflow, type ResolutionDependencies, type ResolutionOptions, type UnitOutcome } from './ResolutionWorkflow.js';
import { Logger, errorText } from '../utils/logger.js';
import { TitleMatcher, cleanAlbumNameForSearch } from '../utils/matching.js';
import { markStatus, needsResolution, resolveRecord } from '../utils/trackStatus.js';
import {
  ResolutionStatus,
  UrlOrigin,
  type AlbumGroup,
  type CatalogAdapter,
  type CatalogCandidate,
  type TrackRecord,
} from '../types/index.js';

export interface AlbumResolutionOptions extends ResolutionOptions {
  matchThreshold: number;
}

/** Groups rows by album and album artist, in order of first appearance. */
export function groupByAlbum(rows: readonly TrackRecord[], include: (row: TrackRecord) => boolean): AlbumGroup[] {
  const groups = new Map<string, AlbumGroup>();

  rows.forEach((row, index) => {
    if (!include(row)) return;
    const key = JSON.stringify([row.albumName, row.albumArtistNames]);
    let group = groups.get(key);
    if (!group) {
      group = { albumName: row.albumName, albumArtistNames: row.albumArtistNames, rowIndexes: [] };
      groups.set(key, group);
    }
    group.rowIndexes.push(index);
  });

  return [...groups.values()];
}

/** Per-group pass: one catalog search per album, candidates matched to titles. */
export class AlbumResolutionWorkflow extends ResolutionWorkflow<AlbumGroup> {
  protected readonly source = 'discogs';
  protected readonly unitName = 'album';

  constructor(
    private readonly catalog: CatalogAdapter,
    dependencies: ResolutionDependencies,
    private readonly albumOptions: AlbumResolutionOptions
  ) {
    super(dependencies, albumOptions);
  }

  planUnits(rows: readonly TrackRecord[]): AlbumGroup[] {
    return groupByAlbum(rows, (row) => needsResolution(row, this.options.retrySoftTerminal));
  }

  protected describeUnit(group: AlbumGroup): string {
    return `Album '${group.albumName}' by '${group.albumArtistNames}' (${group.rowIndexes.length} todo tracks)`;
  }

  protected async resolveUnit(group: AlbumGroup, rows: TrackRecord[]): Promise<UnitOutcome> {
    const searchName = cleanAlbumNameForSearch(group.albumName);
    if (searchName !== group.albumName) {
      Logger.info(`  Album name cleaned for search: '${group.albumName}' -> '${searchName}'`);
    }

    let candidates: CatalogCandidate[];
    try {
      candidates = await this.catalog.searchAlbum(group.albumArtistNames, searchName);
    } catch (error) {
      Logger.warn('  ❌ Catalog search failed', {
        album: group.albumName,
        artist: group.albumArtistNames,
        tracks: group.rowIndexes.map((index) => rows[index].trackUri),
        source: this.source,
        error: errorText(error),
      });
      for (const index of group.rowIndexes) markStatus(rows[index], ResolutionStatus.Error);
      return { rows: group.rowIndexes, contacted: true };
    }

    if (candidates.length === 0) {
      Logger.info('  ➖ No videos found, marking tracks no_yt');
      for (const index of group.rowIndexes) markStatus(rows[index], ResolutionStatus.NoCandidate);
      return { rows: group.rowIndexes, contacted: true };
    }

    const titles = group.rowIndexes.map((index) => rows[index].trackName);
    const matches = TitleMatcher.matchCandidatesToTracks(candidates, titles, this.albumOptions.matchThreshold);
    Logger.info(`  Videos returned: ${candidates.length}, matched ${matches.size}/${titles.length} tracks`);

    group.rowIndexes.forEach((rowIndex, position) => {
      const row = rows[rowIndex];
      const candidate = matches.get(position);
      if (candidate) {
        resolveRecord(row, candidate.url, UrlOrigin.Discogs);
        Logger.info(`    ✓ '${row.trackName}' -> ${candidate.url}`);
      } else {
        markStatus(row, ResolutionStatus.NoCandidate);
      }
    });

    return { rows: group.rowIndexes, contacted: true };
  }
}
