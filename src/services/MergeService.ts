import { isResolved } from '../utils/trackStatus.js';
import { ResolutionStatus, UrlOrigin, type FallbackOrigin, type Ledger, type TrackRecord } from '../types/index.js';

export interface MergeOptions {
  fallbackOrigin?: FallbackOrigin;
}

export interface MergeSummary {
  total: number;
  /** Rows already resolved in the primary ledger. */
  native: number;
  /** Rows that took the secondary ledger's URL. */
  adopted: number;
  unresolved: number;
}

export interface MergeResult {
  ledger: Ledger;
  summary: MergeSummary;
}

export interface VerificationReport {
  primaryTotal: number;
  secondaryTotal: number;
  mergedTotal: number;
  /** Primary track URIs absent from the merged ledger. */
  missingFromMerged: string[];
  primaryUrls: number;
  primaryUrlsPreserved: number;
  fallbacksAvailable: number;
  fallbacksAdded: number;
  rowsWithoutUrl: number;
  /** Merged rows without a URL although the secondary ledger had one. */
  unusedSecondaryUrls: number;
  /** Percentage of merged rows with a URL. */
  coverage: number;
  missingByStatus: Record<string, number>;
  topMissingArtists: Array<{ artist: string; count: number }>;
  ok: boolean;
}

export interface LedgerStatistics {
  total: number;
  withUrl: number;
  coverage: number;
  byStatus: Record<string, number>;
  byOrigin: Record<string, number>;
  downloaded: number;
  byDownloadStatus: Record<string, number>;
}

function indexByUri(rows: readonly TrackRecord[]): Map<string, TrackRecord> {
  const index = new Map<string, TrackRecord>();
  for (const row of rows) {
    const key = row.trackUri.trim();
    if (key) index.set(key, row);
  }
  return index;
}

function percentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Source-priority merge of two ledgers over the same rows. The primary
 * ledger wins; the secondary only fills rows the primary left unresolved.
 */
export class MergeService {
  merge(primary: Ledger, secondary: Ledger, options: MergeOptions = {}): MergeResult {
    const fallbackOrigin = options.fallbackOrigin ?? UrlOrigin.SecondaryFallback;
    const secondaryByUri = indexByUri(secondary.rows);
    const summary: MergeSummary = { total: 0, native: 0, adopted: 0, unresolved: 0 };

    const rows = primary.rows.map((source) => {
      const row: TrackRecord = { ...source, extra: { ...source.extra } };
      summary.total++;

      if (isResolved(row)) {
        summary.native++;
        return row;
      }

      const fallback = secondaryByUri.get(row.trackUri.trim());
      if (fallback && isResolved(fallback)) {
        row.ytUrl = fallback.ytUrl;
        row.status = ResolutionStatus.Done;
        row.ytUrlOrigin = fallbackOrigin;
        summary.adopted++;
      } else {
        summary.unresolved++;
      }
      return row;
    });

    return { ledger: { columns: [...primary.columns], rows }, summary };
  }

  verify(primary: Ledger, secondary: Ledger, merged: Ledger, topN = 10): VerificationReport {
    const secondaryByUri = indexByUri(secondary.rows);
    const mergedByUri = indexByUri(merged.rows);

    const missingFromMerged: string[] = [];
    let primaryUrls = 0;
    let primaryUrlsPreserved = 0;
    let fallbacksAvailable = 0;
    let fallbacksAdded = 0;

    for (const row of primary.rows) {
      const key = row.trackUri.trim();
      if (!key) continue;

      const mergedRow = mergedByUri.get(key);
      if (!mergedRow) missingFromMerged.push(key);

      if (isResolved(row)) {
        primaryUrls++;
        if (mergedRow && mergedRow.ytUrl.trim() === row.ytUrl.trim()) primaryUrlsPreserved++;
        continue;
      }

      const fallback = secondaryByUri.get(key);
      if (fallback && isResolved(fallback)) {
        fallbacksAvailable++;
        if (mergedRow && mergedRow.ytUrl.trim() === fallback.ytUrl.trim()) fallbacksAdded++;
      }
    }

    let rowsWithoutUrl = 0;
    let unusedSecondaryUrls = 0;
    const missingByStatus: Record<string, number> = {};
    const missingArtists: Record<string, number> = {};

    for (const row of merged.rows) {
      if (isResolved(row)) continue;
      rowsWithoutUrl++;
      increment(missingByStatus, row.status || 'pending');
      increment(missingArtists, row.artistNames.slice(0, 50) || 'Unknown');

      const fallback = secondaryByUri.get(row.trackUri.trim());
      if (fallback && isResolved(fallback)) unusedSecondaryUrls++;
    }

    const topMissingArtists = Object.entries(missingArtists)
      .map(([artist, count]) => ({ artist, count }))
      .sort((a, b) => b.count - a.count || a.artist.localeCompare(b.artist))
      .slice(0, topN);

    return {
      primaryTotal: primary.rows.length,
      secondaryTotal: secondary.rows.length,
      mergedTotal: merged.rows.length,
      missingFromMerged,
      primaryUrls,
      primaryUrlsPreserved,
      fallbacksAvailable,
      fallbacksAdded,
      rowsWithoutUrl,
      unusedSecondaryUrls,
      coverage: percentage(merged.rows.length - rowsWithoutUrl, merged.rows.length),
      missingByStatus,
      topMissingArtists,
      ok:
        missingFromMerged.length === 0 &&
        primaryUrlsPreserved === primaryUrls &&
        fallbacksAdded === fallbacksAvailable &&
        unusedSecondaryUrls === 0,
    };
  }

  summarize(ledger: Ledger): LedgerStatistics {
    const byStatus: Record<string, number> = {};
    const byOrigin: Record<string, number> = {};
    const byDownloadStatus: Record<string, number> = {};
    let withUrl = 0;
    let downloaded = 0;

    for (const row of ledger.rows) {
      increment(byStatus, row.status || 'pending');
      if (row.ytUrl.trim()) {
        withUrl++;
        increment(byOrigin, row.ytUrlOrigin || 'unknown');
      }
      if (row.downloaded === 'yes') downloaded++;
      if (row.downloadStatus) increment(byDownloadStatus, row.downloadStatus);
    }

    return {
      total: ledger.rows.length,
      withUrl,
      coverage: percentage(withUrl, ledger.rows.length),
      byStatus,
      byOrigin,
      downloaded,
      byDownloadStatus,
    };
  }
}
