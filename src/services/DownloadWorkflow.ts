import { mkdir, access } from 'fs/promises';
import { dirname } from 'path';
import dayjs from 'dayjs';
import { LedgerStore } from './LedgerStore.js';
import { extractTagMetadata } from './TaggingService.js';
import type { StopReason } from './ResolutionWorkflow.js';
import { Logger, errorText } from '../utils/logger.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { BackoffPolicy } from '../utils/backoff.js';
import { RunBudget, type Clock } from '../utils/runBudget.js';
import { TitleMatcher } from '../utils/matching.js';
import { hasUrl, replaceUrl } from '../utils/trackStatus.js';
import { durationMatches, formatDuration, formatSeconds, type DurationTolerance } from '../utils/duration.js';
import { buildSearchQuery, expectedFilePath, outputTemplate, primaryArtist } from '../utils/trackFiles.js';
import {
  COOKIE_DEPENDENT_FAILURES,
  DownloadFailure,
  PERMANENT_FAILURES,
  classifyDownloadError,
  countsTowardsCooldown,
  isSearchable,
  type DownloadStatus,
} from '../utils/downloadErrors.js';
import { RetrievalError } from '../types/errors.js';
import {
  UrlOrigin,
  type CredentialSession,
  type DurationReader,
  type Ledger,
  type MediaInfo,
  type RetrievalAdapter,
  type TagWriter,
  type TrackRecord,
} from '../types/index.js';

export type DownloadStopReason = StopReason | 'download_limit';

export interface MediaFiles {
  exists(path: string): Promise<boolean>;
  ensureDir(path: string): Promise<void>;
}

export const nodeMediaFiles: MediaFiles = {
  exists: async (path) => {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  },
  ensureDir: async (path) => {
    await mkdir(path, { recursive: true });
  },
};

export interface DownloadDependencies {
  store: LedgerStore;
  retrieval: RetrievalAdapter;
  /** Null when tag embedding is disabled. */
  tagger: TagWriter | null;
  durations: DurationReader;
  backoff: BackoffPolicy;
  /** Refreshed after each cooldown. */
  session?: CredentialSession;
  files?: MediaFiles;
  clock?: Clock;
}

export interface DownloadOptions {
  downloadDir: string;
  audioFormat: string;
  maxRuntimeMinutes: number;
  saveEvery: number;
  maxDownloads?: number;
  tolerance: DurationTolerance;
  searchResults: number;
  /** Whether the cookie session can reach sign-in gated media. */
  authenticated: boolean;
}

export interface DownloadRunStats {
  total: number;
  processed: number;
  downloaded: number;
  failed: number;
  searched: number;
  stopReason: DownloadStopReason;
  elapsedMs: number;
}

interface AttemptResult {
  success: boolean;
  status: DownloadStatus;
  /** Seconds; 0 when unknown. */
  duration: number;
  /** URL picked by a search, `''` when none. */
  foundUrl: string;
}

/**
 * Search result to download: the one closest to the expected duration, ties
 * going to the title most similar to the track name. Without an expected
 * duration the first result wins.
 */
export function pickBestCandidate(
  results: readonly MediaInfo[],
  expectedMs: number,
  trackName: string
): MediaInfo | null {
  if (results.length === 0) return null;
  if (!(expectedMs > 0)) return results[0];

  const expectedSeconds = expectedMs / 1000;
  let best: MediaInfo | null = null;
  let bestDiff = Number.POSITIVE_INFINITY;
  let bestSimilarity = -1;

  for (const result of results) {
    const diff = Math.abs(result.duration - expectedSeconds);
    const similarity = TitleMatcher.similarity(trackName, result.title);
    if (diff < bestDiff || (diff === bestDiff && similarity > bestSimilarity)) {
      best = result;
      bestDiff = diff;
      bestSimilarity = similarity;
    }
  }
  return best;
}

/**
 * Retrieval pass over a merged ledger: downloads audio for every row that
 * still needs it, falling back to a title search when a stored URL fails,
 * and records the outcome of each row in the ledger.
 */
export class DownloadWorkflow {
  private stopRequested = false;
  private readonly files: MediaFiles;
  private readonly clock: Clock;

  constructor(
    private readonly deps: DownloadDependencies,
    private readonly options: DownloadOptions
  ) {
    this.files = deps.files ?? nodeMediaFiles;
    this.clock = deps.clock ?? Date.now;
  }

  requestStop(): void {
    this.stopRequested = true;
  }

  /** Rows to process: URL rows first, then search rows, ledger order in each. */
  selectRows(rows: readonly TrackRecord[]): number[] {
    const skipped: readonly string[] = this.options.authenticated
      ? PERMANENT_FAILURES
      : [...PERMANENT_FAILURES, ...COOKIE_DEPENDENT_FAILURES];

    const withUrl: number[] = [];
    const withoutUrl: number[] = [];

    rows.forEach((row, index) => {
      if (row.downloaded === 'yes') return;
      if (skipped.includes(row.downloadStatus)) return;

      if (hasUrl(row)) withUrl.push(index);
      else if (row.trackName.trim() !== '') withoutUrl.push(index);
    });

    Logger.info(`Tracks to process: ${withUrl.length + withoutUrl.length}`, {
      directDownload: withUrl.length,
      search: withoutUrl.length,
    });
    return [...withUrl, ...withoutUrl];
  }

  async run(ledger: Ledger, outputPath: string): Promise<DownloadRunStats> {
    this.stopRequested = false;
    const budget = new RunBudget(this.options.maxRuntimeMinutes, this.clock);
    const todo = this.selectRows(ledger.rows);
    const stats: DownloadRunStats = {
      total: todo.length,
      processed: 0,
      downloaded: 0,
      failed: 0,
      searched: 0,
      stopReason: 'completed',
      elapsedMs: 0,
    };

    if (todo.length === 0) {
      Logger.info('Nothing to download, every track is already processed');
      stats.stopReason = 'nothing_to_do';
      return stats;
    }

    const unregister = ErrorHandler.onShutdown(() => this.requestStop());

    try {
      for (let position = 0; position < todo.length; position++) {
        if (this.stopRequested) {
          stats.stopReason = 'interrupted';
          Logger.info('🛑 Stop requested, finishing run');
          break;
        }
        if (budget.expired()) {
          stats.stopReason = 'deadline';
          Logger.info(`⏰ Maximum runtime of ${this.options.maxRuntimeMinutes} minutes reached, re-run to continue`);
          break;
        }
        if (this.options.maxDownloads !== undefined && stats.processed >= this.options.maxDownloads) {
          stats.stopReason = 'download_limit';
          Logger.info(`Download limit of ${this.options.maxDownloads} reached`);
          break;
        }

        const record = ledger.rows[todo[position]];
        Logger.info(`[${position + 1}/${todo.length}] ${primaryArtist(record.artistNames)} - ${record.trackName}`, {
          album: record.albumName,
          duration: formatDuration(record.durationMs),
        });

        await this.processRow(record, ledger, outputPath, stats);
        stats.processed++;

        await this.deps.store.save(ledger, outputPath);
        if (stats.processed % this.options.saveEvery === 0) {
          Logger.info(`💾 Checkpoint: ${stats.processed} tracks processed, saved to ${outputPath}`);
        }
        Logger.info(
          `Time: ${budget.progressBar(30)} (${budget.remainingMinutes().toFixed(0)} min remaining)`
        );
      }
    } finally {
      unregister();
      await this.deps.store.save(ledger, outputPath);
    }

    stats.elapsedMs = budget.elapsedMs();
    Logger.info('📊 Download run finished', {
      stopReason: stats.stopReason,
      processed: stats.processed,
      downloaded: stats.downloaded,
      failed: stats.failed,
      searched: stats.searched,
      elapsedMinutes: (stats.elapsedMs / 60000).toFixed(2),
    });
    return stats;
  }

  private now(): string {
    return dayjs(this.clock()).format('YYYY-MM-DD HH:mm:ss');
  }

  private async processRow(
    record: TrackRecord,
    ledger: Ledger,
    outputPath: string,
    stats: DownloadRunStats
  ): Promise<void> {
    const template = outputTemplate(this.options.downloadDir, record);
    const expectedFile = expectedFilePath(template, this.options.audioFormat);

    if (await this.files.exists(expectedFile)) {
      Logger.info('  File already exists, marking as downloaded', { file: expectedFile });
      record.downloaded = 'yes';
      record.downloadStatus = 'already_exists';
      record.downloadDate = this.now();
      const seconds = await this.deps.durations.read(expectedFile);
      if (seconds > 0) record.actualDuration = String(Math.trunc(seconds));
      if (record.metadataEmbedded !== 'yes') {
        await this.embedTags(record, expectedFile);
      }
      stats.downloaded++;
      return;
    }

    try {
      await this.files.ensureDir(dirname(expectedFile));
    } catch (error) {
      Logger.warn('  ❌ Could not create the output folder', { track: record.trackUri, error: errorText(error) });
      record.downloaded = 'no';
      record.downloadStatus = DownloadFailure.DownloadError;
      record.downloadDate = this.now();
      stats.failed++;
      return;
    }

    let attempt: AttemptResult;
    // Failure of the last request made, which decides whether it counts towards the cooldown.
    let cause: DownloadStatus;
    if (hasUrl(record)) {
      attempt = await this.downloadFromUrl(record.ytUrl, template, record.durationMs);
      cause = attempt.status;

      if (!attempt.success && isSearchable(attempt.status)) {
        const original = attempt.status;
        Logger.info(`  URL failed (${original}), trying a search`);
        stats.searched++;
        attempt = await this.searchAndDownload(record, template);
        cause = attempt.status;
        attempt.status = attempt.success ? `search_fallback_from_${original}` : `${original}_search_failed`;

        if (attempt.foundUrl) {
          record.searchedUrl = attempt.foundUrl;
          if (attempt.success) replaceUrl(record, attempt.foundUrl, UrlOrigin.YouTubeSearchFallback);
        }
      }
    } else {
      stats.searched++;
      attempt = await this.searchAndDownload(record, template);
      cause = attempt.status;
      if (attempt.foundUrl) {
        record.searchedUrl = attempt.foundUrl;
        if (attempt.success) replaceUrl(record, attempt.foundUrl, UrlOrigin.YouTubeSearch);
      }
    }

    record.downloadStatus = attempt.status;
    record.downloadDate = this.now();
    if (attempt.duration > 0) record.actualDuration = String(Math.trunc(attempt.duration));

    if (attempt.success) {
      record.downloaded = 'yes';
      stats.downloaded++;
      Logger.info('  ✅ Download succeeded');
      await this.embedTags(record, expectedFile);

      const longPause = await this.deps.backoff.afterSuccess();
      if (longPause > 0) {
        Logger.info(`  Took a longer break (${Math.round(longPause / 1000)}s) after ${this.deps.backoff.successCount} downloads`);
      }
      return;
    }

    record.downloaded = 'no';
    stats.failed++;
    Logger.warn(`  ❌ Failed: ${attempt.status}`, { track: record.trackUri });

    if (this.deps.backoff.recordFailure(countsTowardsCooldown(cause))) {
      Logger.warn(
        `${this.deps.backoff.consecutiveFailureCount} consecutive network failures, possible rate limiting; pausing`
      );
      await this.deps.store.save(ledger, outputPath);
      await this.deps.backoff.cooldown();
      await this.deps.session?.refresh();
      Logger.info('Resuming downloads');
    }
  }

  private async embedTags(record: TrackRecord, filePath: string): Promise<void> {
    if (!this.deps.tagger) return;
    const embedded = await this.deps.tagger.embed(filePath, extractTagMetadata(record));
    record.metadataEmbedded = embedded ? 'yes' : 'failed';
  }

  private async downloadFromUrl(url: string, template: string, expectedMs: number): Promise<AttemptResult> {
    const failed = (status: DownloadStatus, duration = 0): AttemptResult => ({
      success: false,
      status,
      duration,
      foundUrl: '',
    });

    try {
      const info = await this.deps.retrieval.probe(url);
      if (!info) {
        return failed(DownloadFailure.NoInfo);
      }

      Logger.info(`  Video: ${info.title}`, {
        duration: formatSeconds(info.duration),
        expected: formatDuration(expectedMs),
      });

      if (!durationMatches(expectedMs, info.duration, this.options.tolerance)) {
        return failed(DownloadFailure.DurationMismatch, info.duration);
      }

      await this.deps.retrieval.download(url, template);
      return { success: true, status: 'downloaded', duration: info.duration, foundUrl: '' };
    } catch (error) {
      Logger.debug('  Direct download failed', { url, error: errorText(error, 80) });
      if (error instanceof RetrievalError) {
        return failed(classifyDownloadError(error.message));
      }
      return failed(DownloadFailure.Error);
    }
  }

  private async searchAndDownload(record: TrackRecord, template: string): Promise<AttemptResult> {
    const query = buildSearchQuery(record.trackName, record.artistNames);
    const expectedMs = record.durationMs;
    await this.deps.backoff.beforeSearch();

    try {
      Logger.info(`  Searching: '${query}'`);
      const results = await this.deps.retrieval.search(query, this.options.searchResults);
      if (results.length === 0) {
        return { success: false, status: DownloadFailure.NoSearchResults, duration: 0, foundUrl: '' };
      }

      const best = pickBestCandidate(results, expectedMs, record.trackName);
      if (!best) {
        return { success: false, status: DownloadFailure.NoValidMatch, duration: 0, foundUrl: '' };
      }

      if (!durationMatches(expectedMs, best.duration, this.options.tolerance)) {
        return {
          success: false,
          status: DownloadFailure.SearchDurationMismatch,
          duration: best.duration,
          foundUrl: best.url,
        };
      }

      Logger.info(`  Selected: ${best.title}`, { url: best.url });
      await this.deps.retrieval.download(best.url, template);
      return { success: true, status: 'search_downloaded', duration: best.duration, foundUrl: best.url };
    } catch (error) {
      Logger.debug('  Search failed', { query, error: errorText(error, 80) });
      return { success: false, status: DownloadFailure.SearchError, duration: 0, foundUrl: '' };
    }
  }
}
