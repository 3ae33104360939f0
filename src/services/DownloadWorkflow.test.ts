import { describe, it, expect } from 'vitest';
import { join } from 'path';
import dayjs from 'dayjs';
import { DownloadWorkflow, pickBestCandidate, type DownloadOptions, type MediaFiles } from './DownloadWorkflow.js';
import { LedgerStore } from './LedgerStore.js';
import { MemoryFileSystem, fakeClock, ledgerOf, recordingSleeper, track } from './test-utils.js';
import { BackoffPolicy } from '../utils/backoff.js';
import { RetrievalError } from '../types/errors.js';
import {
  ResolutionStatus,
  UrlOrigin,
  type DurationReader,
  type MediaInfo,
  type RetrievalAdapter,
  type TagMetadata,
  type TagWriter,
  type TrackRecord,
} from '../types/index.js';

const URL_A = 'https://www.youtube.com/watch?v=aaaaaaaaaaa';
const URL_B = 'https://www.youtube.com/watch?v=bbbbbbbbbbb';
const URL_C = 'https://www.youtube.com/watch?v=ccccccccccc';
const URL_D = 'https://www.youtube.com/watch?v=ddddddddddd';

function media(url: string, title: string, duration: number): MediaInfo {
  return { id: url.slice(-11), url, title, duration };
}

class FakeRetrieval implements RetrievalAdapter {
  readonly probes: Record<string, MediaInfo | null | Error> = {};
  readonly results: Record<string, MediaInfo[]> = {};
  readonly searches: string[] = [];
  readonly downloads: Array<[string, string]> = [];

  async probe(url: string): Promise<MediaInfo | null> {
    const answer = this.probes[url];
    if (answer instanceof Error) throw answer;
    return answer ?? null;
  }

  async search(query: string, limit: number): Promise<MediaInfo[]> {
    this.searches.push(query);
    return (this.results[query] ?? []).slice(0, limit);
  }

  beforeDownload: () => void = () => {};

  async download(url: string, outputTemplate: string): Promise<void> {
    this.beforeDownload();
    this.downloads.push([url, outputTemplate]);
  }
}

class FakeTagger implements TagWriter {
  readonly embedded: Array<[string, TagMetadata]> = [];
  result = true;

  async embed(filePath: string, metadata: TagMetadata): Promise<boolean> {
    this.embedded.push([filePath, metadata]);
    return this.result;
  }
}

class FakeFiles implements MediaFiles {
  readonly present = new Set<string>();
  failEnsureDir = false;

  async exists(path: string): Promise<boolean> {
    return this.present.has(path);
  }

  async ensureDir(path: string): Promise<void> {
    if (this.failEnsureDir) throw new Error(`EACCES: permission denied, mkdir '${path}'`);
  }
}

const fixedDurations: DurationReader = { read: async () => 187.9 };

const OPTIONS: DownloadOptions = {
  downloadDir: 'downloads',
  audioFormat: 'mp3',
  maxRuntimeMinutes: 60,
  saveEvery: 1,
  tolerance: { percent: 15, floorSeconds: 30 },
  searchResults: 5,
  authenticated: false,
};

function setup(options: Partial<DownloadOptions> = {}, tagger: FakeTagger | null = new FakeTagger()) {
  const fs = new MemoryFileSystem();
  const retrieval = new FakeRetrieval();
  const files = new FakeFiles();
  const clock = fakeClock();
  const { waits, sleeper } = recordingSleeper();
  const backoff = new BackoffPolicy(
    {
      unitDelay: { minMs: 1000, maxMs: 1000 },
      searchDelay: { minMs: 500, maxMs: 500 },
      maxConsecutiveFailures: 2,
      cooldownMs: 60000,
    },
    sleeper
  );
  const session = { isAuthenticated: false, refreshes: 0, refresh: async () => { session.refreshes++; } };
  const workflow = new DownloadWorkflow(
    { store: new LedgerStore(fs), retrieval, tagger, durations: fixedDurations, backoff, session, files, clock: clock.now },
    { ...OPTIONS, ...options }
  );
  return { fs, retrieval, files, tagger, waits, session, workflow, timestamp: dayjs(clock.now()).format('YYYY-MM-DD HH:mm:ss') };
}

function soWhat(overrides: Partial<TrackRecord> = {}): TrackRecord {
  return track('spotify:track:1', {
    trackName: 'So What',
    artistNames: 'Miles Davis',
    albumName: 'Kind of Blue',
    durationMs: 200000,
    ...overrides,
  });
}

const SO_WHAT_FILE = join('downloads', 'Miles Davis', 'Kind of Blue', 'So What.mp3');
const SO_WHAT_TEMPLATE = join('downloads', 'Miles Davis', 'Kind of Blue', 'So What.%(ext)s');

describe('pickBestCandidate', () => {
  it('takes the first result when no duration is known', () => {
    const results = [media(URL_A, 'Other', 10), media(URL_B, 'So What', 200)];
    expect(pickBestCandidate(results, 0, 'So What')).toBe(results[0]);
  });

  it('prefers the closest duration, then the closest title', () => {
    const results = [media(URL_A, 'So What (Live)', 260), media(URL_B, 'Freddie Freeloader', 199), media(URL_C, 'So What', 201)];
    expect(pickBestCandidate(results, 200000, 'So What')).toBe(results[2]);
  });

  it('returns null without results', () => {
    expect(pickBestCandidate([], 200000, 'So What')).toBeNull();
  });
});

describe('DownloadWorkflow.selectRows', () => {
  const rows = [
    track('t0', { trackName: 'Search me' }),
    track('t1', { ytUrl: URL_A, downloaded: 'yes' }),
    track('t2', { ytUrl: URL_A, downloadStatus: 'unavailable' }),
    track('t3', { ytUrl: URL_A, downloadStatus: 'private_video' }),
    track('t4', { ytUrl: URL_A }),
    track('t5', { trackName: '' }),
  ];

  it('puts URL rows first and skips settled rows', () => {
    expect(setup().workflow.selectRows(rows)).toEqual([4, 0]);
  });

  it('retries cookie-dependent failures once signed in', () => {
    expect(setup({ authenticated: true }).workflow.selectRows(rows)).toEqual([3, 4, 0]);
  });
});

describe('DownloadWorkflow.run', () => {
  it('downloads from the stored URL and tags the file', async () => {
    const { retrieval, tagger, waits, workflow, timestamp } = setup();
    retrieval.probes[URL_A] = media(URL_A, 'So What', 205);
    const ledger = ledgerOf([soWhat({ ytUrl: URL_A, status: ResolutionStatus.Done, ytUrlOrigin: UrlOrigin.Songstats })]);

    const stats = await workflow.run(ledger, 'master.csv');

    expect(retrieval.downloads).toEqual([[URL_A, SO_WHAT_TEMPLATE]]);
    expect(ledger.rows[0]).toMatchObject({
      downloaded: 'yes',
      downloadStatus: 'downloaded',
      downloadDate: timestamp,
      actualDuration: '205',
      metadataEmbedded: 'yes',
      ytUrl: URL_A,
      ytUrlOrigin: UrlOrigin.Songstats,
    });
    expect(tagger?.embedded.map(([path]) => path)).toEqual([SO_WHAT_FILE]);
    expect(tagger?.embedded[0][1]).toMatchObject({ title: 'So What', artist: 'Miles Davis', album: 'Kind of Blue' });
    expect(stats).toMatchObject({ total: 1, processed: 1, downloaded: 1, failed: 0, searched: 0, stopReason: 'completed' });
    expect(waits).toEqual([1000]);
  });

  it('falls back to a search when the stored URL has the wrong duration', async () => {
    const { retrieval, waits, workflow } = setup();
    retrieval.probes[URL_B] = media(URL_B, 'So What (Extended)', 400);
    retrieval.results['Miles Davis So What'] = [media(URL_C, 'So What (Live)', 260), media(URL_D, 'So What', 199)];
    const ledger = ledgerOf([soWhat({ ytUrl: URL_B, status: ResolutionStatus.Done, ytUrlOrigin: UrlOrigin.Discogs })]);

    const stats = await workflow.run(ledger, 'master.csv');

    expect(retrieval.downloads).toEqual([[URL_D, SO_WHAT_TEMPLATE]]);
    expect(ledger.rows[0]).toMatchObject({
      downloaded: 'yes',
      downloadStatus: 'search_fallback_from_duration_mismatch',
      searchedUrl: URL_D,
      ytUrl: URL_D,
      ytUrlOrigin: UrlOrigin.YouTubeSearchFallback,
      status: ResolutionStatus.Done,
      actualDuration: '199',
    });
    expect(stats.searched).toBe(1);
    expect(waits).toEqual([500, 1000]);
  });

  it('keeps the stored URL when the fallback search also fails', async () => {
    const { retrieval, workflow } = setup();
    retrieval.probes[URL_A] = new RetrievalError('ERROR: [youtube] aaaaaaaaaaa: Video unavailable');
    retrieval.results['Miles Davis So What'] = [media(URL_C, 'So What (Extended)', 400)];
    const ledger = ledgerOf([soWhat({ ytUrl: URL_A, status: ResolutionStatus.Done, ytUrlOrigin: UrlOrigin.Songstats })]);

    await workflow.run(ledger, 'master.csv');

    expect(retrieval.downloads).toEqual([]);
    expect(ledger.rows[0]).toMatchObject({
      downloaded: 'no',
      downloadStatus: 'unavailable_search_failed',
      searchedUrl: URL_C,
      ytUrl: URL_A,
      ytUrlOrigin: UrlOrigin.Songstats,
      actualDuration: '400',
    });
  });

  it('does not search after a failure a search cannot fix', async () => {
    const { retrieval, workflow } = setup();
    retrieval.probes[URL_A] = new RetrievalError('ERROR: [youtube] aaaaaaaaaaa: Sign in to confirm you are not a bot');
    const ledger = ledgerOf([soWhat({ ytUrl: URL_A, status: ResolutionStatus.Done })]);

    const stats = await workflow.run(ledger, 'master.csv');

    expect(retrieval.searches).toEqual([]);
    expect(ledger.rows[0].downloadStatus).toBe('sign_in_required');
    expect(stats.failed).toBe(1);
  });

  it('searches rows that never had a URL', async () => {
    const { retrieval, workflow } = setup();
    retrieval.results['John Coltrane Naima'] = [media(URL_C, 'Naima', 261)];
    const ledger = ledgerOf([
      track('t1', { trackName: 'Naima', artistNames: 'John Coltrane', albumName: 'Giant Steps', durationMs: 261000 }),
      track('t2', { trackName: 'Mr. Unknown', artistNames: 'Nobody' }),
    ]);

    const stats = await workflow.run(ledger, 'master.csv');

    expect(ledger.rows[0]).toMatchObject({
      downloaded: 'yes',
      downloadStatus: 'search_downloaded',
      ytUrl: URL_C,
      ytUrlOrigin: UrlOrigin.YouTubeSearch,
      status: ResolutionStatus.Done,
    });
    expect(ledger.rows[1]).toMatchObject({ downloaded: 'no', downloadStatus: 'no_search_results', ytUrl: '' });
    expect(retrieval.searches).toEqual(['John Coltrane Naima', 'Nobody Mr. Unknown']);
    expect(stats).toMatchObject({ downloaded: 1, failed: 1, searched: 2 });
  });

  it('records files that already exist without downloading', async () => {
    const { files, retrieval, tagger, waits, workflow } = setup();
    files.present.add(SO_WHAT_FILE);
    if (tagger) tagger.result = false;
    const ledger = ledgerOf([soWhat({ ytUrl: URL_A, status: ResolutionStatus.Done })]);

    const stats = await workflow.run(ledger, 'master.csv');

    expect(retrieval.downloads).toEqual([]);
    expect(ledger.rows[0]).toMatchObject({
      downloaded: 'yes',
      downloadStatus: 'already_exists',
      actualDuration: '187',
      metadataEmbedded: 'failed',
    });
    expect(stats.downloaded).toBe(1);
    expect(waits).toEqual([]);
  });

  it('skips tagging when embedding is disabled', async () => {
    const { retrieval, workflow } = setup({}, null);
    retrieval.probes[URL_A] = media(URL_A, 'So What', 200);
    const ledger = ledgerOf([soWhat({ ytUrl: URL_A, status: ResolutionStatus.Done })]);

    await workflow.run(ledger, 'master.csv');

    expect(ledger.rows[0].downloaded).toBe('yes');
    expect(ledger.rows[0].metadataEmbedded).toBe('');
  });

  it('cools down and refreshes the session after consecutive network failures', async () => {
    const { retrieval, waits, session, workflow } = setup();
    retrieval.probes[URL_A] = new RetrievalError('ERROR: HTTP Error 429: Too Many Requests');
    const ledger = ledgerOf([
      soWhat({ ytUrl: URL_A }),
      track('t2', { ytUrl: URL_A }),
      track('t3', { ytUrl: URL_A }),
    ]);

    const stats = await workflow.run(ledger, 'master.csv');

    expect(ledger.rows.map((row) => row.downloadStatus)).toEqual(['rate_limited', 'rate_limited', 'rate_limited']);
    expect(waits).toEqual([60000]);
    expect(session.refreshes).toBe(1);
    expect(stats.failed).toBe(3);
  });

  it('saves the ledger after every track even when checkpoints are further apart', async () => {
    const { fs, retrieval, workflow } = setup({ saveEvery: 3 });
    retrieval.probes[URL_A] = media(URL_A, 'Any', 0);
    const writesAtDownload: number[] = [];
    retrieval.beforeDownload = () => writesAtDownload.push(fs.writes);
    const ledger = ledgerOf([track('t1', { ytUrl: URL_A }), track('t2', { ytUrl: URL_A }), track('t3', { ytUrl: URL_A })]);

    await workflow.run(ledger, 'master.csv');

    expect(writesAtDownload).toEqual([0, 1, 2]);
    expect(fs.writes).toBe(4);
  });

  it('records a download error and moves on when the output folder cannot be created', async () => {
    const { files, retrieval, waits, workflow } = setup();
    files.failEnsureDir = true;
    retrieval.probes[URL_A] = media(URL_A, 'Any', 0);
    const ledger = ledgerOf([track('t1', { ytUrl: URL_A }), track('t2', { ytUrl: URL_A })]);

    const stats = await workflow.run(ledger, 'master.csv');

    expect(retrieval.downloads).toEqual([]);
    expect(ledger.rows.map((row) => [row.downloaded, row.downloadStatus])).toEqual([
      ['no', 'download_error'],
      ['no', 'download_error'],
    ]);
    expect(stats).toMatchObject({ processed: 2, failed: 2, stopReason: 'completed' });
    expect(waits).toEqual([]);
  });

  it('stops at the per-run download limit', async () => {
    const { retrieval, workflow } = setup({ maxDownloads: 2 });
    retrieval.probes[URL_A] = media(URL_A, 'Any', 0);
    const ledger = ledgerOf([track('t1', { ytUrl: URL_A }), track('t2', { ytUrl: URL_A }), track('t3', { ytUrl: URL_A })]);

    const stats = await workflow.run(ledger, 'master.csv');

    expect(stats.stopReason).toBe('download_limit');
    expect(stats.processed).toBe(2);
    expect(ledger.rows.map((row) => row.downloaded)).toEqual(['yes', 'yes', '']);
  });

  it('does nothing and writes nothing when every row is downloaded', async () => {
    const { fs, workflow } = setup();
    const ledger = ledgerOf([soWhat({ ytUrl: URL_A, downloaded: 'yes' })]);

    const stats = await workflow.run(ledger, 'master.csv');

    expect(stats.stopReason).toBe('nothing_to_do');
    expect(fs.writes).toBe(0);
  });
});
