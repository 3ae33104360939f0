import { Command, InvalidArgumentError } from 'commander';
import { join } from 'path';
import dayjs from 'dayjs';
import { config, printConfigSummary, validateEnvironment, type CommandName } from '../config/index.js';
import { LedgerStore } from '../services/LedgerStore.js';
import { TrackResolutionWorkflow } from '../services/TrackResolutionWorkflow.js';
import { AlbumResolutionWorkflow } from '../services/AlbumResolutionWorkflow.js';
import type { ResolutionRunStats, ResolutionWorkflow } from '../services/ResolutionWorkflow.js';
import { SongstatsService } from '../services/SongstatsService.js';
import { DiscogsService } from '../services/DiscogsService.js';
import { MergeService, type LedgerStatistics, type MergeSummary, type VerificationReport } from '../services/MergeService.js';
import { DownloadWorkflow } from '../services/DownloadWorkflow.js';
import { YtDlpService } from '../services/YtDlpService.js';
import { TaggingService, AudioDurationReader } from '../services/TaggingService.js';
import { CookieSession } from '../services/CookieSession.js';
import { RunJournalService, type RunEntry } from '../services/RunJournalService.js';
import { BackoffPolicy } from '../utils/backoff.js';
import { Logger } from '../utils/logger.js';
import { ConfigurationError, LedgerError, ValidationError } from '../types/errors.js';
import {
  UrlOrigin,
  type CatalogCLIOptions,
  type DownloadCLIOptions,
  type FallbackOrigin,
  type MergeCLIOptions,
  type ResolutionCLIOptions,
  type VerifyCLIOptions,
} from '../types/index.js';

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

function parsePositiveInteger(value: string): number {
  const parsed = parsePositiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  return parsed;
}

function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

export function parseFallbackOrigin(value: string): FallbackOrigin {
  if (value === UrlOrigin.SecondaryFallback || value === UrlOrigin.DiscogsFallback) {
    return value;
  }
  throw new ValidationError(`Unknown fallback origin '${value}'`, {
    allowed: [UrlOrigin.SecondaryFallback, UrlOrigin.DiscogsFallback],
  });
}

function ensureEnvironment(command: CommandName): void {
  const missing = validateEnvironment(command);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`, { missing });
  }
}

/** Mirrors the run's log lines into `<logDir>/<timestamp>/output.log`. */
function startRunLog(): void {
  const logFile = Logger.attachRunLog(join(config.paths.logDir, dayjs().format('YYYY-MM-DD_HHmmss')));
  Logger.info(`Log file: ${logFile}`);
}

async function runResolution<Unit>(
  command: CommandName,
  workflow: ResolutionWorkflow<Unit>,
  store: LedgerStore,
  options: ResolutionCLIOptions
): Promise<ResolutionRunStats> {
  const startedAt = Date.now();
  const { ledger, path } = await store.load(options.output, options.input);
  Logger.info(`Loaded ${ledger.rows.length} rows from ${path}`);

  const stats = await workflow.run(ledger, options.output);
  await new RunJournalService().record(resolutionJournalEntry(command, stats, startedAt, Date.now(), options.output));
  return stats;
}

/** Journal row of a resolution run; counts cover only the rows this run wrote. */
export function resolutionJournalEntry(
  command: CommandName,
  stats: ResolutionRunStats,
  startedAt: number,
  finishedAt: number,
  output: string
): RunEntry {
  return {
    command,
    startedAt,
    finishedAt,
    stopReason: stats.stopReason,
    processed: stats.unitsProcessed,
    succeeded: stats.runOutcomes.done,
    failed: stats.runOutcomes.error,
    output,
  };
}

/** Loads both ledgers, merges them and writes the result. */
export async function mergeLedgers(store: LedgerStore, options: MergeCLIOptions): Promise<MergeSummary> {
  const fallbackOrigin = parseFallbackOrigin(options.fallbackOrigin);
  const primary = await store.loadFile(options.primary);
  const secondary = await store.loadFile(options.secondary);

  const { ledger, summary } = new MergeService().merge(primary, secondary, { fallbackOrigin });
  if (!(await store.save(ledger, options.output))) {
    throw new LedgerError(`Could not write ${options.output}`, { path: options.output });
  }
  return summary;
}

function printStatistics(path: string, stats: LedgerStatistics): void {
  console.log(`\n📊 Statistics for ${path}`);
  console.log(`- Total rows: ${stats.total}`);
  console.log(`- Rows with URL: ${stats.withUrl} (${stats.coverage.toFixed(1)}%)`);
  console.log('- By status:');
  for (const [status, count] of Object.entries(stats.byStatus)) console.log(`    ${status}: ${count}`);
  console.log('- By URL origin:');
  for (const [origin, count] of Object.entries(stats.byOrigin)) console.log(`    ${origin}: ${count}`);
  console.log(`- Downloaded: ${stats.downloaded}`);
  for (const [status, count] of Object.entries(stats.byDownloadStatus)) console.log(`    ${status}: ${count}`);
}

function printVerification(report: VerificationReport): void {
  const mark = (ok: boolean): string => (ok ? '✅' : '❌');

  console.log('\n🔍 Merge verification');
  console.log(`- Loaded: primary ${report.primaryTotal}, secondary ${report.secondaryTotal}, merged ${report.mergedTotal}`);
  console.log(`${mark(report.missingFromMerged.length === 0)} Primary tracks missing from merged: ${report.missingFromMerged.length}`);
  console.log(
    `${mark(report.primaryUrlsPreserved === report.primaryUrls)} Primary URLs preserved: ${report.primaryUrlsPreserved}/${report.primaryUrls}`
  );
  console.log(
    `${mark(report.fallbacksAdded === report.fallbacksAvailable)} Fallback URLs added: ${report.fallbacksAdded}/${report.fallbacksAvailable}`
  );
  console.log(`${mark(report.unusedSecondaryUrls === 0)} Unused secondary URLs: ${report.unusedSecondaryUrls}`);
  console.log(`- Rows still without URL: ${report.rowsWithoutUrl}`);
  console.log(`- Coverage: ${report.coverage.toFixed(1)}%`);

  if (report.rowsWithoutUrl > 0) {
    console.log('- Missing by status:');
    for (const [status, count] of Object.entries(report.missingByStatus)) console.log(`    ${status}: ${count}`);
    console.log('- Artists with the most missing tracks:');
    report.topMissingArtists.forEach(({ artist, count }, index) => console.log(`    ${index + 1}. ${artist}: ${count}`));
  }
  console.log(report.ok ? '\n✅ Merge verified' : '\n❌ Merge verification found problems');
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('trackvault')
    .description('Reconcile a saved-track export with Songstats and Discogs, merge the results and download the audio')
    .version('1.0.0')
    .option('-v, --verbose', 'log debug output')
    .hook('preAction', (command) => {
      if (command.opts<{ verbose?: boolean }>().verbose) {
        Logger.setLevel('debug');
      }
    });

  program
    .command('songstats')
    .description('Resolve YouTube links per track through Songstats (ISRC lookup)')
    .option('-i, --input <csv>', 'export to start from when the output does not exist yet', config.paths.exportCsv)
    .option('-o, --output <csv>', 'ledger to resume and write', config.paths.songstatsCsv)
    .option('--max-runtime <minutes>', 'wall-clock budget', parsePositiveNumber, config.resolution.maxRuntimeMinutes)
    .option('--save-every <n>', 'tracks between checkpoint messages', parsePositiveInteger, config.resolution.saveEvery)
    .option('--rescan', 're-query tracks previously marked no_yt', config.resolution.retrySoftTerminal)
    .action(async (options: ResolutionCLIOptions) => {
      startRunLog();
      const store = new LedgerStore();
      const lookup = new SongstatsService();
      const workflow = new TrackResolutionWorkflow(
        lookup,
        { store, backoff: new BackoffPolicy({ unitDelay: config.resolution.trackDelay }) },
        { maxRuntimeMinutes: options.maxRuntime, saveEvery: options.saveEvery, retrySoftTerminal: options.rescan }
      );

      try {
        await runResolution('songstats', workflow, store, options);
      } finally {
        await lookup.close();
        Logger.detachRunLog();
      }
    });

  program
    .command('discogs')
    .description('Resolve YouTube links per album through the Discogs database')
    .option('-i, --input <csv>', 'export to start from when the output does not exist yet', config.paths.exportCsv)
    .option('-o, --output <csv>', 'ledger to resume and write', config.paths.discogsCsv)
    .option('--max-runtime <minutes>', 'wall-clock budget', parsePositiveNumber, config.resolution.maxRuntimeMinutes)
    .option('--save-every <n>', 'albums between checkpoint messages', parsePositiveInteger, config.resolution.saveEvery)
    .option('--rescan', 're-query tracks previously marked no_yt', config.resolution.retrySoftTerminal)
    .option('--threshold <score>', 'token containment needed for a title match', parseThreshold, config.resolution.matchThreshold)
    .action(async (options: CatalogCLIOptions) => {
      ensureEnvironment('discogs');
      startRunLog();
      const store = new LedgerStore();
      const workflow = new AlbumResolutionWorkflow(
        new DiscogsService(),
        { store, backoff: new BackoffPolicy({ unitDelay: config.resolution.albumDelay }) },
        {
          maxRuntimeMinutes: options.maxRuntime,
          saveEvery: options.saveEvery,
          retrySoftTerminal: options.rescan,
          matchThreshold: options.threshold,
        }
      );

      try {
        await runResolution('discogs', workflow, store, options);
      } finally {
        Logger.detachRunLog();
      }
    });

  program
    .command('merge')
    .description('Merge the Songstats and Discogs ledgers, Songstats first')
    .option('--primary <csv>', 'preferred ledger', config.paths.songstatsCsv)
    .option('--secondary <csv>', 'fallback ledger', config.paths.discogsCsv)
    .option('-o, --output <csv>', 'merged ledger', config.paths.masterCsv)
    .option('--fallback-origin <origin>', 'origin tag of adopted URLs', config.merge.fallbackOrigin)
    .action(async (options: MergeCLIOptions) => {
      const summary = await mergeLedgers(new LedgerStore(), options);

      console.log('\n🔗 Merge summary');
      console.log(`- Total tracks: ${summary.total}`);
      console.log(`- URLs from primary: ${summary.native}`);
      console.log(`- URLs filled from secondary: ${summary.adopted}`);
      console.log(`- Tracks still without URL: ${summary.unresolved}`);
      const coverage = summary.total > 0 ? ((summary.native + summary.adopted) / summary.total) * 100 : 0;
      console.log(`- Coverage: ${coverage.toFixed(1)}%`);
      console.log(`- Output: ${options.output}`);
    });

  program
    .command('verify')
    .description('Check a merged ledger against its two sources')
    .option('--primary <csv>', 'preferred ledger', config.paths.songstatsCsv)
    .option('--secondary <csv>', 'fallback ledger', config.paths.discogsCsv)
    .option('--merged <csv>', 'merged ledger', config.paths.masterCsv)
    .action(async (options: VerifyCLIOptions) => {
      const store = new LedgerStore();
      const report = new MergeService().verify(
        await store.loadFile(options.primary),
        await store.loadFile(options.secondary),
        await store.loadFile(options.merged)
      );
      printVerification(report);
      if (!report.ok) {
        process.exitCode = 1;
      }
    });

  program
    .command('stats')
    .description('Show status, origin and download counts of a ledger')
    .argument('<csv>', 'ledger to inspect')
    .action(async (path: string) => {
      const ledger = await new LedgerStore().loadFile(path);
      printStatistics(path, new MergeService().summarize(ledger));
    });

  program
    .command('download')
    .description('Download audio for every track of the merged ledger')
    .option('-i, --input <csv>', 'merged ledger, updated in place', config.paths.masterCsv)
    .option('--max-runtime <minutes>', 'wall-clock budget', parsePositiveNumber, config.download.maxRuntimeMinutes)
    .option('--max-downloads <n>', 'tracks to process this run', parsePositiveInteger, config.download.maxDownloads)
    .option('--no-metadata', 'skip tag embedding')
    .option('--no-cookies', 'run without browser cookies')
    .action(async (options: DownloadCLIOptions) => {
      startRunLog();
      const startedAt = Date.now();
      const { tools, download } = config;

      const cookieOptions = { cacheDir: tools.cookieCacheDir, ytDlpPath: tools.ytDlpPath, timeoutMs: tools.processTimeoutMs };
      const cookies = options.cookies
        ? new CookieSession({ ...cookieOptions, browser: tools.cookiesFromBrowser, cookiesFile: tools.cookiesFile })
        : CookieSession.disabled(cookieOptions);
      await cookies.prepare();

      const store = new LedgerStore();
      const workflow = new DownloadWorkflow(
        {
          store,
          retrieval: new YtDlpService(
            {
              binary: tools.ytDlpPath,
              audioFormat: download.audioFormat,
              audioQuality: download.audioQuality,
              playerClients: tools.playerClients,
              socketTimeoutSeconds: tools.socketTimeoutSeconds,
              sleepRequestsSeconds: tools.sleepRequestsSeconds,
              forceIpv4: tools.forceIpv4,
              geoBypass: tools.geoBypass,
              timeoutMs: tools.processTimeoutMs,
            },
            cookies
          ),
          tagger:
            options.metadata && download.embedMetadata
              ? new TaggingService({
                  ffmpegPath: tools.ffmpegPath,
                  embedAlbumArt: download.embedAlbumArt,
                  timeoutMs: tools.processTimeoutMs,
                })
              : null,
          durations: new AudioDurationReader(),
          session: cookies,
          backoff: new BackoffPolicy({
            unitDelay: download.downloadDelay,
            searchDelay: download.searchDelay,
            maxConsecutiveFailures: download.maxConsecutiveFailures,
            cooldownMs: download.cooldownMinutes * 60 * 1000,
            longPauseEvery: download.longPauseEvery,
            longPause: download.longPause,
          }),
        },
        {
          downloadDir: config.paths.downloadDir,
          audioFormat: download.audioFormat,
          maxRuntimeMinutes: options.maxRuntime,
          saveEvery: download.saveEvery,
          maxDownloads: options.maxDownloads,
          tolerance: {
            percent: download.durationTolerancePercent,
            floorSeconds: download.durationToleranceSeconds,
          },
          searchResults: download.searchResults,
          authenticated: cookies.isAuthenticated,
        }
      );

      try {
        const ledger = await store.loadFile(options.input);
        const stats = await workflow.run(ledger, options.input);
        await new RunJournalService().record({
          command: 'download',
          startedAt,
          finishedAt: Date.now(),
          stopReason: stats.stopReason,
          processed: stats.processed,
          succeeded: stats.downloaded,
          failed: stats.failed,
          output: options.input,
        });
      } finally {
        Logger.detachRunLog();
      }
    });

  program
    .command('config')
    .description('Show the effective configuration')
    .action(() => {
      printConfigSummary();
    });

  return program;
}
