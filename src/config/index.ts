import dotenv from 'dotenv';
import { AppConfigSchema, type ValidatedAppConfig } from './schema.js';
import { ConfigurationError } from '../types/errors.js';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  return parseInt(process.env[name] || String(fallback), 10);
}

function floatFromEnv(name: string, fallback: number): number {
  return parseFloat(process.env[name] || String(fallback));
}

function optionalFromEnv(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function createConfig(): ValidatedAppConfig {
  const maxDownloads = optionalFromEnv('MAX_DOWNLOADS_PER_RUN');

  const rawConfig = {
    paths: {
      exportCsv: process.env.EXPORT_CSV || 'data/liked.csv',
      songstatsCsv: process.env.SONGSTATS_CSV || 'data/liked_yt_songstats.csv',
      discogsCsv: process.env.DISCOGS_CSV || 'data/liked_yt_discogs.csv',
      masterCsv: process.env.MASTER_CSV || 'data/liked_master.csv',
      downloadDir: process.env.DOWNLOAD_DIR || 'downloads',
      logDir: process.env.LOG_DIR || 'logs',
    },
    discogs: {
      baseUrl: process.env.DISCOGS_BASE_URL || 'https://api.discogs.com',
      token: optionalFromEnv('DISCOGS_TOKEN'),
      consumerKey: optionalFromEnv('DISCOGS_CONSUMER_KEY'),
      consumerSecret: optionalFromEnv('DISCOGS_CONSUMER_SECRET'),
      userAgent: process.env.DISCOGS_USER_AGENT || 'trackvault/1.0',
      searchLimit: intFromEnv('DISCOGS_SEARCH_LIMIT', 3),
      timeout: intFromEnv('DISCOGS_TIMEOUT_MS', 30000),
    },
    songstats: {
      baseUrl: process.env.SONGSTATS_BASE_URL || 'https://songstats.com',
      chromePath: process.env.CHROME_PATH || '/usr/bin/google-chrome',
      headless: process.env.HEADLESS !== 'false',
      loadWaitMs: intFromEnv('SONGSTATS_LOAD_WAIT_MS', 7000),
      redirectTimeoutMs: intFromEnv('SONGSTATS_REDIRECT_TIMEOUT_MS', 15000),
      navigationTimeoutMs: intFromEnv('SONGSTATS_NAVIGATION_TIMEOUT_MS', 30000),
    },
    resolution: {
      maxRuntimeMinutes: floatFromEnv('RESOLUTION_MAX_RUNTIME_MINUTES', 300),
      saveEvery: intFromEnv('RESOLUTION_SAVE_EVERY', 25),
      retrySoftTerminal: process.env.RESOLUTION_RETRY_NO_YT === 'true',
      matchThreshold: floatFromEnv('MATCH_THRESHOLD', 0.66),
      trackDelay: {
        minMs: intFromEnv('TRACK_DELAY_MIN_MS', 3000),
        maxMs: intFromEnv('TRACK_DELAY_MAX_MS', 4000),
      },
      albumDelay: {
        minMs: intFromEnv('ALBUM_DELAY_MIN_MS', 200),
        maxMs: intFromEnv('ALBUM_DELAY_MAX_MS', 600),
      },
    },
    merge: {
      fallbackOrigin: process.env.MERGE_FALLBACK_ORIGIN || 'discogs_fallback',
    },
    download: {
      maxRuntimeMinutes: floatFromEnv('DOWNLOAD_MAX_RUNTIME_MINUTES', 800),
      saveEvery: intFromEnv('DOWNLOAD_SAVE_EVERY', 1),
      maxDownloads: maxDownloads ? parseInt(maxDownloads, 10) : undefined,
      durationTolerancePercent: floatFromEnv('DURATION_TOLERANCE_PERCENT', 15),
      durationToleranceSeconds: floatFromEnv('DURATION_TOLERANCE_SECONDS', 30),
      downloadDelay: {
        minMs: intFromEnv('DOWNLOAD_DELAY_MIN_MS', 3000),
        maxMs: intFromEnv('DOWNLOAD_DELAY_MAX_MS', 6000),
      },
      searchDelay: {
        minMs: intFromEnv('SEARCH_DELAY_MIN_MS', 2000),
        maxMs: intFromEnv('SEARCH_DELAY_MAX_MS', 4000),
      },
      maxConsecutiveFailures: intFromEnv('MAX_CONSECUTIVE_FAILURES', 5),
      cooldownMinutes: floatFromEnv('RATE_LIMIT_PAUSE_MINUTES', 15),
      longPauseEvery: intFromEnv('LONG_PAUSE_EVERY', 25),
      longPause: {
        minMs: intFromEnv('LONG_PAUSE_MIN_MS', 60000),
        maxMs: intFromEnv('LONG_PAUSE_MAX_MS', 180000),
      },
      searchResults: intFromEnv('SEARCH_RESULTS', 5),
      audioFormat: process.env.AUDIO_FORMAT || 'mp3',
      audioQuality: process.env.AUDIO_QUALITY || '0',
      embedMetadata: process.env.EMBED_METADATA !== 'false',
      embedAlbumArt: process.env.EMBED_ALBUM_ART !== 'false',
    },
    tools: {
      ytDlpPath: process.env.YT_DLP_PATH || 'yt-dlp',
      ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
      playerClients: process.env.YOUTUBE_PLAYER_CLIENTS ?? 'web,android',
      socketTimeoutSeconds: intFromEnv('SOCKET_TIMEOUT_SECONDS', 30),
      sleepRequestsSeconds: floatFromEnv('SLEEP_REQUESTS_SECONDS', 1.5),
      forceIpv4: process.env.FORCE_IPV4 !== 'false',
      geoBypass: process.env.GEO_BYPASS !== 'false',
      cookiesFromBrowser: optionalFromEnv('COOKIES_FROM_BROWSER'),
      cookiesFile: optionalFromEnv('COOKIES_FILE'),
      cookieCacheDir: process.env.COOKIE_CACHE_DIR || 'logs/.cookie_cache',
      processTimeoutMs: intFromEnv('PROCESS_TIMEOUT_MS', 600000),
    },
    rateLimit: {
      discogs: {
        minTime: intFromEnv('DISCOGS_RATE_LIMIT_MIN_TIME', 1200),
        maxConcurrent: intFromEnv('DISCOGS_RATE_LIMIT_MAX_CONCURRENT', 1),
      },
      songstats: {
        minTime: intFromEnv('SONGSTATS_RATE_LIMIT_MIN_TIME', 1000),
        maxConcurrent: intFromEnv('SONGSTATS_RATE_LIMIT_MAX_CONCURRENT', 1),
      },
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
    },
    journal: {
      enabled: process.env.JOURNAL_ENABLED !== 'false',
      basePath: process.env.JOURNAL_DIR || 'journal',
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export const config = createConfig();

export type CommandName = 'songstats' | 'discogs' | 'merge' | 'verify' | 'stats' | 'download';

/** Environment variables a command cannot run without. */
export function validateEnvironment(command: CommandName): string[] {
  if (command !== 'discogs') {
    return [];
  }

  if (config.discogs.token) {
    return [];
  }

  const missing: string[] = [];
  if (!config.discogs.consumerKey) missing.push('DISCOGS_CONSUMER_KEY');
  if (!config.discogs.consumerSecret) missing.push('DISCOGS_CONSUMER_SECRET');
  return missing.length > 0 ? ['DISCOGS_TOKEN', ...missing] : [];
}

export function printConfigSummary(): void {
  console.log('Configuration Summary:');
  console.log(`- Export CSV: ${config.paths.exportCsv}`);
  console.log(`- Songstats CSV: ${config.paths.songstatsCsv}`);
  console.log(`- Discogs CSV: ${config.paths.discogsCsv}`);
  console.log(`- Master CSV: ${config.paths.masterCsv}`);
  console.log(`- Download Dir: ${config.paths.downloadDir}`);
  console.log(`- Discogs Auth: ${config.discogs.token ? 'TOKEN' : config.discogs.consumerKey ? 'KEY/SECRET' : 'NONE'}`);
  console.log(`- Resolution Runtime: ${config.resolution.maxRuntimeMinutes} min`);
  console.log(`- Download Runtime: ${config.download.maxRuntimeMinutes} min`);
  console.log(`- Retry no_yt: ${config.resolution.retrySoftTerminal ? 'YES' : 'NO'}`);
  console.log(`- Cookies: ${config.tools.cookiesFromBrowser ?? config.tools.cookiesFile ?? 'NONE'}`);
  console.log(`- Log Level: ${config.logging.level}`);
}
