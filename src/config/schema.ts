import { z } from 'zod';

export const DelayRangeSchema = z
  .object({
    minMs: z.number().min(0),
    maxMs: z.number().min(0),
  })
  .refine((range) => range.maxMs >= range.minMs, 'Delay range maximum must not be below its minimum');

export const RateLimitConfigSchema = z.object({
  minTime: z.number().min(0),
  maxConcurrent: z.number().min(1),
});

export const PathsConfigSchema = z.object({
  exportCsv: z.string().min(1, 'Export CSV path is required'),
  songstatsCsv: z.string().min(1, 'Songstats CSV path is required'),
  discogsCsv: z.string().min(1, 'Discogs CSV path is required'),
  masterCsv: z.string().min(1, 'Master CSV path is required'),
  downloadDir: z.string().min(1, 'Download directory is required'),
  logDir: z.string().min(1, 'Log directory is required'),
});

export const DiscogsConfigSchema = z.object({
  baseUrl: z.string().url('Discogs base URL must be a valid URL'),
  token: z.string().optional(),
  consumerKey: z.string().optional(),
  consumerSecret: z.string().optional(),
  userAgent: z.string().min(1, 'Discogs User-Agent is required'),
  searchLimit: z.number().int().min(1).max(100),
  timeout: z.number().min(1000),
});

export const SongstatsConfigSchema = z.object({
  baseUrl: z.string().url('Songstats base URL must be a valid URL'),
  chromePath: z.string().min(1, 'Chrome path is required'),
  headless: z.boolean(),
  loadWaitMs: z.number().min(0),
  redirectTimeoutMs: z.number().min(0),
  navigationTimeoutMs: z.number().min(5000, 'Navigation timeout must be at least 5000ms'),
});

export const ResolutionConfigSchema = z.object({
  maxRuntimeMinutes: z.number().positive(),
  saveEvery: z.number().int().min(1),
  retrySoftTerminal: z.boolean(),
  matchThreshold: z.number().min(0).max(1),
  trackDelay: DelayRangeSchema,
  albumDelay: DelayRangeSchema,
});

export const MergeConfigSchema = z.object({
  fallbackOrigin: z.enum(['secondary_fallback', 'discogs_fallback']),
});

export const DownloadConfigSchema = z.object({
  maxRuntimeMinutes: z.number().positive(),
  saveEvery: z.number().int().min(1),
  maxDownloads: z.number().int().positive().optional(),
  durationTolerancePercent: z.number().min(0),
  durationToleranceSeconds: z.number().min(0),
  downloadDelay: DelayRangeSchema,
  searchDelay: DelayRangeSchema,
  maxConsecutiveFailures: z.number().int().min(1),
  cooldownMinutes: z.number().min(0),
  longPauseEvery: z.number().int().min(1),
  longPause: DelayRangeSchema,
  searchResults: z.number().int().min(1).max(20),
  audioFormat: z.enum(['mp3', 'm4a', 'opus', 'flac']),
  audioQuality: z.string().min(1),
  embedMetadata: z.boolean(),
  embedAlbumArt: z.boolean(),
});

export const RetrievalToolsConfigSchema = z.object({
  ytDlpPath: z.string().min(1, 'yt-dlp path is required'),
  ffmpegPath: z.string().min(1, 'ffmpeg path is required'),
  playerClients: z.string(),
  socketTimeoutSeconds: z.number().int().min(1),
  sleepRequestsSeconds: z.number().min(0),
  forceIpv4: z.boolean(),
  geoBypass: z.boolean(),
  cookiesFromBrowser: z.string().optional(),
  cookiesFile: z.string().optional(),
  cookieCacheDir: z.string().min(1),
  processTimeoutMs: z.number().min(10000),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
});

export const JournalConfigSchema = z.object({
  enabled: z.boolean(),
  basePath: z.string().min(1, 'Journal base path is required'),
});

export const RateLimitsSchema = z.object({
  discogs: RateLimitConfigSchema,
  songstats: RateLimitConfigSchema,
});

export const AppConfigSchema = z.object({
  paths: PathsConfigSchema,
  discogs: DiscogsConfigSchema,
  songstats: SongstatsConfigSchema,
  resolution: ResolutionConfigSchema,
  merge: MergeConfigSchema,
  download: DownloadConfigSchema,
  tools: RetrievalToolsConfigSchema,
  rateLimit: RateLimitsSchema,
  logging: LoggingConfigSchema,
  journal: JournalConfigSchema,
});

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
