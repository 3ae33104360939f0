import { z } from 'zod';
import { CookieSession, type CommandRunner } from './CookieSession.js';
import { RetrievalError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { runCommand, type CommandResult } from '../utils/process.js';
import { watchUrl } from '../utils/youtube.js';
import type { MediaInfo, RetrievalAdapter } from '../types/index.js';

export interface YtDlpOptions {
  binary: string;
  audioFormat: string;
  audioQuality: string;
  playerClients: string;
  socketTimeoutSeconds: number;
  sleepRequestsSeconds: number;
  forceIpv4: boolean;
  geoBypass: boolean;
  timeoutMs: number;
}

const VideoInfoSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  duration: z.number().nullish(),
  webpage_url: z.string().nullish(),
});

const SearchResultSchema = z.object({
  entries: z.array(VideoInfoSchema.partial().nullable()).default([]),
});

/** Text of the `ERROR:` lines of a failed run, else its last stderr line. */
export function failureMessage(result: CommandResult): string {
  const lines = result.stderr
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  const errors = lines.filter((line) => line.startsWith('ERROR:'));
  if (errors.length > 0) return errors.join(' ');
  return lines[lines.length - 1] ?? `exited with code ${result.code}`;
}

/** Media lookup and audio download through the yt-dlp command line. */
export class YtDlpService implements RetrievalAdapter {
  constructor(
    private readonly options: YtDlpOptions,
    private readonly cookies: CookieSession,
    private readonly run: CommandRunner = runCommand
  ) {}

  private commonArgs(): string[] {
    const args = ['--socket-timeout', String(this.options.socketTimeoutSeconds), '--no-warnings'];
    if (this.options.forceIpv4) args.push('--force-ipv4');
    if (this.options.geoBypass) args.push('--geo-bypass');
    if (this.options.playerClients) {
      args.push('--extractor-args', `youtube:player_client=${this.options.playerClients}`);
    }
    return [...args, ...this.cookies.args()];
  }

  private async execute(args: string[]): Promise<string> {
    Logger.debug('Running yt-dlp', { args });
    const result = await this.run(this.options.binary, args, { timeoutMs: this.options.timeoutMs });
    if (result.code !== 0) {
      throw new RetrievalError(failureMessage(result), { exitCode: result.code });
    }
    return result.stdout;
  }

  async probe(url: string): Promise<MediaInfo | null> {
    const stdout = await this.execute([...this.commonArgs(), '--dump-single-json', '--skip-download', '--no-playlist', url]);
    if (!stdout.trim()) return null;

    const parsed = VideoInfoSchema.safeParse(JSON.parse(stdout));
    if (!parsed.success) return null;

    const info = parsed.data;
    return {
      id: info.id,
      url: info.webpage_url ?? url,
      title: info.title ?? 'Unknown',
      duration: info.duration ?? 0,
    };
  }

  async search(query: string, limit: number): Promise<MediaInfo[]> {
    const stdout = await this.execute([
      ...this.commonArgs(),
      '--flat-playlist',
      '--dump-single-json',
      '--sleep-requests',
      String(this.options.sleepRequestsSeconds),
      `ytsearch${limit}:${query}`,
    ]);

    const parsed = SearchResultSchema.parse(JSON.parse(stdout));
    const results: MediaInfo[] = [];
    for (const entry of parsed.entries) {
      if (!entry?.id) continue;
      results.push({
        id: entry.id,
        url: watchUrl(entry.id),
        title: entry.title ?? 'Unknown',
        duration: entry.duration ?? 0,
      });
    }
    return results;
  }

  async download(url: string, outputTemplate: string): Promise<void> {
    await this.execute([
      ...this.commonArgs(),
      '--format',
      'bestaudio/best',
      '--extract-audio',
      '--audio-format',
      this.options.audioFormat,
      '--audio-quality',
      this.options.audioQuality,
      '--output',
      outputTemplate,
      '--no-overwrites',
      '--no-playlist',
      '--no-embed-metadata',
      '--no-embed-thumbnail',
      '--retries',
      '10',
      '--fragment-retries',
      '10',
      '--sleep-interval',
      '1',
      '--max-sleep-interval',
      '3',
      url,
    ]);
  }
}
