import { access, mkdir, readFile } from 'fs/promises';
import { join } from 'path';
import dayjs from 'dayjs';
import { Logger, errorText } from '../utils/logger.js';
import { runCommand } from '../utils/process.js';
import type { CredentialSession } from '../types/index.js';

export type CommandRunner = typeof runCommand;

export interface CookieSessionOptions {
  /** Browser to extract cookies from, e.g. `chrome` or `firefox`. */
  browser?: string;
  /** Netscape cookie file exported beforehand. */
  cookiesFile?: string;
  cacheDir: string;
  ytDlpPath: string;
  timeoutMs: number;
}

type CookieSource = { kind: 'cache'; path: string } | { kind: 'file'; path: string } | { kind: 'browser'; browser: string } | { kind: 'none' };

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Cookie state of one retrieval run. Browser cookies are extracted once into
 * a cache file and that file is reused by every yt-dlp call until `refresh()`.
 */
export class CookieSession implements CredentialSession {
  private source: CookieSource = { kind: 'none' };

  constructor(
    private readonly options: CookieSessionOptions,
    private readonly run: CommandRunner = runCommand
  ) {}

  /** A session with no cookies at all. */
  static disabled(options: Omit<CookieSessionOptions, 'browser' | 'cookiesFile'>): CookieSession {
    return new CookieSession({ ...options, browser: undefined, cookiesFile: undefined });
  }

  get isAuthenticated(): boolean {
    return this.source.kind !== 'none';
  }

  async prepare(): Promise<void> {
    this.source = await this.resolveSource();
    Logger.info(`🍪 Cookies: ${this.describe()}`);
  }

  /** Extracts fresh browser cookies; keeps the current source when that fails. */
  async refresh(): Promise<void> {
    if (!this.options.browser) return;

    const cached = await this.extractFromBrowser();
    if (cached) {
      this.source = { kind: 'cache', path: cached };
      Logger.info(`🍪 Cookies refreshed: ${this.describe()}`);
    }
  }

  args(): string[] {
    switch (this.source.kind) {
      case 'cache':
      case 'file':
        return ['--cookies', this.source.path];
      case 'browser':
        return ['--cookies-from-browser', this.source.browser];
      case 'none':
        return [];
    }
  }

  describe(): string {
    switch (this.source.kind) {
      case 'cache':
        return `cached from ${this.options.browser ?? 'browser'} (${this.source.path})`;
      case 'file':
        return `from file (${this.source.path})`;
      case 'browser':
        return `from browser ${this.source.browser}, extracted on every call`;
      case 'none':
        return 'not configured, age-restricted and private videos will fail';
    }
  }

  private async resolveSource(): Promise<CookieSource> {
    const cached = await this.extractFromBrowser();
    if (cached) return { kind: 'cache', path: cached };

    if (this.options.cookiesFile && (await fileExists(this.options.cookiesFile))) {
      return { kind: 'file', path: this.options.cookiesFile };
    }
    if (this.options.cookiesFile) {
      Logger.warn(`Cookies file not found: ${this.options.cookiesFile}`);
    }

    if (this.options.browser) {
      return { kind: 'browser', browser: this.options.browser };
    }
    return { kind: 'none' };
  }

  private async extractFromBrowser(): Promise<string | null> {
    const browser = this.options.browser;
    if (!browser) return null;

    const path = join(this.options.cacheDir, `session_cookies_${dayjs().format('YYYYMMDD_HHmmss')}.txt`);
    try {
      await mkdir(this.options.cacheDir, { recursive: true });
      Logger.info(`🍪 Extracting cookies from ${browser}...`);
      // yt-dlp writes the cookie jar on exit whether or not the listing succeeds.
      await this.run(
        this.options.ytDlpPath,
        [
          '--cookies-from-browser',
          browser,
          '--cookies',
          path,
          '--skip-download',
          '--flat-playlist',
          '--playlist-items',
          '1',
          '--quiet',
          'https://www.youtube.com/feed/trending',
        ],
        { timeoutMs: this.options.timeoutMs }
      );

      if (!(await fileExists(path))) {
        Logger.warn('Cookie extraction produced no file');
        return null;
      }

      const content = await readFile(path, 'utf8');
      const count = content.split('\n').filter((line) => line.trim() && !line.startsWith('#')).length;
      Logger.info(`🍪 Cached ${count} cookies`);
      return path;
    } catch (error) {
      Logger.warn('Cookie extraction failed', { browser, error: errorText(error) });
      return null;
    }
  }
}
