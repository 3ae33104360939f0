import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { CookieSession } from './CookieSession.js';
import type { CommandResult, RunCommandOptions } from '../utils/process.js';

describe('CookieSession', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cookies-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function extractor(writesJar: boolean) {
    const calls: Array<readonly string[]> = [];
    const run = async (_binary: string, args: readonly string[], _options: RunCommandOptions): Promise<CommandResult> => {
      calls.push(args);
      if (writesJar) {
        await writeFile(args[args.indexOf('--cookies') + 1], '# Netscape HTTP Cookie File\n.youtube.com\tTRUE\t/\tTRUE\t0\tPREF\tx\n');
      }
      return { code: 0, stdout: '', stderr: '' };
    };
    return { calls, run };
  }

  it('passes no cookies when disabled', async () => {
    const session = CookieSession.disabled({ cacheDir: dir, ytDlpPath: 'yt-dlp', timeoutMs: 1000 });
    await session.prepare();

    expect(session.isAuthenticated).toBe(false);
    expect(session.args()).toEqual([]);
  });

  it('caches browser cookies in a file once', async () => {
    const cacheDir = join(dir, 'cache');
    const { calls, run } = extractor(true);
    const session = new CookieSession({ browser: 'firefox', cacheDir, ytDlpPath: 'yt-dlp', timeoutMs: 1000 }, run);

    await session.prepare();

    expect(calls).toHaveLength(1);
    expect(calls[0].slice(0, 2)).toEqual(['--cookies-from-browser', 'firefox']);
    const [flag, path] = session.args();
    expect(flag).toBe('--cookies');
    expect(dirname(path)).toBe(cacheDir);
    expect(path).toMatch(/session_cookies_\d{8}_\d{6}\.txt$/);
    expect(session.isAuthenticated).toBe(true);
  });

  it('uses an exported cookie file when the browser extraction yields nothing', async () => {
    const cookiesFile = join(dir, 'cookies.txt');
    await writeFile(cookiesFile, '# Netscape HTTP Cookie File\n');
    const session = new CookieSession(
      { browser: 'chrome', cookiesFile, cacheDir: join(dir, 'cache'), ytDlpPath: 'yt-dlp', timeoutMs: 1000 },
      extractor(false).run
    );

    await session.prepare();

    expect(session.args()).toEqual(['--cookies', cookiesFile]);
  });

  it('lets yt-dlp read the browser directly as a last resort', async () => {
    const session = new CookieSession(
      { browser: 'chrome', cookiesFile: join(dir, 'absent.txt'), cacheDir: join(dir, 'cache'), ytDlpPath: 'yt-dlp', timeoutMs: 1000 },
      extractor(false).run
    );

    await session.prepare();

    expect(session.args()).toEqual(['--cookies-from-browser', 'chrome']);
    expect(session.isAuthenticated).toBe(true);
  });

  it('re-extracts browser cookies on refresh', async () => {
    const { calls, run } = extractor(true);
    const session = new CookieSession({ browser: 'firefox', cacheDir: join(dir, 'cache'), ytDlpPath: 'yt-dlp', timeoutMs: 1000 }, run);
    await session.prepare();

    await session.refresh();

    expect(calls).toHaveLength(2);
    expect(session.args()[0]).toBe('--cookies');
  });

  it('keeps the exported file when a refresh yields nothing', async () => {
    const cookiesFile = join(dir, 'cookies.txt');
    await writeFile(cookiesFile, '# Netscape HTTP Cookie File\n');
    const { calls, run } = extractor(false);
    const session = new CookieSession(
      { browser: 'chrome', cookiesFile, cacheDir: join(dir, 'cache'), ytDlpPath: 'yt-dlp', timeoutMs: 1000 },
      run
    );
    await session.prepare();

    await session.refresh();

    expect(calls).toHaveLength(2);
    expect(session.args()).toEqual(['--cookies', cookiesFile]);
  });

  it('does nothing on refresh without a browser', async () => {
    const { calls, run } = extractor(true);
    const session = new CookieSession({ cacheDir: join(dir, 'cache'), ytDlpPath: 'yt-dlp', timeoutMs: 1000 }, run);
    await session.prepare();

    await session.refresh();

    expect(calls).toHaveLength(0);
    expect(session.args()).toEqual([]);
  });
});
