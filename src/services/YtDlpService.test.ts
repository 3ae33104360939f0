import { describe, it, expect } from 'vitest';
import { YtDlpService, failureMessage, type YtDlpOptions } from './YtDlpService.js';
import { CookieSession } from './CookieSession.js';
import { RetrievalError } from '../types/errors.js';
import type { CommandResult, RunCommandOptions } from '../utils/process.js';

const OPTIONS: YtDlpOptions = {
  binary: 'yt-dlp',
  audioFormat: 'mp3',
  audioQuality: '0',
  playerClients: 'web',
  socketTimeoutSeconds: 30,
  sleepRequestsSeconds: 1.5,
  forceIpv4: true,
  geoBypass: false,
  timeoutMs: 60000,
};

const COMMON_ARGS = ['--socket-timeout', '30', '--no-warnings', '--force-ipv4', '--extractor-args', 'youtube:player_client=web'];

function fakeRunner(result: Partial<CommandResult>) {
  const calls: Array<{ binary: string; args: readonly string[] }> = [];
  const run = async (binary: string, args: readonly string[], _options: RunCommandOptions): Promise<CommandResult> => {
    calls.push({ binary, args });
    return { code: 0, stdout: '', stderr: '', ...result };
  };
  return { calls, run };
}

function service(result: Partial<CommandResult>) {
  const runner = fakeRunner(result);
  const cookies = CookieSession.disabled({ cacheDir: 'cookies', ytDlpPath: 'yt-dlp', timeoutMs: 1000 });
  return { calls: runner.calls, ytDlp: new YtDlpService(OPTIONS, cookies, runner.run) };
}

describe('failureMessage', () => {
  it('joins the ERROR lines', () => {
    expect(
      failureMessage({ code: 1, stdout: '', stderr: 'WARNING: slow\nERROR: [youtube] x: Private video\nERROR: second\n' })
    ).toBe('ERROR: [youtube] x: Private video ERROR: second');
  });

  it('falls back to the last line, then the exit code', () => {
    expect(failureMessage({ code: 1, stdout: '', stderr: 'first\nlast line\n' })).toBe('last line');
    expect(failureMessage({ code: 2, stdout: '', stderr: '' })).toBe('exited with code 2');
  });
});

describe('YtDlpService', () => {
  it('probes a URL for its metadata', async () => {
    const { calls, ytDlp } = service({
      stdout: JSON.stringify({ id: 'aaaaaaaaaaa', title: 'So What', duration: 562, webpage_url: 'https://www.youtube.com/watch?v=aaaaaaaaaaa' }),
    });

    const info = await ytDlp.probe('https://youtu.be/aaaaaaaaaaa');

    expect(info).toEqual({ id: 'aaaaaaaaaaa', url: 'https://www.youtube.com/watch?v=aaaaaaaaaaa', title: 'So What', duration: 562 });
    expect(calls[0].binary).toBe('yt-dlp');
    expect(calls[0].args).toEqual([
      ...COMMON_ARGS,
      '--dump-single-json',
      '--skip-download',
      '--no-playlist',
      'https://youtu.be/aaaaaaaaaaa',
    ]);
  });

  it('returns null when the probe prints nothing', async () => {
    const { ytDlp } = service({ stdout: '  \n' });
    await expect(ytDlp.probe('https://youtu.be/aaaaaaaaaaa')).resolves.toBeNull();
  });

  it('raises the downloader error text on a failed run', async () => {
    const { ytDlp } = service({ code: 1, stderr: 'ERROR: [youtube] aaaaaaaaaaa: Video unavailable\n' });

    const failure = ytDlp.probe('https://youtu.be/aaaaaaaaaaa');
    await expect(failure).rejects.toThrow(RetrievalError);
    await expect(failure).rejects.toThrow('ERROR: [youtube] aaaaaaaaaaa: Video unavailable');
  });

  it('maps search entries to watch URLs', async () => {
    const { calls, ytDlp } = service({
      stdout: JSON.stringify({
        entries: [{ id: 'bbbbbbbbbbb', title: 'So What', duration: 545 }, null, { title: 'no id' }, { id: 'ccccccccccc' }],
      }),
    });

    const results = await ytDlp.search('Miles Davis So What', 3);

    expect(results).toEqual([
      { id: 'bbbbbbbbbbb', url: 'https://www.youtube.com/watch?v=bbbbbbbbbbb', title: 'So What', duration: 545 },
      { id: 'ccccccccccc', url: 'https://www.youtube.com/watch?v=ccccccccccc', title: 'Unknown', duration: 0 },
    ]);
    expect(calls[0].args.slice(-5)).toEqual([
      '--flat-playlist',
      '--dump-single-json',
      '--sleep-requests',
      '1.5',
      'ytsearch3:Miles Davis So What',
    ]);
  });

  it('extracts audio to the output template', async () => {
    const { calls, ytDlp } = service({});

    await ytDlp.download('https://www.youtube.com/watch?v=aaaaaaaaaaa', 'downloads/Miles Davis/Kind of Blue/So What.%(ext)s');

    const args = calls[0].args;
    expect(args.slice(0, COMMON_ARGS.length)).toEqual(COMMON_ARGS);
    expect(args).toContain('--extract-audio');
    expect(args[args.indexOf('--audio-format') + 1]).toBe('mp3');
    expect(args[args.indexOf('--output') + 1]).toBe('downloads/Miles Davis/Kind of Blue/So What.%(ext)s');
    expect(args[args.length - 1]).toBe('https://www.youtube.com/watch?v=aaaaaaaaaaa');
  });
});
