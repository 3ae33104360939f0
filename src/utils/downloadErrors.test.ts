import { describe, it, expect } from 'vitest';
import {
  DownloadFailure,
  classifyDownloadError,
  countsTowardsCooldown,
  isSearchable,
} from './downloadErrors.js';

describe('classifyDownloadError', () => {
  it.each([
    ['ERROR: [youtube] abc: Sign in to confirm you are not a bot', DownloadFailure.SignInRequired],
    ['ERROR: [youtube] abc: Private video', DownloadFailure.PrivateVideo],
    ['ERROR: [youtube] abc: Video unavailable', DownloadFailure.Unavailable],
    ['ERROR: This video has been removed by the uploader', DownloadFailure.Unavailable],
    ['ERROR: This video may be inappropriate for some users. Age restricted', DownloadFailure.AgeRestricted],
    ['ERROR: blocked on copyright grounds', DownloadFailure.CopyrightBlocked],
    ['ERROR: unable to download video data: HTTP Error 403: Forbidden', DownloadFailure.AccessDenied],
    ['ERROR: HTTP Error 429: Too Many Requests', DownloadFailure.RateLimited],
    ['ERROR: Postprocessing: audio conversion failed', DownloadFailure.DownloadError],
  ])('classifies %s', (message, expected) => {
    expect(classifyDownloadError(message)).toBe(expected);
  });

  it('applies the first matching rule', () => {
    expect(classifyDownloadError('Private video. Sign in if you have been granted access')).toBe(
      DownloadFailure.SignInRequired
    );
  });

  it('does not read "age" inside other words', () => {
    expect(classifyDownloadError('Unable to extract webpage data')).toBe(DownloadFailure.DownloadError);
  });
});

describe('failure groups', () => {
  it('sends blocked or mismatched URLs to the search fallback', () => {
    expect(isSearchable(DownloadFailure.DurationMismatch)).toBe(true);
    expect(isSearchable(DownloadFailure.CopyrightBlocked)).toBe(true);
    expect(isSearchable(DownloadFailure.AccessDenied)).toBe(true);
    expect(isSearchable(DownloadFailure.RateLimited)).toBe(false);
    expect(isSearchable(DownloadFailure.SignInRequired)).toBe(false);
    expect(isSearchable(DownloadFailure.NoInfo)).toBe(false);
  });

  it('only counts network-shaped failures towards the cooldown', () => {
    expect(countsTowardsCooldown(DownloadFailure.RateLimited)).toBe(true);
    expect(countsTowardsCooldown(DownloadFailure.AccessDenied)).toBe(true);
    expect(countsTowardsCooldown(DownloadFailure.DownloadError)).toBe(true);
    expect(countsTowardsCooldown(DownloadFailure.DurationMismatch)).toBe(false);
    expect(countsTowardsCooldown(DownloadFailure.NoSearchResults)).toBe(false);
    expect(countsTowardsCooldown(DownloadFailure.Unavailable)).toBe(false);
  });
});
