export const DownloadFailure = {
  SignInRequired: 'sign_in_required',
  PrivateVideo: 'private_video',
  Unavailable: 'unavailable',
  AgeRestricted: 'age_restricted',
  CopyrightBlocked: 'copyright_blocked',
  AccessDenied: 'http_403_po_token_needed',
  RateLimited: 'rate_limited',
  DownloadError: 'download_error',
  DurationMismatch: 'duration_mismatch',
  NoInfo: 'no_info',
  Error: 'error',
  SearchDurationMismatch: 'search_duration_mismatch',
  NoSearchResults: 'no_search_results',
  NoValidMatch: 'no_valid_match',
  SearchError: 'search_error',
} as const;

export type DownloadFailure = (typeof DownloadFailure)[keyof typeof DownloadFailure];

/** Failures of a direct-URL attempt. */
export type UrlFailure = Exclude<
  DownloadFailure,
  | typeof DownloadFailure.SearchDurationMismatch
  | typeof DownloadFailure.NoSearchResults
  | typeof DownloadFailure.NoValidMatch
  | typeof DownloadFailure.SearchError
>;

export type SearchFailure =
  | typeof DownloadFailure.SearchDurationMismatch
  | typeof DownloadFailure.NoSearchResults
  | typeof DownloadFailure.NoValidMatch
  | typeof DownloadFailure.SearchError;

export type DownloadStatus =
  | 'downloaded'
  | 'already_exists'
  | 'search_downloaded'
  | `search_fallback_from_${UrlFailure}`
  | `${UrlFailure}_search_failed`
  | DownloadFailure;

/** Never retried: the media is gone or blocked whatever the session. */
export const PERMANENT_FAILURES: readonly string[] = [
  DownloadFailure.Unavailable,
  DownloadFailure.CopyrightBlocked,
];

/** Retried only once a signed-in cookie session is available. */
export const COOKIE_DEPENDENT_FAILURES: readonly string[] = [
  DownloadFailure.PrivateVideo,
  DownloadFailure.AgeRestricted,
  DownloadFailure.SignInRequired,
];

/** Direct-URL failures worth a second try through a title + artist search. */
export const SEARCHABLE_FAILURES: ReadonlySet<string> = new Set<string>([
  DownloadFailure.DurationMismatch,
  DownloadFailure.PrivateVideo,
  DownloadFailure.Unavailable,
  DownloadFailure.AccessDenied,
  DownloadFailure.DownloadError,
  DownloadFailure.CopyrightBlocked,
]);

/** Content-shaped failures; they say nothing about throttling. */
const NON_NETWORK_FAILURES: ReadonlySet<string> = new Set<string>([
  DownloadFailure.DurationMismatch,
  DownloadFailure.SearchDurationMismatch,
  DownloadFailure.PrivateVideo,
  DownloadFailure.Unavailable,
  DownloadFailure.AgeRestricted,
  DownloadFailure.CopyrightBlocked,
  DownloadFailure.NoSearchResults,
  DownloadFailure.NoValidMatch,
]);

/** Maps a downloader error message onto the failure taxonomy. First rule wins. */
export function classifyDownloadError(message: string): UrlFailure {
  const text = message.toLowerCase();

  if (text.includes('sign in')) return DownloadFailure.SignInRequired;
  if (text.includes('private')) return DownloadFailure.PrivateVideo;
  if (text.includes('unavailable') || text.includes('removed')) return DownloadFailure.Unavailable;
  // "age" alone would also hit words such as "webpage"
  if (/\bage\b|age[- ]restrict/.test(text)) return DownloadFailure.AgeRestricted;
  if (text.includes('copyright')) return DownloadFailure.CopyrightBlocked;
  if (text.includes('403') || text.includes('forbidden')) return DownloadFailure.AccessDenied;
  if (text.includes('429') || text.includes('too many')) return DownloadFailure.RateLimited;
  return DownloadFailure.DownloadError;
}

export function isSearchable(status: DownloadStatus): status is UrlFailure {
  return SEARCHABLE_FAILURES.has(status);
}

/** Whether a failure counts towards the consecutive-failure cooldown. */
export function countsTowardsCooldown(status: DownloadStatus): boolean {
  return !NON_NETWORK_FAILURES.has(status);
}
