export const ResolutionStatus = {
  Pending: '',
  Done: 'done',
  NoCandidate: 'no_yt',
  NoLookupKey: 'no_isrc',
  Error: 'error',
} as const;

export type ResolutionStatus = (typeof ResolutionStatus)[keyof typeof ResolutionStatus];

export const RESOLUTION_STATUSES: readonly ResolutionStatus[] = Object.values(ResolutionStatus);

export const UrlOrigin = {
  Songstats: 'songstats',
  Discogs: 'discogs',
  DiscogsFallback: 'discogs_fallback',
  SecondaryFallback: 'secondary_fallback',
  YouTubeSearch: 'yt_search',
  YouTubeSearchFallback: 'yt_search_fallback',
} as const;

export type UrlOrigin = (typeof UrlOrigin)[keyof typeof UrlOrigin];

export const URL_ORIGINS: readonly UrlOrigin[] = Object.values(UrlOrigin);

export type FallbackOrigin = typeof UrlOrigin.SecondaryFallback | typeof UrlOrigin.DiscogsFallback;

export type DownloadedFlag = '' | 'yes' | 'no';

export type MetadataOutcome = '' | 'yes' | 'failed';

export interface TrackRecord {
  trackUri: string;
  isrc: string;
  trackName: string;
  artistNames: string;
  albumName: string;
  albumArtistNames: string;
  durationMs: number;

  ytUrl: string;
  status: ResolutionStatus;
  ytUrlOrigin: UrlOrigin | '';

  downloaded: DownloadedFlag;
  downloadStatus: string;
  downloadDate: string;
  actualDuration: string;
  searchedUrl: string;
  metadataEmbedded: MetadataOutcome;

  /** Columns the core does not interpret, keyed by CSV header. */
  extra: Record<string, string>;
}

export type TrackField = Exclude<keyof TrackRecord, 'extra'>;

/** CSV header for every typed field, in canonical column order. */
export const TRACK_COLUMNS: ReadonlyArray<readonly [TrackField, string]> = [
  ['trackUri', 'track_uri'],
  ['trackName', 'track_name'],
  ['artistNames', 'artist_name(s)'],
  ['albumName', 'album_name'],
  ['albumArtistNames', 'album_artist_name(s)'],
  ['durationMs', 'track_duration(ms)'],
  ['isrc', 'isrc'],
  ['ytUrl', 'yt_url'],
  ['status', 'status'],
  ['ytUrlOrigin', 'yt_url_origin'],
  ['downloaded', 'downloaded'],
  ['downloadStatus', 'download_status'],
  ['downloadDate', 'download_date'],
  ['actualDuration', 'actual_duration'],
  ['searchedUrl', 'searched_url'],
  ['metadataEmbedded', 'metadata_embedded'],
];

export interface Ledger {
  /** Header row, in file order. */
  columns: string[];
  rows: TrackRecord[];
}

export interface AlbumGroup {
  albumName: string;
  albumArtistNames: string;
  /** Row indexes into the ledger, in ledger order. */
  rowIndexes: number[];
}
