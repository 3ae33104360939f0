export interface CatalogCandidate {
  label: string;
  url: string;
}

/** Resolves a recording identifier to a media URL through a rendered page. */
export interface LookupAdapter {
  lookup(isrc: string): Promise<string | null>;
  close(): Promise<void>;
}

/** Returns every linked video of the album that best matches artist + title. */
export interface CatalogAdapter {
  searchAlbum(artist: string, album: string): Promise<CatalogCandidate[]>;
}

export interface MediaInfo {
  id: string;
  url: string;
  title: string;
  /** Seconds; 0 when unknown. */
  duration: number;
}

export interface RetrievalAdapter {
  probe(url: string): Promise<MediaInfo | null>;
  search(query: string, limit: number): Promise<MediaInfo[]>;
  download(url: string, outputTemplate: string): Promise<void>;
}

export interface TagMetadata {
  title: string;
  artist: string;
  albumArtist: string;
  album: string;
  year: string;
  trackNumber: string;
  discNumber: string;
  genre: string;
  isrc: string;
  label: string;
  copyright: string;
  albumArtUrl: string;
}

export interface TagWriter {
  embed(filePath: string, metadata: TagMetadata): Promise<boolean>;
}

export interface DurationReader {
  /** Seconds; 0 when the file carries no duration. */
  read(filePath: string): Promise<number>;
}

/** Credentials passed along with retrieval requests. */
export interface CredentialSession {
  readonly isAuthenticated: boolean;
  /** Re-acquires the credentials, e.g. after the remote side started refusing requests. */
  refresh(): Promise<void>;
}
