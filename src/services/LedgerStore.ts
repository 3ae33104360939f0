import { readFile, writeFile, rename, rm, mkdir, access } from 'fs/promises';
import { dirname } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { Logger, errorText } from '../utils/logger.js';
import { parseDurationMs } from '../utils/duration.js';
import { LedgerError, ValidationError } from '../types/errors.js';
import {
  RESOLUTION_STATUSES,
  TRACK_COLUMNS,
  URL_ORIGINS,
  type DownloadedFlag,
  type Ledger,
  type MetadataOutcome,
  type TrackField,
  type TrackRecord,
} from '../types/index.js';

/** File operations the store needs; swapped in tests to simulate failures. */
export interface LedgerFileSystem {
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  ensureDir(path: string): Promise<void>;
}

export const nodeFileSystem: LedgerFileSystem = {
  readFile: (path) => readFile(path, 'utf8'),
  writeFile: (path, data) => writeFile(path, data, 'utf8'),
  rename: (from, to) => rename(from, to),
  remove: (path) => rm(path, { force: true }),
  exists: async (path) => {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  },
  ensureDir: async (path) => {
    await mkdir(path, { recursive: true });
  },
};

export interface LoadedLedger {
  ledger: Ledger;
  /** File the ledger was actually read from. */
  path: string;
}

const REQUIRED_HEADERS = ['track_uri', 'track_name'];

const HEADER_BY_FIELD = new Map<TrackField, string>(TRACK_COLUMNS.map(([field, header]) => [field, header]));
const TYPED_HEADERS: ReadonlySet<string> = new Set(TRACK_COLUMNS.map(([, header]) => header));

export function emptyRecord(trackUri: string, trackName: string): TrackRecord {
  return {
    trackUri,
    isrc: '',
    trackName,
    artistNames: '',
    albumName: '',
    albumArtistNames: '',
    durationMs: 0,
    ytUrl: '',
    status: '',
    ytUrlOrigin: '',
    downloaded: '',
    downloadStatus: '',
    downloadDate: '',
    actualDuration: '',
    searchedUrl: '',
    metadataEmbedded: '',
    extra: {},
  };
}

function toDownloadedFlag(value: string): DownloadedFlag {
  const normalized = value.trim().toLowerCase();
  return normalized === 'yes' || normalized === 'no' ? normalized : '';
}

function toMetadataOutcome(value: string): MetadataOutcome {
  const normalized = value.trim().toLowerCase();
  return normalized === 'yes' || normalized === 'failed' ? normalized : '';
}

function fieldValue(record: TrackRecord, field: TrackField): string {
  if (field === 'durationMs') {
    return record.durationMs > 0 ? String(Math.round(record.durationMs)) : '';
  }
  return record[field];
}

/**
 * Flat-file persistence of a ledger. Saves replace the file atomically via a
 * sibling temp file, so an interrupted write never leaves a partial CSV.
 */
export class LedgerStore {
  constructor(private readonly fs: LedgerFileSystem = nodeFileSystem) {}

  /** Reads `primaryPath` when it exists, else `fallbackPath`. */
  async load(primaryPath: string, fallbackPath: string): Promise<LoadedLedger> {
    const path = (await this.fs.exists(primaryPath)) ? primaryPath : fallbackPath;
    if (path !== primaryPath) {
      Logger.info(`No ledger at ${primaryPath}, starting from ${fallbackPath}`);
    }
    return { ledger: await this.loadFile(path), path };
  }

  async loadFile(path: string): Promise<Ledger> {
    let content: string;
    try {
      content = await this.fs.readFile(path);
    } catch (error) {
      throw new LedgerError(`Cannot read ${path}`, { path, error: errorText(error) });
    }

    const ledger = this.parse(content, path);
    Logger.debug(`Loaded ${ledger.rows.length} rows from ${path}`);
    return ledger;
  }

  parse(content: string, source = '<memory>'): Ledger {
    const table: string[][] = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });

    if (table.length === 0) {
      throw new ValidationError(`${source} has no header row`, { source });
    }

    const [header, ...body] = table;
    const columns = header.map((cell) => cell.trim());
    const missing = REQUIRED_HEADERS.filter((name) => !columns.includes(name));
    if (missing.length > 0) {
      throw new ValidationError(`${source} is missing required columns: ${missing.join(', ')}`, {
        source,
        missing,
      });
    }

    for (const [, name] of TRACK_COLUMNS) {
      if (!columns.includes(name)) columns.push(name);
    }

    const rows = body.map((cells, index) => this.toRecord(columns, cells, index + 2, source));
    this.assertUniqueIdentities(rows, source);
    return { columns, rows };
  }

  /** `track_uri` is the join key of a merge, so it must be present and unique. */
  private assertUniqueIdentities(rows: readonly TrackRecord[], source: string): void {
    const seen = new Map<string, number>();
    rows.forEach((record, index) => {
      const line = index + 2;
      const uri = record.trackUri.trim();
      if (!uri) {
        throw new ValidationError(`Empty track_uri on row ${line} of ${source}`, { source, line });
      }
      const first = seen.get(uri);
      if (first !== undefined) {
        throw new ValidationError(`Duplicate track_uri '${uri}' on rows ${first} and ${line} of ${source}`, {
          source,
          lines: [first, line],
        });
      }
      seen.set(uri, line);
    });
  }

  private toRecord(columns: string[], cells: string[], line: number, source: string): TrackRecord {
    const raw = new Map<string, string>();
    columns.forEach((name, index) => raw.set(name, cells[index] ?? ''));
    const cell = (field: TrackField): string => raw.get(HEADER_BY_FIELD.get(field) ?? '') ?? '';

    const statusText = cell('status').trim();
    const status = RESOLUTION_STATUSES.find((candidate) => candidate === statusText);
    if (status === undefined) {
      throw new ValidationError(`Unknown status '${statusText}' on row ${line} of ${source}`, {
        source,
        line,
      });
    }

    const originText = cell('ytUrlOrigin').trim();
    const origin = URL_ORIGINS.find((candidate) => candidate === originText);
    if (originText !== '' && origin === undefined) {
      throw new ValidationError(`Unknown URL origin '${originText}' on row ${line} of ${source}`, {
        source,
        line,
      });
    }

    const extra: Record<string, string> = {};
    for (const [name, value] of raw) {
      if (!TYPED_HEADERS.has(name)) extra[name] = value;
    }

    return {
      trackUri: cell('trackUri'),
      isrc: cell('isrc').trim(),
      trackName: cell('trackName'),
      artistNames: cell('artistNames'),
      albumName: cell('albumName'),
      albumArtistNames: cell('albumArtistNames'),
      durationMs: parseDurationMs(cell('durationMs')),
      ytUrl: cell('ytUrl').trim(),
      status,
      ytUrlOrigin: origin ?? '',
      downloaded: toDownloadedFlag(cell('downloaded')),
      downloadStatus: cell('downloadStatus'),
      downloadDate: cell('downloadDate'),
      actualDuration: cell('actualDuration'),
      searchedUrl: cell('searchedUrl'),
      metadataEmbedded: toMetadataOutcome(cell('metadataEmbedded')),
      extra,
    };
  }

  serialize(ledger: Ledger): string {
    const fieldByHeader = new Map<string, TrackField>(TRACK_COLUMNS.map(([field, header]) => [header, field]));
    const body = ledger.rows.map((record) =>
      ledger.columns.map((name) => {
        const field = fieldByHeader.get(name);
        return field ? fieldValue(record, field) : (record.extra[name] ?? '');
      })
    );
    return stringify([ledger.columns, ...body]);
  }

  /**
   * Writes the ledger to `<path>.tmp` and renames it over `path`. On failure
   * the temp file is removed, the previous file is left as it was and false
   * is returned.
   */
  async save(ledger: Ledger, path: string): Promise<boolean> {
    const tempPath = `${path}.tmp`;
    try {
      await this.fs.ensureDir(dirname(path));
      await this.fs.writeFile(tempPath, this.serialize(ledger));
      await this.fs.rename(tempPath, path);
      return true;
    } catch (error) {
      Logger.warn(`Could not save ledger to ${path}`, { error: errorText(error) });
      try {
        await this.fs.remove(tempPath);
      } catch (cleanupError) {
        Logger.debug('Could not remove temp ledger file', { tempPath, error: errorText(cleanupError) });
      }
      return false;
    }
  }
}
