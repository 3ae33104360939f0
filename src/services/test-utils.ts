import { dirname } from 'path';
import { emptyRecord, type LedgerFileSystem } from './LedgerStore.js';
import { TRACK_COLUMNS, type Ledger, type TrackRecord } from '../types/index.js';

/** In-memory ledger storage for workflow tests. */
export class MemoryFileSystem implements LedgerFileSystem {
  readonly files = new Map<string, string>();
  readonly directories = new Set<string>();
  failRename = false;
  writes = 0;

  async readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file, open '${path}'`);
    }
    return content;
  }

  async writeFile(path: string, data: string): Promise<void> {
    this.writes++;
    this.files.set(path, data);
  }

  async rename(from: string, to: string): Promise<void> {
    if (this.failRename) {
      throw new Error('EXDEV: cross-device link not permitted');
    }
    const content = await this.readFile(from);
    this.files.delete(from);
    this.files.set(to, content);
  }

  async remove(path: string): Promise<void> {
    this.files.delete(path);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async ensureDir(path: string): Promise<void> {
    this.directories.add(path);
    this.directories.add(dirname(path));
  }
}

export function track(trackUri: string, overrides: Partial<TrackRecord> = {}): TrackRecord {
  return { ...emptyRecord(trackUri, overrides.trackName ?? `Track ${trackUri}`), ...overrides };
}

export function ledgerOf(rows: TrackRecord[]): Ledger {
  return { columns: TRACK_COLUMNS.map(([, header]) => header), rows };
}

/** Sleeper that records its waits instead of sleeping. */
export function recordingSleeper(): { waits: number[]; sleeper: (ms: number) => Promise<void> } {
  const waits: number[] = [];
  return {
    waits,
    sleeper: async (ms: number) => {
      waits.push(ms);
    },
  };
}

export function fakeClock(start = 1_700_000_000_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}
