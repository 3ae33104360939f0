import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LedgerStore } from './LedgerStore.js';
import { MemoryFileSystem, ledgerOf, track } from './test-utils.js';
import { LedgerError, ValidationError } from '../types/errors.js';
import { ResolutionStatus, UrlOrigin } from '../types/index.js';

const EXPORT_CSV = [
  'track_uri,track_name,artist_name(s),album_name,isrc,track_duration(ms),album_release_date',
  'spotify:track:1,So What,"Miles Davis, Bill Evans",Kind of Blue,USSM15900113,562000,1959-08-17',
  'spotify:track:2,Naima,John Coltrane,Giant Steps,,,1960',
  '',
].join('\n');

describe('LedgerStore.parse', () => {
  const store = new LedgerStore(new MemoryFileSystem());

  it('reads typed fields and keeps unknown columns', () => {
    const ledger = store.parse(EXPORT_CSV);

    expect(ledger.rows).toHaveLength(2);
    expect(ledger.rows[0]).toMatchObject({
      trackUri: 'spotify:track:1',
      trackName: 'So What',
      artistNames: 'Miles Davis, Bill Evans',
      albumName: 'Kind of Blue',
      isrc: 'USSM15900113',
      durationMs: 562000,
      status: ResolutionStatus.Pending,
      ytUrl: '',
      extra: { album_release_date: '1959-08-17' },
    });
    expect(ledger.rows[1].durationMs).toBe(0);
    expect(ledger.rows[1].isrc).toBe('');
  });

  it('appends missing ledger columns after the existing ones', () => {
    const { columns } = store.parse(EXPORT_CSV);

    expect(columns.slice(0, 7)).toEqual([
      'track_uri',
      'track_name',
      'artist_name(s)',
      'album_name',
      'isrc',
      'track_duration(ms)',
      'album_release_date',
    ]);
    expect(columns.slice(7)).toEqual([
      'album_artist_name(s)',
      'yt_url',
      'status',
      'yt_url_origin',
      'downloaded',
      'download_status',
      'download_date',
      'actual_duration',
      'searched_url',
      'metadata_embedded',
    ]);
  });

  it('rejects files without the identity columns', () => {
    expect(() => store.parse('isrc,track_name\nX,Y\n')).toThrow(ValidationError);
    expect(() => store.parse('isrc,track_name\nX,Y\n')).toThrow('missing required columns: track_uri');
  });

  it('rejects an empty file', () => {
    expect(() => store.parse('', 'empty.csv')).toThrow('empty.csv has no header row');
  });

  it('rejects unknown status values with their line number', () => {
    const csv = 'track_uri,track_name,status\nspotify:track:1,A,done\nspotify:track:2,B,maybe\n';
    expect(() => store.parse(csv, 'bad.csv')).toThrow("Unknown status 'maybe' on row 3 of bad.csv");
  });

  it('rejects a track_uri that appears twice, naming both rows', () => {
    const csv = 'track_uri,track_name\nspotify:track:1,A\nspotify:track:2,B\nspotify:track:1,C\n';
    expect(() => store.parse(csv, 'dupes.csv')).toThrow(ValidationError);
    expect(() => store.parse(csv, 'dupes.csv')).toThrow("Duplicate track_uri 'spotify:track:1' on rows 2 and 4 of dupes.csv");
  });

  it('rejects rows without a track_uri', () => {
    const csv = 'track_uri,track_name\nspotify:track:1,A\n,B\n';
    expect(() => store.parse(csv, 'blank.csv')).toThrow('Empty track_uri on row 3 of blank.csv');
  });

  it('rejects unknown URL origins', () => {
    const csv = 'track_uri,track_name,yt_url_origin\nspotify:track:1,A,myspace\n';
    expect(() => store.parse(csv)).toThrow(ValidationError);
  });

  it('normalises download flags', () => {
    const csv = 'track_uri,track_name,downloaded,metadata_embedded\nspotify:track:1,A,YES,Failed\nspotify:track:2,B,maybe,x\n';
    const { rows } = store.parse(csv);
    expect(rows[0].downloaded).toBe('yes');
    expect(rows[0].metadataEmbedded).toBe('failed');
    expect(rows[1].downloaded).toBe('');
    expect(rows[1].metadataEmbedded).toBe('');
  });
});

describe('LedgerStore.serialize', () => {
  it('writes the header in column order and round-trips values', () => {
    const store = new LedgerStore(new MemoryFileSystem());
    const ledger = store.parse(EXPORT_CSV);
    ledger.rows[0].ytUrl = 'https://www.youtube.com/watch?v=abcdefghijk';
    ledger.rows[0].status = ResolutionStatus.Done;
    ledger.rows[0].ytUrlOrigin = UrlOrigin.Songstats;

    const serialized = store.serialize(ledger);
    expect(serialized.split('\n')[0]).toBe(ledger.columns.join(','));

    const reparsed = store.parse(serialized);
    expect(reparsed.columns).toEqual(ledger.columns);
    expect(reparsed.rows).toEqual(ledger.rows);
  });
});

describe('LedgerStore persistence', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('saves through a temp file and leaves none behind', async () => {
    const store = new LedgerStore();
    const path = join(dir, 'nested', 'ledger.csv');
    const ledger = ledgerOf([track('spotify:track:1', { trackName: 'So What', isrc: 'USSM15900113' })]);

    expect(await store.save(ledger, path)).toBe(true);
    expect(await readdir(join(dir, 'nested'))).toEqual(['ledger.csv']);

    const loaded = await store.loadFile(path);
    expect(loaded.rows[0].trackName).toBe('So What');
    expect(loaded.rows[0].isrc).toBe('USSM15900113');
  });

  it('loads the primary ledger when present, else the fallback', async () => {
    const store = new LedgerStore();
    const exportPath = join(dir, 'export.csv');
    const outputPath = join(dir, 'output.csv');
    await writeFile(exportPath, EXPORT_CSV, 'utf8');

    const first = await store.load(outputPath, exportPath);
    expect(first.path).toBe(exportPath);

    first.ledger.rows[1].status = ResolutionStatus.NoLookupKey;
    await store.save(first.ledger, outputPath);

    const second = await store.load(outputPath, exportPath);
    expect(second.path).toBe(outputPath);
    expect(second.ledger.rows[1].status).toBe(ResolutionStatus.NoLookupKey);
    expect(await readFile(exportPath, 'utf8')).toBe(EXPORT_CSV);
  });

  it('reports unreadable files as ledger errors', async () => {
    await expect(new LedgerStore().loadFile(join(dir, 'missing.csv'))).rejects.toThrow(LedgerError);
  });
});

describe('LedgerStore atomicity', () => {
  it('keeps the previous file and removes the temp file when the rename fails', async () => {
    const fs = new MemoryFileSystem();
    const store = new LedgerStore(fs);
    fs.files.set('out.csv', 'track_uri,track_name\nspotify:track:0,Old\n');
    fs.failRename = true;

    const saved = await store.save(ledgerOf([track('spotify:track:1')]), 'out.csv');

    expect(saved).toBe(false);
    expect(fs.files.get('out.csv')).toBe('track_uri,track_name\nspotify:track:0,Old\n');
    expect(fs.files.has('out.csv.tmp')).toBe(false);
  });
});
