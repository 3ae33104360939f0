import { access, rename, rm, writeFile } from 'fs/promises';
import { extname } from 'path';
import axios, { type AxiosInstance } from 'axios';
import { parseFile } from 'music-metadata';
import { Logger, errorText } from '../utils/logger.js';
import { runCommand } from '../utils/process.js';
import { cleanArtistString } from '../utils/trackFiles.js';
import { TaggingError } from '../types/errors.js';
import type { CommandRunner } from './CookieSession.js';
import type { DurationReader, TagMetadata, TagWriter, TrackRecord } from '../types/index.js';

export interface TaggingOptions {
  ffmpegPath: string;
  embedAlbumArt: boolean;
  timeoutMs: number;
}

const MAX_COPYRIGHT_LENGTH = 200;

/** Integer text of a possibly fractional number cell, `''` otherwise. */
function wholeNumber(value: string): string {
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? String(Math.trunc(parsed)) : '';
}

export function extractTagMetadata(record: TrackRecord): TagMetadata {
  const extra = (name: string): string => (record.extra[name] ?? '').trim();
  const genres = extra('artist_genres') || extra('album_genres');

  return {
    title: record.trackName,
    artist: cleanArtistString(record.artistNames),
    albumArtist: cleanArtistString(record.albumArtistNames),
    album: record.albumName,
    year: extra('album_release_date').slice(0, 4),
    trackNumber: wholeNumber(extra('track_number')),
    discNumber: wholeNumber(extra('disc_number')),
    genre: genres.split(',')[0].trim(),
    isrc: record.isrc,
    label: extra('label'),
    copyright: extra('copyrights').slice(0, MAX_COPYRIGHT_LENGTH),
    albumArtUrl: extra('album_image_url'),
  };
}

/**
 * ffmpeg arguments that rewrite `input` into `output` with fresh tags and an
 * optional front cover. Source tags are dropped; audio is copied as is.
 */
export function buildFfmpegArgs(input: string, output: string, metadata: TagMetadata, coverPath?: string): string[] {
  const args = ['-hide_banner', '-loglevel', 'error', '-y', '-i', input];
  if (coverPath) args.push('-i', coverPath);

  args.push('-map', '0:a');
  if (coverPath) {
    args.push(
      '-map',
      '1:0',
      '-c:v',
      'copy',
      '-metadata:s:v',
      'title=Album cover',
      '-metadata:s:v',
      'comment=Cover (front)',
      '-disposition:v',
      'attached_pic'
    );
  }
  args.push('-map_metadata', '-1', '-c:a', 'copy');

  if (extname(output).toLowerCase() === '.mp3') {
    args.push('-id3v2_version', '3');
  }

  const tags: Array<[string, string]> = [
    ['title', metadata.title],
    ['artist', metadata.artist],
    ['album_artist', metadata.albumArtist],
    ['album', metadata.album],
    ['date', metadata.year],
    ['track', metadata.trackNumber],
    ['disc', metadata.discNumber],
    ['genre', metadata.genre],
    ['TSRC', metadata.isrc],
    ['publisher', metadata.label],
    ['copyright', metadata.copyright],
  ];
  for (const [key, value] of tags) {
    if (value) args.push('-metadata', `${key}=${value}`);
  }

  args.push(output);
  return args;
}

/** Writes tags and cover art with ffmpeg. */
export class TaggingService implements TagWriter {
  private readonly http: AxiosInstance;

  constructor(
    private readonly options: TaggingOptions,
    private readonly run: CommandRunner = runCommand,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ timeout: 10000 });
  }

  async embed(filePath: string, metadata: TagMetadata): Promise<boolean> {
    const extension = extname(filePath);
    const tempPath = `${filePath.slice(0, filePath.length - extension.length)}.tagging${extension}`;
    let coverPath: string | undefined;

    try {
      await access(filePath);
    } catch {
      Logger.warn(`File not found for metadata: ${filePath}`);
      return false;
    }

    try {
      if (this.options.embedAlbumArt && metadata.albumArtUrl) {
        coverPath = await this.downloadCover(metadata.albumArtUrl, filePath);
      }

      const result = await this.run(this.options.ffmpegPath, buildFfmpegArgs(filePath, tempPath, metadata, coverPath), {
        timeoutMs: this.options.timeoutMs,
      });
      if (result.code !== 0) {
        throw new TaggingError(result.stderr.trim() || `ffmpeg exited with code ${result.code}`, { filePath });
      }

      await rename(tempPath, filePath);
      return true;
    } catch (error) {
      Logger.warn('Could not embed metadata', { filePath, error: errorText(error) });
      return false;
    } finally {
      await rm(tempPath, { force: true });
      if (coverPath) await rm(coverPath, { force: true });
    }
  }

  private async downloadCover(url: string, filePath: string): Promise<string | undefined> {
    try {
      const response = await this.http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      const coverExtension = url.toLowerCase().endsWith('.png') ? '.png' : '.jpg';
      const coverPath = `${filePath}.cover${coverExtension}`;
      await writeFile(coverPath, Buffer.from(response.data));
      return coverPath;
    } catch (error) {
      Logger.warn('Could not download album art', { url, error: errorText(error) });
      return undefined;
    }
  }
}

/** Reads audio durations with music-metadata. */
export class AudioDurationReader implements DurationReader {
  async read(filePath: string): Promise<number> {
    try {
      const metadata = await parseFile(filePath, { duration: true, skipCovers: true });
      return metadata.format.duration ?? 0;
    } catch (error) {
      Logger.debug('Could not read audio duration', { filePath, error: errorText(error) });
      return 0;
    }
  }
}
