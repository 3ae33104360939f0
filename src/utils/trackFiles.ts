import { join } from 'path';
import type { TrackRecord } from '../types/index.js';

/** yt-dlp output template placeholder for the final extension. */
export const EXTENSION_PLACEHOLDER = '%(ext)s';

const MAX_NAME_LENGTH = 100;

export function sanitizeFilename(name: string, fallback = 'Unknown'): string {
  if (!name) return fallback;

  let cleaned = name
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+|\.+$/g, '');

  if (cleaned.length > MAX_NAME_LENGTH) {
    cleaned = cleaned.slice(0, MAX_NAME_LENGTH).trim();
  }
  return cleaned || fallback;
}

/** First name of a comma separated artist list, safe for a path segment. */
export function primaryArtist(artistNames: string): string {
  if (!artistNames.trim()) return 'Unknown Artist';
  return sanitizeFilename(artistNames.split(',')[0].trim(), 'Unknown Artist');
}

/** Artist list for tags: URI fragments removed, `, ` shown as ` / `. */
export function cleanArtistString(artistNames: string): string {
  const cleaned = artistNames
    .replace(/spotify:artist:\w+,?\s*/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replaceAll(', ', ' / ');
  return cleaned || 'Unknown Artist';
}

export function buildSearchQuery(trackName: string, artistNames: string): string {
  const artist = primaryArtist(artistNames);
  const track = trackName ? sanitizeFilename(trackName) : 'Unknown Track';

  const cleaned = track
    .replace(/\s*[-–]\s*(Remaster(ed)?|Remix|Live|Radio Edit|Single Version).*$/i, '')
    .replace(/\s*\([^)]*Remaster[^)]*\)/gi, '');

  return `${artist} ${cleaned}`;
}

/** `<dir>/<artist>/<album>/<track>.%(ext)s` */
export function outputTemplate(downloadDir: string, record: TrackRecord): string {
  const artist = primaryArtist(record.artistNames);
  const album = record.albumName ? sanitizeFilename(record.albumName, 'Unknown Album') : 'Unknown Album';
  const track = record.trackName ? sanitizeFilename(record.trackName, 'Unknown Track') : 'Unknown Track';
  return join(downloadDir, artist, album, `${track}.${EXTENSION_PLACEHOLDER}`);
}

export function expectedFilePath(template: string, audioFormat: string): string {
  return template.replace(EXTENSION_PLACEHOLDER, audioFormat);
}
