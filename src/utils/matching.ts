import stringSimilarity from 'string-similarity';
import sanitizeHtml from 'sanitize-html';
import he from 'he';
import type { CatalogCandidate } from '../types/index.js';

/** Edition and upload noise ignored when comparing titles token by token. */
export const TITLE_STOPWORDS: ReadonlySet<string> = new Set([
  'remaster', 'remastered', 'mix', 'edit', 'version', 'mono', 'stereo',
  'live', 'demo', 'radio', 'explicit', 'clean', 'instrumental',
  'bonus', 'deluxe', 'anniversary', 'extended', 'feat', 'featuring',
  'official', 'video', 'audio', 'lyrics', 'lyric', 'hd', '4k',
]);

/** Words marking a bracketed or trailing album-title segment as edition info. */
const ALBUM_TAG_KEYWORDS: readonly string[] = [
  'remaster', 'remastered', 'remastering',
  'deluxe', 'edition', 'editions',
  'expanded', 'expansion',
  'anniversary', 'special', 'collector', 'collectors',
  'limited', 'ultimate', 'definitive',
  'version', 'edit', 'mix', 'mono', 'stereo',
  'bonus', 'reissue', 'rerelease',
  'extended', 'digitally', 'digital',
  'explicit', 'clean',
  'super', 'luxury',
  'original motion picture soundtrack', 'soundtrack',
];

export class TextNormalizer {
  static stripDiacritics(text: string): string {
    return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
  }

  /** Lower-case, accent-free, punctuation-free, single-spaced. */
  static normalize(text: string): string {
    return this.stripDiacritics(text || '')
      .toLowerCase()
      .replace(/[-_]/g, ' ')
      .replace(/[’']/g, '')
      .replace(/[^a-z0-9\s]/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  static tokenize(text: string): string[] {
    return this.normalize(text)
      .split(' ')
      .filter((token) => token && !TITLE_STOPWORDS.has(token));
  }

  /** Plain text out of a value that may carry markup or HTML entities. */
  static sanitizeText(text: string): string {
    if (!text) return '';

    const sanitized = sanitizeHtml(text, {
      allowedTags: [],
      allowedAttributes: {},
    });

    return he.decode(sanitized).replace(/\s+/g, ' ').trim();
  }
}

export class TitleMatcher {
  /**
   * Share of the track title's meaningful tokens present in the candidate
   * label, in [0, 1]. A title made only of stopwords scores 0.
   */
  static tokenContainmentScore(trackTitle: string, label: string): number {
    const titleTokens = TextNormalizer.tokenize(trackTitle);
    if (!titleTokens.length) return 0;

    const labelTokens = new Set(TextNormalizer.tokenize(label));
    const hits = titleTokens.filter((token) => labelTokens.has(token)).length;
    return hits / titleTokens.length;
  }

  static hasSubstringMatch(trackTitle: string, label: string): boolean {
    const title = TextNormalizer.normalize(trackTitle);
    const candidate = TextNormalizer.normalize(label);
    if (!title || !candidate) return false;
    return candidate.includes(title) || title.includes(candidate);
  }

  static isMatch(trackTitle: string, label: string, threshold: number): boolean {
    return (
      this.hasSubstringMatch(trackTitle, label) ||
      this.tokenContainmentScore(trackTitle, label) >= threshold
    );
  }

  /**
   * Binds candidates to track titles. Candidates are taken in order; each one
   * goes to the first still-unmatched title it matches. Returns title index →
   * candidate.
   */
  static matchCandidatesToTracks(
    candidates: readonly CatalogCandidate[],
    trackTitles: readonly string[],
    threshold = 0.66
  ): Map<number, CatalogCandidate> {
    const matched = new Map<number, CatalogCandidate>();

    for (const candidate of candidates) {
      for (let index = 0; index < trackTitles.length; index++) {
        if (matched.has(index)) continue;

        if (this.isMatch(trackTitles[index], candidate.label, threshold)) {
          matched.set(index, candidate);
          break;
        }
      }
    }

    return matched;
  }

  /** Dice similarity of two titles after normalisation, in [0, 1]. */
  static similarity(a: string, b: string): number {
    return stringSimilarity.compareTwoStrings(TextNormalizer.normalize(a), TextNormalizer.normalize(b));
  }
}

function containsAlbumTag(text: string): boolean {
  const normalized = TextNormalizer.stripDiacritics(text).toLowerCase();
  if (/\b(19|20)\d{2}\b/.test(normalized) && (normalized.includes('remaster') || normalized.includes('reissue'))) {
    return true;
  }
  return ALBUM_TAG_KEYWORDS.some((keyword) => normalized.includes(keyword));
}

/**
 * Drops edition, remaster and similar segments from an album title before a
 * catalog search, e.g. "Album (2012 Remastered)" and "Album - Deluxe Edition"
 * both become "Album". Returns the input when nothing would be left.
 */
export function cleanAlbumNameForSearch(albumName: string): string {
  if (!albumName) return albumName;

  let cleaned = albumName;
  for (const match of albumName.matchAll(/\([^)]*\)|\[[^\]]*\]/g)) {
    const chunk = match[0];
    const inner = chunk.slice(1, -1).trim();
    if (inner && containsAlbumTag(inner)) {
      cleaned = cleaned.replace(chunk, ' ');
    }
  }

  const separated = /^(.*?)(\s*[-–—:]\s*)(.+)$/;
  for (;;) {
    const match = separated.exec(cleaned.trim());
    if (!match) break;
    const [, left, , right] = match;
    if (!containsAlbumTag(right.trim())) break;
    cleaned = left.trim();
  }

  cleaned = cleaned
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\s*[-–—:]\s*$/, '')
    .trim();

  return cleaned || albumName;
}
