export interface PageAnchor {
  href: string;
  ariaLabel: string;
}

/** Links collected from a rendered track page. */
export interface PageLinks {
  /** Anchors inside the page's "Links" block, when one was found. */
  linkBlock: PageAnchor[];
  /** Every anchor of the page. */
  anchors: PageAnchor[];
  /** Visible text of the page. */
  text: string;
}

const YOUTUBE_URL_IN_TEXT = /https?:\/\/(?:www\.)?(?:youtube\.com|youtu\.be)\/[^\s"'<>]+/i;

export function isYoutubeHref(href: string): boolean {
  return href.includes('youtube.com') || href.includes('youtu.be');
}

/** Rewrites any YouTube link form to `https://www.youtube.com/watch?v=<id>`. */
export function canonicaliseYoutubeUrl(url: string): string {
  if (!url) return url;

  let absolute = url.trim();
  if (absolute.startsWith('//')) absolute = `https:${absolute}`;
  else if (absolute.startsWith('www.')) absolute = `https://${absolute}`;
  else if (absolute.startsWith('http://')) absolute = absolute.replace('http://', 'https://');

  let parsed: URL;
  try {
    parsed = new URL(absolute);
  } catch {
    return absolute;
  }

  const host = parsed.hostname.toLowerCase();
  const path = parsed.pathname;
  const trimmed = path.replace(/^\/+|\/+$/g, '');

  if (host.includes('youtu.be') && trimmed) {
    return watchUrl(trimmed);
  }

  if (host.endsWith('youtube.com')) {
    const videoId = parsed.searchParams.get('v');
    if (path === '/watch' && videoId) {
      return watchUrl(videoId);
    }
    if (path.startsWith('/shorts/') || path.startsWith('/embed/')) {
      const parts = trimmed.split('/');
      if (parts.length >= 2 && parts[1]) {
        return watchUrl(parts[1]);
      }
    }
    if (trimmed.length === 11) {
      return watchUrl(trimmed);
    }
  }

  return absolute;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * Picks the YouTube link of a track page. Preference order: a link-block
 * anchor labelled as YouTube, any link-block YouTube anchor, any page anchor,
 * then a URL in the page text.
 */
export function extractYoutubeUrl(page: PageLinks): string | null {
  const labelled = page.linkBlock.find(
    (anchor) => anchor.ariaLabel.toLowerCase().includes('youtube') && isYoutubeHref(anchor.href.trim())
  );
  if (labelled) return canonicaliseYoutubeUrl(labelled.href.trim());

  const inBlock = page.linkBlock.find((anchor) => isYoutubeHref(anchor.href.trim()));
  if (inBlock) return canonicaliseYoutubeUrl(inBlock.href.trim());

  const anywhere = page.anchors.find((anchor) => isYoutubeHref(anchor.href.trim()));
  if (anywhere) return canonicaliseYoutubeUrl(anywhere.href.trim());

  const inText = YOUTUBE_URL_IN_TEXT.exec(page.text);
  return inText ? canonicaliseYoutubeUrl(inText[0]) : null;
}
