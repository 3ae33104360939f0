import puppeteer, { TimeoutError, type Browser, type Page } from 'puppeteer-core';
import Bottleneck from 'bottleneck';
import { config } from '../config/index.js';
import { ScrapingError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { extractYoutubeUrl, type PageLinks } from '../utils/youtube.js';
import type { LookupAdapter } from '../types/index.js';

const YOUTUBE_ANCHOR_SELECTOR = "a[aria-label*='youtube' i], a[href*='youtube.com'], a[href*='youtu.be']";

/**
 * Renders a Songstats track page per ISRC in headless Chrome and reads the
 * YouTube link out of it. One browser is kept for the whole run.
 */
export class SongstatsService implements LookupAdapter {
  private limiter: Bottleneck;
  private browser: Browser | null = null;
  private page: Page | null = null;

  constructor() {
    this.limiter = new Bottleneck(config.rateLimit.songstats);
  }

  async lookup(isrc: string): Promise<string | null> {
    return this.limiter.schedule(() => this.performLookup(isrc));
  }

  private async getPage(): Promise<Page> {
    if (this.page) return this.page;

    try {
      Logger.debug('Launching Chrome', { chromePath: config.songstats.chromePath });
      this.browser = await puppeteer.launch({
        headless: config.songstats.headless,
        executablePath: config.songstats.chromePath,
        timeout: config.songstats.navigationTimeoutMs,
        args: ['--no-sandbox', '--disable-setuid-sandbox'],
      });

      const page = await this.browser.newPage();
      await page.setViewport({ width: 1280, height: 720 });
      await page.setUserAgent(
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'
      );
      page.setDefaultNavigationTimeout(config.songstats.navigationTimeoutMs);
      this.page = page;
      return page;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown launch error';
      throw new ScrapingError(`Failed to launch Chrome: ${message}`, { chromePath: config.songstats.chromePath });
    }
  }

  private async performLookup(isrc: string): Promise<string | null> {
    const page = await this.getPage();
    const pageUrl = `${config.songstats.baseUrl}/${encodeURIComponent(isrc)}?ref=ISRCFinder`;

    try {
      Logger.debug('Opening track page', { url: pageUrl });
      await page.goto(pageUrl, { waitUntil: 'domcontentloaded' });

      // The ISRC page redirects to the track page once the lookup resolves.
      try {
        await page.waitForFunction((start: string) => window.location.href !== start, {
          timeout: config.songstats.redirectTimeoutMs,
        }, pageUrl);
      } catch (error) {
        if (!(error instanceof TimeoutError)) throw error;
        Logger.debug('No redirect from ISRC page', { isrc });
      }

      try {
        await page.waitForSelector(YOUTUBE_ANCHOR_SELECTOR, { timeout: config.songstats.loadWaitMs });
      } catch (error) {
        if (!(error instanceof TimeoutError)) throw error;
        Logger.debug('No YouTube anchor rendered in time', { isrc });
      }

      const links: PageLinks = await page.evaluate(() => {
        const label = Array.from(document.querySelectorAll('span, div')).find((element) =>
          (element.textContent ?? '').trim().toLowerCase().startsWith('links')
        );

        let linkBlock: { href: string; ariaLabel: string }[] = [];
        let container: Element | null = label ?? null;
        for (let depth = 0; container && depth < 4; depth++) {
          const found = Array.from(container.querySelectorAll('a[href]'));
          if (found.length > 0) {
            linkBlock = found.map((anchor) => ({
              href: anchor.getAttribute('href') ?? '',
              ariaLabel: anchor.getAttribute('aria-label') ?? '',
            }));
            break;
          }
          container = container.parentElement;
        }

        const anchors = Array.from(document.querySelectorAll('a[href]')).map((anchor) => ({
          href: anchor.getAttribute('href') ?? '',
          ariaLabel: anchor.getAttribute('aria-label') ?? '',
        }));

        return { linkBlock, anchors, text: document.body ? document.body.innerText : '' };
      });

      return extractYoutubeUrl(links);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown scraping error';
      throw new ScrapingError(`Failed to read Songstats page for ${isrc}: ${message}`, { isrc });
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
    }
    this.browser = null;
    this.page = null;
  }
}
