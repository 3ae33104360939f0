import axios, { type AxiosInstance } from 'axios';
import Bottleneck from 'bottleneck';
import { z } from 'zod';
import { config } from '../config/index.js';
import { DiscogsAPIError } from '../types/errors.js';
import { Logger, errorText } from '../utils/logger.js';
import { TextNormalizer } from '../utils/matching.js';
import { canonicaliseYoutubeUrl } from '../utils/youtube.js';
import type { CatalogAdapter, CatalogCandidate } from '../types/index.js';

const SearchResultSchema = z.object({
  type: z.string().nullish(),
  title: z.string().nullish(),
  id: z.number().nullish(),
  master_id: z.number().nullish(),
  master_url: z.string().nullish(),
  resource_url: z.string().nullish(),
});

const SearchResponseSchema = z.object({
  results: z.array(SearchResultSchema).default([]),
});

const VideosResponseSchema = z.object({
  videos: z
    .array(
      z.object({
        title: z.string().nullish(),
        uri: z.string().nullish(),
      })
    )
    .default([]),
});

type SearchResult = z.infer<typeof SearchResultSchema>;

interface SearchStrategy {
  name: string;
  params: Record<string, string | number>;
}

/**
 * Discogs database search. Tries four searches from the most to the least
 * specific and returns the videos of the first result that has any.
 */
export class DiscogsService implements CatalogAdapter {
  private readonly http: AxiosInstance;
  private readonly limiter: Bottleneck;

  constructor(http?: AxiosInstance, limiter?: Bottleneck) {
    this.http =
      http ??
      axios.create({
        baseURL: config.discogs.baseUrl,
        timeout: config.discogs.timeout,
        headers: {
          'User-Agent': config.discogs.userAgent,
          ...(config.discogs.token ? { Authorization: `Discogs token=${config.discogs.token}` } : {}),
        },
      });
    this.limiter = limiter ?? new Bottleneck(config.rateLimit.discogs);
  }

  static strategies(artist: string, album: string, limit = config.discogs.searchLimit): SearchStrategy[] {
    return [
      {
        name: 'fielded master',
        params: { artist, release_title: album, type: 'master', per_page: limit, page: 1 },
      },
      {
        name: 'combined master',
        params: { title: `${artist} - ${album}`, type: 'master', per_page: limit, page: 1 },
      },
      {
        name: 'fielded release',
        params: { artist, release_title: album, per_page: limit, page: 1 },
      },
      {
        name: 'query master',
        params: { q: `${artist} ${album}`, type: 'master', per_page: limit, page: 1 },
      },
    ];
  }

  async searchAlbum(artist: string, album: string): Promise<CatalogCandidate[]> {
    const strategies = DiscogsService.strategies(artist, album);
    let failedSearches = 0;

    for (const strategy of strategies) {
      let results: SearchResult[];
      try {
        results = await this.search(strategy.params);
      } catch (error) {
        failedSearches++;
        Logger.warn(`Discogs ${strategy.name} search failed`, { artist, album, error: errorText(error) });
        continue;
      }

      Logger.debug(`Discogs ${strategy.name} results: ${results.length}`, { artist, album });
      const videos = await this.videosOfFirstUsableResult(results);
      if (videos.length > 0) {
        return videos;
      }
    }

    if (failedSearches === strategies.length) {
      throw new DiscogsAPIError('Every search strategy failed', { artist, album });
    }

    Logger.debug('No videos found after all strategies', { artist, album });
    return [];
  }

  private async search(params: Record<string, string | number>): Promise<SearchResult[]> {
    const response = await this.get('/database/search', params);
    return SearchResponseSchema.parse(response).results;
  }

  /** Tries master URL, then master id, then the result as a release. */
  private async videosOfFirstUsableResult(results: SearchResult[]): Promise<CatalogCandidate[]> {
    for (const result of results) {
      let videos: CatalogCandidate[] = [];

      if (result.master_url) {
        videos = await this.fetchVideos(result.master_url);
      }
      if (videos.length === 0 && result.master_id) {
        videos = await this.fetchVideos(`/masters/${result.master_id}`);
      }
      if (videos.length === 0 && result.resource_url) {
        videos = await this.fetchVideos(result.resource_url);
      }

      if (videos.length > 0) {
        Logger.debug(`Using result '${result.title ?? result.id ?? '?'}' (${videos.length} videos)`);
        return videos;
      }
    }
    return [];
  }

  private async fetchVideos(url: string): Promise<CatalogCandidate[]> {
    try {
      const data = VideosResponseSchema.parse(await this.get(url, {}));
      const candidates: CatalogCandidate[] = [];
      for (const video of data.videos) {
        if (video.title && video.uri) {
          candidates.push({
            label: TextNormalizer.sanitizeText(video.title),
            url: canonicaliseYoutubeUrl(video.uri),
          });
        }
      }
      return candidates;
    } catch (error) {
      Logger.debug('Discogs video fetch failed', { url, error: errorText(error) });
      return [];
    }
  }

  private async get(url: string, params: Record<string, string | number>): Promise<unknown> {
    const auth =
      !config.discogs.token && config.discogs.consumerKey && config.discogs.consumerSecret
        ? { key: config.discogs.consumerKey, secret: config.discogs.consumerSecret }
        : {};

    const response = await this.limiter.schedule(() =>
      this.http.get<unknown>(url, { params: { ...params, ...auth } })
    );
    return response.data;
  }
}
