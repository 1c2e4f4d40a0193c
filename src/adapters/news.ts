import Parser from 'rss-parser';
import { windowStart, type AdapterSearchOptions, type RawRecord, type SourceAdapter, type SourceId } from './types.js';
import { NewsParamsSchema, parseParams } from './params.js';
import { HttpClient } from '../utils/http.js';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const logger = createChildLogger('news');

const GOOGLE_NEWS_SEARCH = 'https://news.google.com/rss/search';
const REGION_BIAS = 'site:lv OR Latvia OR Riga';

interface FeedItemExtras {
  author?: string;
  summary?: string;
}

export interface NewsSettings {
  region: string;
  language: 'en' | 'lv';
  feeds: string[];
}

export function googleNewsUrl(query: string, region: string, language: string): string {
  const hl = language === 'lv' ? 'lv' : 'en';
  const gl = region.toLowerCase();
  const search = new URLSearchParams({
    q: `${query} ${REGION_BIAS}`,
    hl,
    gl,
    ceid: `${gl}:${hl}`,
  });
  return `${GOOGLE_NEWS_SEARCH}?${search.toString()}`;
}

/**
 * Google News search feed plus any custom feeds. Feeds are fetched through
 * the shared HTTP client and handed to rss-parser as text.
 */
export class NewsAdapter implements SourceAdapter {
  readonly id: SourceId = 'news';
  private readonly parser = new Parser<Record<string, unknown>, FeedItemExtras>();

  constructor(
    private readonly http: HttpClient,
    private readonly settings: NewsSettings
  ) {}

  validateConfig(): boolean {
    return true;
  }

  async search(query: string, options: AdapterSearchOptions, params?: unknown): Promise<RawRecord[]> {
    const parsed = parseParams(this.id, NewsParamsSchema, params);
    const region = parsed.region ?? this.settings.region;
    const language = parsed.language ?? this.settings.language;
    const feeds = [googleNewsUrl(query, region, language), ...(parsed.customFeeds ?? this.settings.feeds)];
    const since = windowStart(options.daysBack);

    logger.info({ query, region, language, feeds: feeds.length }, 'Searching news feeds');

    const results: RawRecord[] = [];
    for (const feedUrl of feeds) {
      if (results.length >= options.limit) break;

      try {
        const xml = await this.http.getText(feedUrl, {
          headers: { Accept: 'application/rss+xml, application/xml;q=0.9, */*;q=0.8' },
        });
        const feed = await this.parser.parseString(xml);

        for (const item of feed.items) {
          if (results.length >= options.limit) break;

          const published = item.isoDate ? new Date(item.isoDate) : null;
          if (published && !Number.isNaN(published.getTime()) && published < since) {
            continue;
          }

          results.push({
            title: item.title ?? '',
            description: item.contentSnippet ?? item.summary ?? item.content ?? '',
            author: item.creator ?? item.author ?? '',
            date: item.isoDate ?? item.pubDate ?? null,
            link: item.link ?? '',
            feed: feed.title ?? feedUrl,
            tags: [language, region],
          });
        }

        logger.debug({ feedUrl, items: feed.items.length }, 'Feed processed');
      } catch (error) {
        logger.warn({ feedUrl, error: errorMessage(error) }, 'Failed to fetch feed');
      }
    }

    return results;
  }
}
