import * as cheerio from 'cheerio';
import type { AdapterSearchOptions, RawRecord, SourceAdapter, SourceId } from './types.js';
import { ClassifiedsParamsSchema, parseParams } from './params.js';
import { HttpClient } from '../utils/http.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('classifieds');

/** Listing rows from an ss.com search results page. */
export function parseListings(html: string, baseUrl: string, pageUrl: string, region: string, limit: number): RawRecord[] {
  const $ = cheerio.load(html);
  const listings: RawRecord[] = [];
  const seenAt = new Date().toISOString();

  $('tr.msga2, tr.msga2-o').each((_, row) => {
    if (listings.length >= limit) return false;

    const cells = $(row).find('td');
    if (cells.length < 4) return;

    const titleCell = cells.eq(1);
    const link = titleCell.find('a').first();
    const title = (link.length > 0 ? link.text() : titleCell.text()).trim();
    const href = link.attr('href');
    const location = cells.eq(cells.length - 2).text().trim();
    const price = cells.eq(cells.length - 1).text().trim();

    listings.push({
      title,
      body: `${location} | ${price}`,
      author: '',
      date: seenAt,
      url: href ? new URL(href, baseUrl).toString() : pageUrl,
      score: 0,
      tags: ['ss.com', region],
    });
    return;
  });

  return listings;
}

export class ClassifiedsAdapter implements SourceAdapter {
  readonly id: SourceId = 'classifieds';

  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string
  ) {}

  validateConfig(): boolean {
    return true;
  }

  async search(query: string, options: AdapterSearchOptions, params?: unknown): Promise<RawRecord[]> {
    const { region } = parseParams(this.id, ClassifiedsParamsSchema, params);
    const url = new URL('/lv/search/', this.baseUrl);
    url.searchParams.set('q', query);

    logger.info({ query, region, limit: options.limit }, 'Searching ss.com');

    const html = await this.http.getText(url.toString());
    const listings = parseListings(html, this.baseUrl, url.toString(), region, options.limit);

    logger.debug({ count: listings.length }, 'Listings parsed');
    return listings;
  }
}
