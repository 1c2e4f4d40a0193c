import * as cheerio from 'cheerio';
import type { z } from 'zod';
import type { AdapterSearchOptions, RawRecord, SourceAdapter, SourceId } from './types.js';
import { SuppliersParamsSchema, SupplierSiteSchema, parseParams } from './params.js';
import { HttpClient } from '../utils/http.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('suppliers');

export type SupplierSite = z.infer<typeof SupplierSiteSchema>;

interface Catalog {
  slug: string;
  origin: string;
  searchPath: string;
  item: string;
  title: string;
  price: string;
  /** Where the product link lives; the title element when unset. */
  link?: string;
}

export const CATALOGS: Record<SupplierSite, Catalog> = {
  'K-Senukai': {
    slug: 'ksenukai',
    origin: 'https://www.ksenukai.lv',
    searchPath: '/lv/search/',
    item: '[data-el="product"]',
    title: '[data-el="product-title"]',
    price: '[data-el="product-price-current"]',
    link: 'a',
  },
  Stokker: {
    slug: 'stokker',
    origin: 'https://www.stokker.com',
    searchPath: '/lv/search',
    item: '.product-list-item, .product-card',
    title: '.product-title, .title a, a',
    price: '.price, .product-price',
  },
};

export function parseCatalog(html: string, site: SupplierSite, pageUrl: string, limit: number): RawRecord[] {
  const catalog = CATALOGS[site];
  const $ = cheerio.load(html);
  const products: RawRecord[] = [];
  const seenAt = new Date().toISOString();

  $(catalog.item).each((_, element) => {
    if (products.length >= limit) return false;

    const item = $(element);
    const titleNode = item.find(catalog.title).first();
    const linkNode = catalog.link ? item.find(catalog.link).first() : titleNode;
    const title = (titleNode.length > 0 ? titleNode.text() : linkNode.text()).trim();
    if (!title) return;

    const href = linkNode.attr('href');
    products.push({
      title,
      body: item.find(catalog.price).first().text().trim(),
      author: site,
      date: seenAt,
      url: href ? new URL(href, catalog.origin).toString() : pageUrl,
      score: 0,
      tags: [catalog.slug],
    });
    return;
  });

  return products;
}

export class SuppliersAdapter implements SourceAdapter {
  readonly id: SourceId = 'suppliers';

  constructor(
    private readonly http: HttpClient,
    private readonly defaultSites: readonly SupplierSite[]
  ) {}

  validateConfig(): boolean {
    return true;
  }

  async search(query: string, options: AdapterSearchOptions, params?: unknown): Promise<RawRecord[]> {
    const { sites } = parseParams(this.id, SuppliersParamsSchema, params);
    const selected = sites ?? this.defaultSites;

    logger.info({ query, sites: selected, limit: options.limit }, 'Searching supplier catalogs');

    const products: RawRecord[] = [];
    for (const site of SupplierSiteSchema.options) {
      if (!selected.includes(site)) continue;
      if (products.length >= options.limit) break;

      const url = new URL(CATALOGS[site].searchPath, CATALOGS[site].origin);
      url.searchParams.set('q', query);

      const html = await this.http.getText(url.toString());
      const found = parseCatalog(html, site, url.toString(), options.limit - products.length);
      logger.debug({ site, count: found.length }, 'Catalog parsed');
      products.push(...found);
    }

    return products;
  }
}
