import { describe, it, expect, vi } from 'vitest';
import { SuppliersAdapter, parseCatalog } from './suppliers.js';
import { HttpClient } from '../utils/http.js';
import { RateLimiter } from '../utils/rate-limiter.js';

const ksenukaiPage = `<!doctype html><html><body>
<div data-el="product">
  <a href="/p/roof-sheet"><span data-el="product-title">Roof sheet</span></a>
  <span data-el="product-price-current">12,99 €</span>
</div>
<div data-el="product"><a href="/p/untitled"></a></div>
</body></html>`;

const stokkerPage = `<!doctype html><html><body>
<div class="product-card">
  <a class="product-title" href="/lv/p/membrane">EPDM membrane</a>
  <span class="price">45 €</span>
</div>
</body></html>`;

function adapter(): SuppliersAdapter {
  const http = new HttpClient({ source: 'suppliers', rateLimiter: new RateLimiter('suppliers', 1000), retries: 0 });
  return new SuppliersAdapter(http, ['K-Senukai', 'Stokker']);
}

describe('parseCatalog', () => {
  it('reads K-Senukai product tiles and skips untitled ones', () => {
    const rows = parseCatalog(ksenukaiPage, 'K-Senukai', 'https://www.ksenukai.lv/lv/search/?q=roof', 10);

    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      title: 'Roof sheet',
      body: '12,99 €',
      author: 'K-Senukai',
      url: 'https://www.ksenukai.lv/p/roof-sheet',
      score: 0,
      tags: ['ksenukai'],
    });
  });

  it('reads Stokker product cards', () => {
    const rows = parseCatalog(stokkerPage, 'Stokker', 'https://www.stokker.com/lv/search?q=roof', 10);

    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      title: 'EPDM membrane',
      body: '45 €',
      author: 'Stokker',
      url: 'https://www.stokker.com/lv/p/membrane',
      tags: ['stokker'],
    });
  });
});

describe('SuppliersAdapter', () => {
  it('needs no configuration', () => {
    expect(adapter().validateConfig()).toBe(true);
  });

  it('searches both catalogs by default', async () => {
    const fetchMock = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(new Response(ksenukaiPage))
      .mockResolvedValueOnce(new Response(stokkerPage));

    const rows = await adapter().search('roof', { limit: 10, daysBack: 30 });

    expect(fetchMock.mock.calls.map((call) => String(call[0]))).toEqual([
      'https://www.ksenukai.lv/lv/search/?q=roof',
      'https://www.stokker.com/lv/search?q=roof',
    ]);
    expect(rows.map((row) => row['title'])).toEqual(['Roof sheet', 'EPDM membrane']);
  });

  it('stops once the limit is reached', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(new Response(ksenukaiPage));

    const rows = await adapter().search('roof', { limit: 1, daysBack: 30 });

    expect(rows).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('searches only the selected sites', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(new Response(stokkerPage));

    const rows = await adapter().search('roof', { limit: 10, daysBack: 30 }, { sites: ['Stokker'] });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(rows.map((row) => row['author'])).toEqual(['Stokker']);
  });

  it('rejects unknown sites', async () => {
    await expect(adapter().search('roof', { limit: 10, daysBack: 30 }, { sites: ['Depo'] })).rejects.toThrow(
      /^\[suppliers\] Invalid parameters: sites\.0:/
    );
  });
});
