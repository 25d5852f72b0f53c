import { createHash } from 'crypto';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FakeSite, sitemapIndex, urlset } from '../../testing/fake-site.js';
import { parseCrawlerConfig } from '../crawler-config.js';
import { GenericStrategy } from './generic-strategy.js';

vi.mock('../../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const START = 'https://shop.test/';

describe('GenericStrategy', () => {
  let site: FakeSite;
  let strategy: GenericStrategy;

  beforeEach(() => {
    vi.clearAllMocks();
    site = new FakeSite();
    strategy = new GenericStrategy(site.client());
  });

  describe('discoverUrls', () => {
    it('should use the job sitemap when it yields URLs', async () => {
      site.html('https://shop.test/feeds/products.xml', urlset(['https://shop.test/p/1', 'https://shop.test/p/2']));

      const urls = await strategy.discoverUrls(
        START,
        'https://shop.test/feeds/products.xml',
        parseCrawlerConfig(null)
      );

      expect(urls).toEqual(['https://shop.test/p/1', 'https://shop.test/p/2']);
      expect(site.requestCount('https://shop.test/sitemap.xml')).toBe(0);
    });

    it('should fall back to the well-known sitemap locations in order', async () => {
      site
        .html('https://shop.test/sitemap_index.xml', sitemapIndex(['https://shop.test/sitemap-products.xml']))
        .html('https://shop.test/sitemap-products.xml', urlset(['https://shop.test/p/1']));

      const urls = await strategy.discoverUrls(
        START,
        'https://shop.test/missing.xml',
        parseCrawlerConfig({ respectRobotsTxt: false })
      );

      expect(urls).toEqual(['https://shop.test/p/1']);
      expect(site.requests).toEqual([
        'https://shop.test/missing.xml',
        'https://shop.test/sitemap.xml',
        'https://shop.test/sitemap_index.xml',
        'https://shop.test/sitemap-products.xml',
      ]);
    });

    it('should read sitemaps from robots.txt and honour its Disallow rules', async () => {
      site
        .html(
          'https://shop.test/robots.txt',
          ['User-agent: *', 'Disallow: /private/', 'Sitemap: https://shop.test/products.xml'].join('\n')
        )
        .html('https://shop.test/products.xml', urlset(['https://shop.test/p/1', 'https://shop.test/private/2']));

      const urls = await strategy.discoverUrls(START, null, parseCrawlerConfig(null));

      expect(urls).toEqual(['https://shop.test/p/1']);
    });

    it('should crawl from the start URL when no sitemap is found', async () => {
      const urls = await strategy.discoverUrls(START, null, parseCrawlerConfig(null));

      expect(urls).toEqual([START]);
    });

    it('should filter, dedupe and cap the discovered URLs', async () => {
      site.html(
        'https://shop.test/sitemap.xml',
        urlset([
          'https://shop.test/p/A',
          'https://shop.test/blog/news',
          'https://shop.test/p/a',
          'https://shop.test/p/b',
          'https://shop.test/p/c',
        ])
      );
      const config = parseCrawlerConfig({
        respectRobotsTxt: false,
        excludePatterns: ['/blog/'],
        customSettings: { maxPages: 2 },
      });

      const urls = await strategy.discoverUrls(START, null, config);

      expect(urls).toEqual(['https://shop.test/p/A', 'https://shop.test/p/b']);
    });

    it('should not fetch robots.txt rules when robots are ignored', async () => {
      site.html('https://shop.test/sitemap.xml', urlset(['https://shop.test/p/1']));

      await strategy.discoverUrls(START, null, parseCrawlerConfig({ respectRobotsTxt: false }));

      expect(site.requestCount('https://shop.test/robots.txt')).toBe(0);
    });
  });

  describe('fetchAndExtract', () => {
    const productPage = `<html><head><title>Oak Table</title></head><body>
      <script type="application/ld+json">{"@type":"Product","name":"Oak Table","sku":"OAK-1","offers":{"price":"499.00","priceCurrency":"EUR"}}</script>
      <a href="/p/oak-chair?ref=related">Chair</a>
      <a href="https://elsewhere.test/">Partner</a>
    </body></html>`;

    it('should return hash, title, products and links for a page', async () => {
      site.html('https://shop.test/p/oak-table', productPage);

      const result = await strategy.fetchAndExtract('https://shop.test/p/oak-table', parseCrawlerConfig(null));

      expect(result).toMatchObject({
        url: 'https://shop.test/p/oak-table',
        success: true,
        httpStatusCode: 200,
        contentHash: createHash('sha256').update(productPage, 'utf8').digest('hex'),
        title: 'Oak Table',
        discoveredUrls: ['https://shop.test/p/oak-chair'],
      });
      expect(result.products).toHaveLength(1);
      expect(result.products[0]).toMatchObject({ externalId: 'OAK-1', name: 'Oak Table', price: 499 });
    });

    it('should send the configured user agent', async () => {
      site.html('https://shop.test/p/1', '<p>ok</p>');

      await strategy.fetchAndExtract('https://shop.test/p/1', parseCrawlerConfig({ userAgent: 'TestBot/2.0' }));

      expect(site.userAgents).toEqual(['TestBot/2.0']);
    });

    it('should report a non-2xx response as a failed page', async () => {
      site.on('https://shop.test/p/broken', { status: 500, statusText: 'Internal Server Error' });

      const result = await strategy.fetchAndExtract('https://shop.test/p/broken', parseCrawlerConfig(null));

      expect(result).toEqual({
        url: 'https://shop.test/p/broken',
        success: false,
        httpStatusCode: 500,
        error: 'HTTP 500: Internal Server Error',
        products: [],
        discoveredUrls: [],
      });
    });

    it('should report a network error as a failed page', async () => {
      site.on('https://shop.test/p/down', { networkError: 'connect ECONNREFUSED' });

      const result = await strategy.fetchAndExtract('https://shop.test/p/down', parseCrawlerConfig(null));

      expect(result.success).toBe(false);
      expect(result.error).toBe('connect ECONNREFUSED');
      expect(result.httpStatusCode).toBeUndefined();
    });

    it('should rethrow when the signal is aborted', async () => {
      site.html('https://shop.test/p/1', '<p>ok</p>');
      const controller = new AbortController();
      controller.abort();

      await expect(
        strategy.fetchAndExtract('https://shop.test/p/1', parseCrawlerConfig(null), controller.signal)
      ).rejects.toThrow();
    });
  });
});
