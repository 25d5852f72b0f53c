import { describe, it, expect, vi, beforeEach } from 'vitest';
import { parseCrawlerConfig } from '../crawler/crawler-config.js';
import { logger } from '../utils/logger.js';
import { dedupeProducts, extractProducts } from './product-extractor.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const PAGE = 'https://shop.test/p/oak-table';

function jsonLd(data: unknown): string {
  return `<script type="application/ld+json">${JSON.stringify(data)}</script>`;
}

describe('extractProducts', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('JSON-LD', () => {
    it('should extract a product with its first offer', () => {
      const html = jsonLd({
        '@context': 'https://schema.org',
        '@type': 'Product',
        name: 'Oak Table',
        description: 'Solid oak',
        sku: 'OAK-1',
        url: '/p/oak-table',
        image: ['/img/oak-1.jpg', { url: 'https://cdn.shop.test/oak-2.jpg' }],
        offers: [
          { '@type': 'Offer', price: '499.00', priceCurrency: 'USD' },
          { '@type': 'Offer', price: '450.00', priceCurrency: 'USD' },
        ],
      });

      const [product] = extractProducts(html, PAGE, parseCrawlerConfig(null));

      expect(product).toMatchObject({
        externalId: 'OAK-1',
        name: 'Oak Table',
        description: 'Solid oak',
        price: 499,
        currency: 'USD',
        productUrl: 'https://shop.test/p/oak-table',
        imageUrls: ['https://shop.test/img/oak-1.jpg', 'https://cdn.shop.test/oak-2.jpg'],
      });
    });

    it('should read items from @graph and arrays', () => {
      const html =
        jsonLd({ '@graph': [{ '@type': 'WebPage', name: 'Page' }, { '@type': 'Product', name: 'Lamp', sku: 'L1' }] }) +
        jsonLd([{ '@type': ['Thing', 'Product'], name: 'Rug', sku: 'R1' }]);

      const names = extractProducts(html, PAGE, parseCrawlerConfig(null)).map((product) => product.name);

      expect(names).toEqual(['Lamp', 'Rug']);
    });

    it('should drop items without a name', () => {
      const html = jsonLd({ '@type': 'Product', sku: 'NAMELESS', offers: { price: 10 } });

      expect(extractProducts(html, PAGE, parseCrawlerConfig(null))).toEqual([]);
    });

    it('should skip malformed blocks and keep the rest', () => {
      const html =
        '<script type="application/ld+json">{ broken</script>' +
        jsonLd({ '@type': 'Product', name: 'Stool', sku: 'S1' });

      const products = extractProducts(html, PAGE, parseCrawlerConfig(null));

      expect(products.map((product) => product.name)).toEqual(['Stool']);
      expect(logger.debug).toHaveBeenCalledWith(
        'Skipping malformed JSON-LD block',
        expect.objectContaining({ url: PAGE })
      );
    });

    it('should default the URL to the page and the currency to EUR', () => {
      const html = jsonLd({ '@type': 'Product', name: 'Vase', offers: { price: 12.5 } });

      const [product] = extractProducts(html, PAGE, parseCrawlerConfig(null));

      expect(product.productUrl).toBe(PAGE);
      expect(product.currency).toBe('EUR');
      expect(product.price).toBe(12.5);
    });

    it('should use the configured default currency', () => {
      const html = jsonLd({ '@type': 'Product', name: 'Vase' });
      const config = parseCrawlerConfig({ customSettings: { defaultCurrency: 'GBP' } });

      expect(extractProducts(html, PAGE, config)[0].currency).toBe('GBP');
    });

    it('should keep the JSON-LD item as the raw payload', () => {
      const item = { '@type': 'Product', name: 'Bench', sku: 'B1' };

      expect(extractProducts(jsonLd(item), PAGE, parseCrawlerConfig(null))[0].rawPayload).toEqual(item);
    });
  });

  describe('configured selectors', () => {
    const listing = `
      <div class="card">
        <a class="link" href="/p/chair-1?from=list"><h2 class="name">Chair One</h2></a>
        <span class="price">1.234,56 €</span>
        <img class="img" data-src="/img/chair-1.jpg">
      </div>
      <div class="card">
        <span class="price">10,00 €</span>
      </div>
      <div class="card">
        <h2 class="name">Chair Two</h2>
        <img class="img" src="https://cdn.shop.test/chair-2.jpg">
      </div>
    `;

    const config = parseCrawlerConfig({
      productContainerSelector: '.card',
      productNameSelector: '.name',
      productPriceSelector: '.price',
      productLinkSelector: 'a.link',
      productImageSelector: 'img.img',
    });

    it('should extract one product per named container', () => {
      const products = extractProducts(listing, 'https://shop.test/c/chairs', config);

      expect(products).toHaveLength(2);
      expect(products[0]).toMatchObject({
        externalId: null,
        name: 'Chair One',
        price: 1234.56,
        currency: 'EUR',
        productUrl: 'https://shop.test/p/chair-1?from=list',
        imageUrls: ['https://shop.test/img/chair-1.jpg'],
      });
      expect(products[1]).toMatchObject({
        name: 'Chair Two',
        price: null,
        productUrl: 'https://shop.test/c/chairs',
        imageUrls: ['https://cdn.shop.test/chair-2.jpg'],
      });
    });

    it('should yield nothing from the layer when the container selector is invalid', () => {
      const broken = parseCrawlerConfig({ productContainerSelector: '.card[[', productNameSelector: '.name' });

      expect(extractProducts(listing, 'https://shop.test/c/chairs', broken)).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        'Selector extraction failed',
        expect.objectContaining({ url: 'https://shop.test/c/chairs' })
      );
    });

    it('should combine with JSON-LD results', () => {
      const html = jsonLd({ '@type': 'Product', name: 'Featured', sku: 'F1' }) + listing;

      const names = extractProducts(html, 'https://shop.test/c/chairs', config).map((product) => product.name);

      expect(names).toEqual(['Featured', 'Chair One', 'Chair Two']);
    });
  });

  describe('OpenGraph', () => {
    const og = (type: string) => `
      <meta property="og:type" content="${type}">
      <meta property="og:title" content="Linen Curtain">
      <meta property="og:description" content="Natural linen">
      <meta property="og:image" content="/img/curtain.jpg">
      <meta property="og:url" content="https://shop.test/p/curtain">
      <meta property="product:price:amount" content="39,90">
      <meta property="product:price:currency" content="EUR">
    `;

    it('should extract a product page', () => {
      const [product] = extractProducts(og('product'), PAGE, parseCrawlerConfig(null));

      expect(product).toMatchObject({
        name: 'Linen Curtain',
        description: 'Natural linen',
        price: 39.9,
        currency: 'EUR',
        productUrl: 'https://shop.test/p/curtain',
        imageUrls: ['https://shop.test/img/curtain.jpg'],
      });
    });

    it('should ignore pages that are not products', () => {
      expect(extractProducts(og('website'), PAGE, parseCrawlerConfig(null))).toEqual([]);
    });

    it('should not run when JSON-LD found products', () => {
      const html = og('product') + jsonLd({ '@type': 'Product', name: 'From JSON-LD' });

      const names = extractProducts(html, PAGE, parseCrawlerConfig(null)).map((product) => product.name);

      expect(names).toEqual(['From JSON-LD']);
    });
  });
});

describe('dedupeProducts', () => {
  const base = {
    description: null,
    price: null,
    currency: 'EUR',
    imageUrls: [],
    rawPayload: null,
  };

  it('should keep the first product per SKU', () => {
    const products = dedupeProducts([
      { ...base, externalId: 'A1', name: 'First', productUrl: 'https://shop.test/p/a' },
      { ...base, externalId: 'A1', name: 'Second', productUrl: 'https://shop.test/p/other' },
    ]);

    expect(products.map((product) => product.name)).toEqual(['First']);
  });

  it('should key products without SKU on the canonical URL', () => {
    const products = dedupeProducts([
      { ...base, externalId: null, name: 'First', productUrl: 'https://shop.test/p/a?ref=1' },
      { ...base, externalId: null, name: 'Second', productUrl: 'https://shop.test/p/a#details' },
      { ...base, externalId: null, name: 'Third', productUrl: 'https://shop.test/p/b' },
    ]);

    expect(products.map((product) => product.name)).toEqual(['First', 'Third']);
  });

  it('should collapse items with different SKUs on the same canonical URL', () => {
    const products = dedupeProducts([
      { ...base, externalId: 'A1', name: 'First', productUrl: 'https://shop.test/p/a?c=red' },
      { ...base, externalId: 'B2', name: 'Second', productUrl: 'https://shop.test/p/a#x' },
    ]);

    expect(products.map((product) => product.name)).toEqual(['First']);
  });

  it('should drop an item that matches an earlier one on either key', () => {
    const products = dedupeProducts([
      { ...base, externalId: null, name: 'First', productUrl: 'https://shop.test/p/a' },
      { ...base, externalId: 'B2', name: 'Second', productUrl: 'https://shop.test/p/b' },
      { ...base, externalId: 'B2', name: 'Third', productUrl: 'https://shop.test/p/c' },
      { ...base, externalId: 'C3', name: 'Fourth', productUrl: 'https://shop.test/p/A' },
    ]);

    expect(products.map((product) => product.name)).toEqual(['First', 'Second']);
  });

  it('should not merge SKU-distinct items that only carry the page URL', () => {
    const page = 'https://shop.test/c/lamps';
    const products = dedupeProducts(
      [
        { ...base, externalId: 'L1', name: 'Desk Lamp', productUrl: page },
        { ...base, externalId: 'L2', name: 'Floor Lamp', productUrl: page },
        { ...base, externalId: 'L3', name: 'Wall Lamp', productUrl: 'https://shop.test/p/wall-lamp' },
      ],
      page
    );

    expect(products.map((product) => product.name)).toEqual(['Desk Lamp', 'Floor Lamp', 'Wall Lamp']);
  });
});
