/**
 * Browser-rendered crawler strategy
 *
 * For shops that build their pages client-side. Pages are rendered through a
 * PageRenderer; products come from the serialized app state the page exposes
 * on `window`, falling back to DOM selectors.
 */

import * as cheerio from 'cheerio';
import { HttpClient } from '../../scraper/http-client.js';
import { PageRenderer, RenderedPage } from '../../scraper/page-renderer.js';
import { parsePrice } from '../../scraper/price-parser.js';
import { FALLBACK_CURRENCY } from '../../scraper/product-extractor.js';
import { CrawlPageResult, ExtractedProductCandidate } from '../../types/index.js';
import { resolveUrl, siteRootUrl } from '../../utils/canonicalize.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isAbortError, randomBetween } from '../../utils/sleep.js';
import { CrawlerConfig, getCustomIntSetting, getCustomSetting } from '../crawler-config.js';
import { extractPaginationLinks } from '../link-extractor.js';
import { capUrls, compilePatterns, dedupeCaseInsensitive, SitemapResolver } from '../url-discoverer.js';
import { contentHash, CrawlerStrategy, failedPage } from './crawler-strategy.js';

export const NAVIGATION_TIMEOUT_MS = 30000;
export const SELECTOR_TIMEOUT_MS = 10000;
export const DEFAULT_STATE_VARIABLE = '__PRELOADED_STATE__';
export const DEFAULT_PAGINATION_SELECTOR = 'a[rel="next"]';

type JsonObject = Record<string, unknown>;

export interface BrowserRenderedStrategyOptions {
  renderer: PageRenderer;
  http?: HttpClient;
}

export class BrowserRenderedStrategy implements CrawlerStrategy {
  readonly type = 'browser';
  private readonly renderer: PageRenderer;
  private readonly http: HttpClient;

  constructor(options: BrowserRenderedStrategyOptions) {
    this.renderer = options.renderer;
    this.http = options.http ?? new HttpClient();
  }

  async discoverUrls(
    startUrl: string,
    sitemapUrl: string | null,
    config: CrawlerConfig,
    signal?: AbortSignal
  ): Promise<string[]> {
    const source =
      sitemapUrl ?? getCustomSetting(config, 'sitemapUrl') ?? siteRootUrl(startUrl, '/sitemap.xml');

    let urls: string[];
    try {
      urls = await new SitemapResolver(this.http, { userAgent: config.userAgent }).resolve(source, signal);
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) throw error;
      logger.warn('Sitemap discovery failed, crawling from start URL', { source, error: errorMessage(error) });
      return [startUrl];
    }

    const productUrlPattern = getCustomSetting(config, 'productUrlPattern');
    if (productUrlPattern) {
      const patterns = compilePatterns([productUrlPattern]);
      urls = urls.filter((url) => patterns.every((pattern) => pattern.test(url)));
    }

    urls = capUrls(dedupeCaseInsensitive(urls), getCustomIntSetting(config, 'maxPages'));

    if (urls.length === 0) {
      logger.info('Sitemap yielded no product URLs, crawling from start URL', { source });
      return [startUrl];
    }

    logger.info('Discovered URLs from sitemap', { source, count: urls.length });
    return urls;
  }

  /** Randomized between one and three request delays; rendering is heavier on the shop than a plain GET */
  politenessDelayMs(config: CrawlerConfig): number {
    return randomBetween(config.requestDelayMs, config.requestDelayMs * 3);
  }

  async fetchAndExtract(url: string, config: CrawlerConfig, signal?: AbortSignal): Promise<CrawlPageResult> {
    const waitForSelector = getCustomSetting(config, 'productDetailSelector');

    let page: RenderedPage;
    try {
      page = await this.renderer.render(
        url,
        {
          userAgent: config.userAgent,
          waitForSelector,
          navigationTimeoutMs: NAVIGATION_TIMEOUT_MS,
          selectorTimeoutMs: SELECTOR_TIMEOUT_MS,
          stateVariable: getCustomSetting(config, 'pageStateVariable') ?? DEFAULT_STATE_VARIABLE,
        },
        signal
      );
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) throw error;

      logger.warn('Page render failed', { url, error: errorMessage(error) });
      return failedPage(url, errorMessage(error));
    }

    const status = page.httpStatusCode;
    if (status !== null && (status < 200 || status >= 300)) {
      return failedPage(url, `HTTP ${status}`, status);
    }

    if (waitForSelector && !page.signals.selectorFound) {
      logger.debug('Product selector not found, extracting anyway', { url, selector: waitForSelector });
    }

    const $ = cheerio.load(page.html);
    const baseUrl = page.finalUrl || url;

    let products = extractFromPageState(page.pageState, url, config);
    if (products.length === 0) {
      products = extractFromDom($, url, config);
    }

    return {
      url,
      success: true,
      httpStatusCode: status ?? undefined,
      contentHash: contentHash(page.html),
      title: page.title || undefined,
      products,
      discoveredUrls: extractPaginationLinks(
        $,
        baseUrl,
        config.paginationSelector ?? DEFAULT_PAGINATION_SELECTOR
      ),
    };
  }
}

/**
 * Reads the product under the state's `product` or `productDetail` key
 */
export function extractFromPageState(
  state: unknown,
  pageUrl: string,
  config: CrawlerConfig
): ExtractedProductCandidate[] {
  if (!isObject(state)) return [];

  const product = [state.product, state.productDetail].find(isObject);
  if (!product) return [];

  const name = stringValue(product.name);
  if (!name) return [];

  const minorUnits = getCustomSetting(config, 'priceInMinorUnits')?.toLowerCase() !== 'false';
  const rawPrice = [product.price, product.currentPrice].find(isFiniteNumber);
  const price = rawPrice === undefined ? null : minorUnits ? rawPrice / 100 : rawPrice;

  const id = product.id;
  const externalId =
    typeof id === 'string' && id.trim() ? id.trim()
      : typeof id === 'number' ? String(id)
        : productIdFromUrl(pageUrl, config);

  const images = Array.isArray(product.images) ? product.images : product.media;

  return [
    {
      externalId,
      name,
      description: stringValue(product.description),
      price,
      currency: stringValue(product.currency) ?? defaultCurrency(config),
      productUrl: pageUrl,
      imageUrls: Array.isArray(images) ? stateImages(images, pageUrl) : [],
      rawPayload: product,
    },
  ];
}

function extractFromDom(
  $: cheerio.CheerioAPI,
  pageUrl: string,
  config: CrawlerConfig
): ExtractedProductCandidate[] {
  try {
    const text = (selector: string | undefined): string | null => {
      if (!selector) return null;
      return $(selector).first().text().replace(/\s+/g, ' ').trim() || null;
    };

    const name = text(config.productNameSelector ?? 'h1');
    if (!name) return [];

    const priceText = text(config.productPriceSelector);
    const images: string[] = [];
    if (config.productImageSelector) {
      $(config.productImageSelector).each((_, element) => {
        const node = $(element);
        const resolved = resolveUrl(node.attr('src') ?? node.attr('data-src'), pageUrl);
        if (resolved) {
          images.push(resolved);
        }
      });
    }

    return [
      {
        externalId: productIdFromUrl(pageUrl, config),
        name,
        description: text(config.productDescriptionSelector),
        price: parsePrice(priceText),
        currency: defaultCurrency(config),
        productUrl: pageUrl,
        imageUrls: images,
        rawPayload: { source: 'dom', name, priceText },
      },
    ];
  } catch (error) {
    logger.debug('DOM extraction failed', { url: pageUrl, error: errorMessage(error) });
    return [];
  }
}

/**
 * First capture group of `customSettings.productIdPattern` applied to the URL
 */
function productIdFromUrl(url: string, config: CrawlerConfig): string | null {
  const pattern = getCustomSetting(config, 'productIdPattern');
  if (!pattern) return null;

  const [regex] = compilePatterns([pattern]);
  const match = regex?.exec(url);
  return match?.[1] ?? null;
}

function stateImages(entries: unknown[], pageUrl: string): string[] {
  const urls: string[] = [];
  for (const entry of entries) {
    const raw = typeof entry === 'string'
      ? entry
      : isObject(entry) ? stringValue(entry.url) ?? stringValue(entry.src) : null;
    const resolved = raw ? resolveUrl(raw, pageUrl) : null;
    if (resolved) {
      urls.push(resolved);
    }
  }
  return urls;
}

function defaultCurrency(config: CrawlerConfig): string {
  return getCustomSetting(config, 'defaultCurrency') ?? FALLBACK_CURRENCY;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringValue(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed || null;
}
