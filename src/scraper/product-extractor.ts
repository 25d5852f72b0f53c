/**
 * Product Extractor
 *
 * Layers, in order:
 *   1. JSON-LD structured data
 *   2. Configured CSS selectors (only with productContainerSelector)
 *   3. OpenGraph meta tags, only when 1 and 2 found nothing
 *
 * Results are deduplicated by SKU, else by canonical product URL.
 */

import * as cheerio from 'cheerio';
import { CrawlerConfig, getCustomSetting } from '../crawler/crawler-config.js';
import { ExtractedProductCandidate } from '../types/index.js';
import { canonicalizeUrl, resolveUrl } from '../utils/canonicalize.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parsePrice } from './price-parser.js';

export const FALLBACK_CURRENCY = 'EUR';

type JsonObject = Record<string, unknown>;

export function extractProducts(
  html: string,
  pageUrl: string,
  config: CrawlerConfig
): ExtractedProductCandidate[] {
  const $ = cheerio.load(html);
  const defaultCurrency = getCustomSetting(config, 'defaultCurrency') ?? FALLBACK_CURRENCY;
  const products: ExtractedProductCandidate[] = [];

  const fromJsonLd = extractFromJsonLd($, pageUrl, defaultCurrency);
  if (fromJsonLd.length > 0) {
    logger.debug('Extracted products from JSON-LD', { url: pageUrl, count: fromJsonLd.length });
    products.push(...fromJsonLd);
  }

  if (config.productContainerSelector) {
    const fromSelectors = extractWithSelectors($, pageUrl, config, defaultCurrency);
    if (fromSelectors.length > 0) {
      logger.debug('Extracted products with selectors', { url: pageUrl, count: fromSelectors.length });
      products.push(...fromSelectors);
    }
  }

  if (products.length === 0) {
    const fromOpenGraph = extractFromOpenGraph($, pageUrl, defaultCurrency);
    if (fromOpenGraph) {
      logger.debug('Extracted product from OpenGraph', { url: pageUrl });
      products.push(fromOpenGraph);
    }
  }

  return dedupeProducts(products, pageUrl);
}

/**
 * Keeps the first candidate; a later one is dropped when it shares either
 * its `sku:<externalId>` or its `url:<canonical productUrl>` key with any
 * candidate seen before.
 *
 * Items whose URL is only the `pageUrl` fallback get no URL key, so SKU-distinct
 * items on one listing page stay apart.
 */
export function dedupeProducts(
  products: ExtractedProductCandidate[],
  pageUrl?: string
): ExtractedProductCandidate[] {
  const fallbackKey = pageUrl ? urlKey(pageUrl) : null;
  const seen = new Set<string>();
  const result: ExtractedProductCandidate[] = [];

  for (const product of products) {
    const keys = dedupeKeys(product, fallbackKey);
    if (keys.some((key) => seen.has(key))) continue;

    for (const key of keys) seen.add(key);
    result.push(product);
  }

  return result;
}

function dedupeKeys(product: ExtractedProductCandidate, fallbackKey: string | null): string[] {
  const keys: string[] = [];
  if (product.externalId) {
    keys.push(`sku:${product.externalId}`.toLowerCase());
  }
  const url = product.productUrl ? urlKey(product.productUrl) : null;
  // Without a SKU the URL is the only identity, fallback or not
  if (url && (url !== fallbackKey || keys.length === 0)) {
    keys.push(url);
  }
  return keys;
}

function urlKey(url: string): string {
  return `url:${canonicalizeUrl(url)}`.toLowerCase();
}

// JSON-LD

function extractFromJsonLd(
  $: cheerio.CheerioAPI,
  pageUrl: string,
  defaultCurrency: string
): ExtractedProductCandidate[] {
  const products: ExtractedProductCandidate[] = [];

  $('script[type="application/ld+json"]').each((_, element) => {
    const json = $(element).text().trim();
    if (!json) return;

    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (error) {
      logger.debug('Skipping malformed JSON-LD block', { url: pageUrl, error: errorMessage(error) });
      return;
    }

    for (const item of jsonLdItems(data)) {
      const product = parseJsonLdProduct(item, pageUrl, defaultCurrency);
      if (product) {
        products.push(product);
      }
    }
  });

  return products;
}

function jsonLdItems(data: unknown): JsonObject[] {
  if (Array.isArray(data)) {
    return data.filter(isObject);
  }
  if (!isObject(data)) {
    return [];
  }
  const graph = data['@graph'];
  if (Array.isArray(graph)) {
    return graph.filter(isObject);
  }
  return [data];
}

function isProductType(type: unknown): boolean {
  const types = Array.isArray(type) ? type : [type];
  return types.some((value) => typeof value === 'string' && value.toLowerCase() === 'product');
}

function parseJsonLdProduct(
  item: JsonObject,
  pageUrl: string,
  defaultCurrency: string
): ExtractedProductCandidate | null {
  if (!isProductType(item['@type'])) return null;

  const name = stringValue(item.name);
  if (!name) return null;

  const offer = firstOffer(item.offers);
  const price = offer ? parsePrice(priceValue(offer.price)) : null;
  const currency = offer ? stringValue(offer.priceCurrency) : null;
  const url = stringValue(item.url);

  return {
    externalId: stringValue(item.sku) ?? numberAsString(item.sku),
    name,
    description: stringValue(item.description),
    price,
    currency: currency ?? defaultCurrency,
    productUrl: (url ? resolveUrl(url, pageUrl) : null) ?? pageUrl,
    imageUrls: jsonLdImages(item.image, pageUrl),
    rawPayload: item,
  };
}

function firstOffer(offers: unknown): JsonObject | null {
  const offer = Array.isArray(offers) ? offers[0] : offers;
  return isObject(offer) ? offer : null;
}

function priceValue(value: unknown): string | number | null {
  return typeof value === 'string' || typeof value === 'number' ? value : null;
}

function jsonLdImages(image: unknown, pageUrl: string): string[] {
  const entries = Array.isArray(image) ? image : [image];
  const urls: string[] = [];

  for (const entry of entries) {
    const raw = typeof entry === 'string' ? entry : isObject(entry) ? stringValue(entry.url) : null;
    const resolved = raw ? resolveUrl(raw, pageUrl) : null;
    if (resolved) {
      urls.push(resolved);
    }
  }

  return urls;
}

// Selectors

function extractWithSelectors(
  $: cheerio.CheerioAPI,
  pageUrl: string,
  config: CrawlerConfig,
  defaultCurrency: string
): ExtractedProductCandidate[] {
  const products: ExtractedProductCandidate[] = [];

  try {
    $(config.productContainerSelector ?? '').each((_, element) => {
      const container = $(element);

      const name = selectText(container, config.productNameSelector);
      if (!name) return;

      const priceText = selectText(container, config.productPriceSelector);
      const href = config.productLinkSelector
        ? container.find(config.productLinkSelector).first().attr('href')
        : undefined;

      const images: string[] = [];
      if (config.productImageSelector) {
        container.find(config.productImageSelector).each((_, img) => {
          const node = $(img);
          const src = node.attr('src') ?? node.attr('data-src') ?? node.attr('data-lazy-src');
          const resolved = resolveUrl(src, pageUrl);
          if (resolved) {
            images.push(resolved);
          }
        });
      }

      products.push({
        externalId: null,
        name,
        description: selectText(container, config.productDescriptionSelector),
        price: parsePrice(priceText),
        currency: defaultCurrency,
        productUrl: resolveUrl(href, pageUrl) ?? pageUrl,
        imageUrls: images,
        rawPayload: { source: 'selectors', name, priceText, href: href ?? null },
      });
    });
  } catch (error) {
    // An invalid selector makes the whole layer yield nothing
    logger.warn('Selector extraction failed', { url: pageUrl, error: errorMessage(error) });
    return [];
  }

  return products;
}

interface TextScope {
  find(selector: string): { first(): { text(): string } };
}

function selectText(container: TextScope, selector: string | undefined): string | null {
  if (!selector) return null;
  const text = container.find(selector).first().text().replace(/\s+/g, ' ').trim();
  return text || null;
}

// OpenGraph

function extractFromOpenGraph(
  $: cheerio.CheerioAPI,
  pageUrl: string,
  defaultCurrency: string
): ExtractedProductCandidate | null {
  const meta = (property: string): string | null =>
    $(`meta[property="${property}"]`).first().attr('content')?.trim() || null;

  const ogType = meta('og:type')?.toLowerCase();
  if (ogType !== 'product' && ogType !== 'og:product') return null;

  const name = meta('og:title');
  if (!name) return null;

  const image = meta('og:image');
  const url = meta('og:url');
  const resolvedImage = image ? resolveUrl(image, pageUrl) : null;

  const payload = {
    'og:type': ogType,
    'og:title': name,
    'og:description': meta('og:description'),
    'og:image': image,
    'og:url': url,
    'product:price:amount': meta('product:price:amount'),
    'product:price:currency': meta('product:price:currency'),
  };

  return {
    externalId: null,
    name,
    description: payload['og:description'],
    price: parsePrice(payload['product:price:amount']),
    currency: payload['product:price:currency'] ?? defaultCurrency,
    productUrl: (url ? resolveUrl(url, pageUrl) : null) ?? pageUrl,
    imageUrls: resolvedImage ? [resolvedImage] : [],
    rawPayload: payload,
  };
}

// Helpers

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringValue(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed || null;
}

function numberAsString(value: unknown): string | null {
  return typeof value === 'number' && Number.isFinite(value) ? String(value) : null;
}
