/**
 * URL Discoverer
 * Expands sitemaps, sitemap indices and robots.txt Sitemap: lines into page URLs,
 * then filters, dedupes and caps them
 */

import * as cheerio from 'cheerio';
import { gunzipSync } from 'zlib';
import { HttpClient } from '../scraper/http-client.js';
import { DiscoveryError, errorMessage, FetchError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { isAbortError } from '../utils/sleep.js';

export const MAX_SITEMAP_FETCHES = 50;

export interface SitemapResolverOptions {
  userAgent?: string;
  maxSitemapFetches?: number;
}

interface ResolveState {
  visited: Set<string>;
  fetches: number;
  urls: string[];
}

export class SitemapResolver {
  private readonly maxSitemapFetches: number;

  constructor(
    private readonly http: HttpClient,
    private readonly options: SitemapResolverOptions = {}
  ) {
    this.maxSitemapFetches = options.maxSitemapFetches ?? MAX_SITEMAP_FETCHES;
  }

  /**
   * Page URLs reachable from a sitemap, sitemap index or robots.txt.
   *
   * Nested documents that fail are logged and skipped; a failure of `url`
   * itself throws DiscoveryError so the caller can try its next source.
   */
  async resolve(url: string, signal?: AbortSignal): Promise<string[]> {
    const state: ResolveState = { visited: new Set(), fetches: 0, urls: [] };
    await this.resolveInto(url, state, true, signal);
    return state.urls;
  }

  private async resolveInto(
    url: string,
    state: ResolveState,
    topLevel: boolean,
    signal?: AbortSignal
  ): Promise<void> {
    if (state.visited.has(url)) {
      logger.debug('Sitemap already visited, skipping', { url });
      return;
    }
    if (state.fetches >= this.maxSitemapFetches) {
      logger.warn('Sitemap fetch budget exhausted', { url, budget: this.maxSitemapFetches });
      return;
    }
    state.visited.add(url);
    state.fetches++;

    let body: string;
    try {
      body = await this.fetchDocument(url, signal);
    } catch (error) {
      if (isAbortError(error)) throw error;
      if (topLevel) {
        throw new DiscoveryError(`Failed to fetch ${url}: ${errorMessage(error)}`, url, { cause: error });
      }
      logger.warn('Skipping unreadable nested sitemap', { url, error: errorMessage(error) });
      return;
    }

    if (isRobotsTxt(url)) {
      for (const sitemapUrl of parseRobotsSitemaps(body)) {
        await this.resolveInto(sitemapUrl, state, false, signal);
      }
      return;
    }

    const parsed = parseSitemapXml(body);
    if (!parsed) {
      if (topLevel) {
        throw new DiscoveryError(`${url} is not a sitemap document`, url);
      }
      logger.warn('Skipping nested document that is not a sitemap', { url });
      return;
    }

    state.urls.push(...parsed.pageUrls);
    for (const nested of parsed.sitemapUrls) {
      await this.resolveInto(nested, state, false, signal);
    }
  }

  private async fetchDocument(url: string, signal?: AbortSignal): Promise<string> {
    const response = await this.http.getBuffer(url, { userAgent: this.options.userAgent, signal });
    if (response.status < 200 || response.status >= 300) {
      throw new FetchError(`HTTP ${response.status}: ${response.statusText}`, url, response.status);
    }
    return decodeBody(response.data);
  }
}

function isRobotsTxt(url: string): boolean {
  try {
    return new URL(url).pathname.toLowerCase().endsWith('robots.txt');
  } catch {
    return false;
  }
}

/**
 * Decodes a sitemap payload, gunzipping it when it starts with the gzip magic bytes
 */
export function decodeBody(data: Buffer): string {
  if (data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b) {
    return gunzipSync(data).toString('utf-8');
  }
  return data.toString('utf-8');
}

export function parseRobotsSitemaps(text: string): string[] {
  const urls: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = line.match(/^\s*sitemap\s*:\s*(\S+)/i);
    if (match) {
      urls.push(match[1]);
    }
  }
  return urls;
}

/**
 * @returns null when the document is neither a urlset nor a sitemap index
 */
export function parseSitemapXml(xml: string): { pageUrls: string[]; sitemapUrls: string[] } | null {
  const $ = cheerio.load(xml, { xml: true });
  const isIndex = $('sitemapindex').length > 0;
  const isUrlset = $('urlset').length > 0;

  if (!isIndex && !isUrlset) {
    return null;
  }

  const locs = (selector: string): string[] =>
    $(selector)
      .map((_, element) => $(element).text().trim())
      .get()
      .filter((loc) => loc.length > 0);

  return {
    sitemapUrls: locs('sitemapindex > sitemap > loc'),
    pageUrls: locs('urlset > url > loc'),
  };
}

/**
 * Compiles case-insensitive URL patterns; invalid ones are logged and ignored
 */
export function compilePatterns(patterns: string[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern, 'i'));
    } catch (error) {
      logger.warn('Ignoring invalid URL pattern', { pattern, error: errorMessage(error) });
    }
  }
  return compiled;
}

/**
 * Drops URLs matching any exclude pattern, then keeps only URLs matching an
 * include pattern (when any valid include pattern is configured)
 */
export function filterUrls(urls: string[], includePatterns: string[], excludePatterns: string[]): string[] {
  const include = compilePatterns(includePatterns);
  const exclude = compilePatterns(excludePatterns);

  return urls.filter((url) => {
    if (exclude.some((pattern) => pattern.test(url))) return false;
    if (include.length > 0 && !include.some((pattern) => pattern.test(url))) return false;
    return true;
  });
}

/**
 * Case-insensitive dedupe that keeps the first spelling seen
 */
export function dedupeCaseInsensitive(urls: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const url of urls) {
    const key = url.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(url);
    }
  }
  return result;
}

export function capUrls(urls: string[], maxPages: number | null | undefined): string[] {
  return maxPages && maxPages > 0 ? urls.slice(0, maxPages) : urls;
}
