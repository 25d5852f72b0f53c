/**
 * Generic crawler strategy
 * Sitemap discovery with well-known fallbacks, plain HTTP fetching and
 * static HTML extraction
 */

import { HttpClient } from '../../scraper/http-client.js';
import { extractProducts } from '../../scraper/product-extractor.js';
import { CrawlPageResult } from '../../types/index.js';
import { siteRootUrl } from '../../utils/canonicalize.js';
import { errorMessage, FetchError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isAbortError } from '../../utils/sleep.js';
import { CrawlerConfig, getCustomIntSetting } from '../crawler-config.js';
import { extractLinks, extractPageTitle } from '../link-extractor.js';
import { fetchRobotsRules } from '../robots-rules.js';
import { capUrls, dedupeCaseInsensitive, filterUrls, SitemapResolver } from '../url-discoverer.js';
import { contentHash, CrawlerStrategy, failedPage } from './crawler-strategy.js';

const FALLBACK_SITEMAP_PATHS = ['/sitemap.xml', '/sitemap_index.xml', '/robots.txt'];

export class GenericStrategy implements CrawlerStrategy {
  readonly type = 'generic';

  constructor(private readonly http: HttpClient = new HttpClient()) {}

  async discoverUrls(
    startUrl: string,
    sitemapUrl: string | null,
    config: CrawlerConfig,
    signal?: AbortSignal
  ): Promise<string[]> {
    let urls = await this.discoverFromSitemaps(startUrl, sitemapUrl, config, signal);

    if (urls.length === 0) {
      logger.info('No sitemap URLs found, crawling from start URL', { startUrl });
      urls = [startUrl];
    }

    urls = dedupeCaseInsensitive(filterUrls(urls, config.includePatterns, config.excludePatterns));

    if (config.respectRobotsTxt) {
      const robots = await fetchRobotsRules(this.http, startUrl, config.userAgent, signal);
      const allowed = urls.filter((url) => robots.isAllowed(url));
      if (allowed.length < urls.length) {
        logger.info('Dropped URLs disallowed by robots.txt', { startUrl, dropped: urls.length - allowed.length });
      }
      urls = allowed;
    }

    return capUrls(urls, getCustomIntSetting(config, 'maxPages'));
  }

  async fetchAndExtract(url: string, config: CrawlerConfig, signal?: AbortSignal): Promise<CrawlPageResult> {
    try {
      const response = await this.http.getText(url, { userAgent: config.userAgent, signal });

      if (response.status < 200 || response.status >= 300) {
        return failedPage(url, `HTTP ${response.status}: ${response.statusText}`, response.status);
      }

      const html = response.data;
      return {
        url,
        success: true,
        httpStatusCode: response.status,
        contentHash: contentHash(html),
        title: extractPageTitle(html),
        products: extractProducts(html, url, config),
        discoveredUrls: extractLinks(html, url, config),
      };
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) throw error;

      logger.warn('Page fetch failed', { url, error: errorMessage(error) });
      return failedPage(url, errorMessage(error), error instanceof FetchError ? error.httpStatusCode : undefined);
    }
  }

  /**
   * Tries the job's sitemap, then the well-known locations at the site root,
   * stopping at the first source that yields URLs
   */
  private async discoverFromSitemaps(
    startUrl: string,
    sitemapUrl: string | null,
    config: CrawlerConfig,
    signal?: AbortSignal
  ): Promise<string[]> {
    const resolver = new SitemapResolver(this.http, { userAgent: config.userAgent });
    const sources = [
      ...(sitemapUrl ? [sitemapUrl] : []),
      ...FALLBACK_SITEMAP_PATHS.map((path) => siteRootUrl(startUrl, path)),
    ];

    for (const source of sources) {
      try {
        const urls = await resolver.resolve(source, signal);
        if (urls.length > 0) {
          logger.info('Discovered URLs from sitemap', { source, count: urls.length });
          return urls;
        }
        logger.debug('Sitemap source yielded no URLs', { source });
      } catch (error) {
        if (isAbortError(error) || signal?.aborted) throw error;
        logger.debug('Sitemap source unavailable', { source, error: errorMessage(error) });
      }
    }

    return [];
  }
}
