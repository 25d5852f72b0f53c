import { createHash } from 'crypto';
import { CrawlPageResult } from '../../types/index.js';
import { CrawlerConfig } from '../crawler-config.js';

export type CrawlerType = 'generic' | 'browser';

/**
 * One way of turning a provider's site into page results.
 *
 * `fetchAndExtract` reports page-level problems in its result instead of
 * throwing; it only throws when `signal` aborts.
 */
export interface CrawlerStrategy {
  readonly type: CrawlerType;

  discoverUrls(
    startUrl: string,
    sitemapUrl: string | null,
    config: CrawlerConfig,
    signal?: AbortSignal
  ): Promise<string[]>;

  fetchAndExtract(url: string, config: CrawlerConfig, signal?: AbortSignal): Promise<CrawlPageResult>;

  /** Pause after each page; the runner waits `config.requestDelayMs` when absent */
  politenessDelayMs?(config: CrawlerConfig): number;
}

export function contentHash(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

export function failedPage(url: string, error: string, httpStatusCode?: number): CrawlPageResult {
  return {
    url,
    success: false,
    httpStatusCode,
    error,
    products: [],
    discoveredUrls: [],
  };
}
