/**
 * Link Extractor
 * Extracts and normalizes links from HTML content for crawling
 */

import * as cheerio from 'cheerio';
import { CrawlerConfig } from './crawler-config.js';
import { canonicalizeUrl, isSameDomain, resolveUrl } from '../utils/canonicalize.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Same-domain anchor targets plus anything matched by the pagination selector.
 * Query strings and fragments are stripped; the result is deduplicated.
 */
export function extractLinks(html: string, pageUrl: string, config: CrawlerConfig): string[] {
  const $ = cheerio.load(html);
  const links = new Set<string>();

  $('a[href]').each((_, element) => {
    const absoluteUrl = resolveUrl($(element).attr('href'), pageUrl);
    if (absoluteUrl && isSameDomain(absoluteUrl, pageUrl)) {
      links.add(canonicalizeUrl(absoluteUrl));
    }
  });

  if (config.paginationSelector) {
    for (const link of extractPaginationLinks($, pageUrl, config.paginationSelector)) {
      links.add(link);
    }
  }

  return [...links];
}

/**
 * Resolved href of every element matching `selector`; an invalid selector yields nothing
 */
export function extractPaginationLinks(
  $: cheerio.CheerioAPI,
  pageUrl: string,
  selector: string
): string[] {
  const links: string[] = [];

  try {
    $(selector).each((_, element) => {
      const absoluteUrl = resolveUrl($(element).attr('href'), pageUrl);
      if (absoluteUrl) {
        links.push(canonicalizeUrl(absoluteUrl));
      }
    });
  } catch (error) {
    logger.warn('Error extracting pagination links', { selector, error: errorMessage(error) });
    return [];
  }

  return links;
}

/**
 * Extracts the page title from HTML content
 * @returns Page title or undefined if not found
 */
export function extractPageTitle(html: string): string | undefined {
  const title = cheerio.load(html)('title').first().text().replace(/\s+/g, ' ').trim();
  return title || undefined;
}
