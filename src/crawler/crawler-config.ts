import { z } from 'zod';
import { logger } from '../utils/logger.js';

export const DEFAULT_USER_AGENT = 'CatalogCrawlerBot/1.0 (+https://catalog-crawler.dev/bot)';

const optionalSelector = z.string().trim().min(1).optional();

// Stored settings may hold numbers or booleans; strategies read them as strings
const customSettingValue = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

export const CrawlerConfigSchema = z.object({
  // Unknown types are resolved to generic by the strategy registry
  crawlerType: z.string().trim().min(1).default('generic'),
  requestDelayMs: z.number().int().min(0).default(1000),
  maxConcurrency: z.number().int().min(1).max(16).default(2),
  respectRobotsTxt: z.boolean().default(true),
  userAgent: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  productContainerSelector: optionalSelector,
  productLinkSelector: optionalSelector,
  productNameSelector: optionalSelector,
  productPriceSelector: optionalSelector,
  productDescriptionSelector: optionalSelector,
  productImageSelector: optionalSelector,
  paginationSelector: optionalSelector,
  includePatterns: z.array(z.string()).default([]),
  excludePatterns: z.array(z.string()).default([]),
  customSettings: z.record(z.string(), customSettingValue).default({}),
});

export type CrawlerConfig = z.infer<typeof CrawlerConfigSchema>;

export function defaultCrawlerConfig(): CrawlerConfig {
  return CrawlerConfigSchema.parse({});
}

/**
 * Parses a provider's stored crawler configuration.
 *
 * Accepts the JSON text or an already-decoded object. Missing, unparseable
 * or invalid configuration falls back to the defaults with a warning, so a
 * bad provider record never blocks its crawl.
 */
export function parseCrawlerConfig(raw: unknown, context: Record<string, unknown> = {}): CrawlerConfig {
  if (raw === null || raw === undefined || raw === '') {
    return defaultCrawlerConfig();
  }

  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch (error) {
      logger.warn('Crawler config is not valid JSON, using defaults', {
        ...context,
        error: error instanceof Error ? error.message : String(error),
      });
      return defaultCrawlerConfig();
    }
  }

  const result = CrawlerConfigSchema.safeParse(value);
  if (!result.success) {
    logger.warn('Crawler config failed validation, using defaults', {
      ...context,
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
    return defaultCrawlerConfig();
  }

  return result.data;
}

/**
 * Non-empty custom setting, trimmed
 */
export function getCustomSetting(config: CrawlerConfig, key: string): string | undefined {
  const value = config.customSettings[key]?.trim();
  return value ? value : undefined;
}

/**
 * Positive integer custom setting, or undefined when absent or malformed
 */
export function getCustomIntSetting(config: CrawlerConfig, key: string): number | undefined {
  const raw = getCustomSetting(config, key);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}
