import { JobFatalError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CrawlerStrategy, CrawlerType } from './crawler-strategy.js';

export { BrowserRenderedStrategy } from './browser-rendered-strategy.js';
export type { CrawlerStrategy, CrawlerType } from './crawler-strategy.js';
export { GenericStrategy } from './generic-strategy.js';

/**
 * Strategies by crawler type, built once at startup and handed to the job runner
 */
export class StrategyRegistry {
  private readonly strategies = new Map<CrawlerType, CrawlerStrategy>();

  constructor(strategies: CrawlerStrategy[] = []) {
    for (const strategy of strategies) {
      this.register(strategy);
    }
  }

  register(strategy: CrawlerStrategy): this {
    this.strategies.set(strategy.type, strategy);
    return this;
  }

  has(type: CrawlerType): boolean {
    return this.strategies.has(type);
  }

  /**
   * Strategy for a provider's configured type; unknown or unregistered
   * types fall back to generic
   */
  resolve(crawlerType: string): CrawlerStrategy {
    const strategy = isCrawlerType(crawlerType) ? this.strategies.get(crawlerType) : undefined;
    if (strategy) return strategy;

    const generic = this.strategies.get('generic');
    if (!generic) {
      throw new JobFatalError(`No strategy for crawler type "${crawlerType}" and no generic fallback`);
    }

    logger.warn('Unknown crawler type, falling back to generic', { crawlerType });
    return generic;
  }
}

function isCrawlerType(value: string): value is CrawlerType {
  return value === 'generic' || value === 'browser';
}
