/**
 * Job Runner
 * Executes one claimed crawl job: discovery, the page loop, persistence and
 * the final status write
 *
 * While a job runs, two timers sit next to the page loop:
 * - heartbeat: renews the lease; losing it stops the run
 * - status watcher: stops the run once an operator paused or canceled the job
 */

import { CrawlerConfig, parseCrawlerConfig } from '../crawler/crawler-config.js';
import { failedPage } from '../crawler/strategies/crawler-strategy.js';
import { CrawlerStrategy, StrategyRegistry } from '../crawler/strategies/index.js';
import { capUrls } from '../crawler/url-discoverer.js';
import { JobStore } from '../database/job-store.js';
import { truncateErrorMessage } from '../jobs/job-state-machine.js';
import { CrawlJob, CrawlPageResult, Provider } from '../types/index.js';
import { config } from '../utils/config.js';
import { errorMessage, JobFatalError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { captureError, setJobContext } from '../utils/sentry.js';
import { sleep } from '../utils/sleep.js';
import { CrawlFrontier } from './crawl-frontier.js';
import { LeaseManager, ReleaseStatus } from './lease-manager.js';

export type JobRunOutcome = 'succeeded' | 'failed' | 'paused' | 'canceled' | 'lease-lost' | 'interrupted';

type StopReason = 'paused' | 'canceled' | 'lease-lost' | 'interrupted';

export interface JobRunnerOptions {
  store: JobStore;
  leases: LeaseManager;
  strategies: StrategyRegistry;
  workerId: string;
  leaseRenewalIntervalMs?: number;
  statusPollIntervalMs?: number;
  /** Page bound for jobs without their own maxPages */
  maxPagesPerJob?: number;
}

interface RunStats {
  pagesSucceeded: number;
  pagesFailed: number;
  pagesSkipped: number;
  productsExtracted: number;
}

/**
 * Stop flag plus the abort signal every wait in the run listens to
 */
class RunControl {
  private readonly controller = new AbortController();
  private reason: StopReason | null = null;

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  stop(reason: StopReason): void {
    if (this.reason) return;
    this.reason = reason;
    this.controller.abort();
  }

  stopReason(): StopReason | null {
    return this.reason;
  }
}

export class JobRunner {
  private readonly store: JobStore;
  private readonly leases: LeaseManager;
  private readonly strategies: StrategyRegistry;
  private readonly workerId: string;
  private readonly leaseRenewalIntervalMs: number;
  private readonly statusPollIntervalMs: number;
  private readonly maxPagesPerJob: number;

  constructor(options: JobRunnerOptions) {
    this.store = options.store;
    this.leases = options.leases;
    this.strategies = options.strategies;
    this.workerId = options.workerId;
    this.leaseRenewalIntervalMs = options.leaseRenewalIntervalMs ?? config.worker.leaseRenewalIntervalMs;
    this.statusPollIntervalMs = options.statusPollIntervalMs ?? config.worker.statusPollIntervalMs;
    this.maxPagesPerJob = options.maxPagesPerJob ?? config.worker.maxPagesPerJob;
  }

  /**
   * Runs a job this worker holds the lease for.
   *
   * Aborting `signal` interrupts the run without a status write; the lease
   * then expires and another worker picks the job up.
   */
  async run(job: CrawlJob, signal?: AbortSignal): Promise<JobRunOutcome> {
    const startTime = Date.now();
    const control = new RunControl();
    const stats: RunStats = { pagesSucceeded: 0, pagesFailed: 0, pagesSkipped: 0, productsExtracted: 0 };

    const onInterrupt = (): void => control.stop('interrupted');
    if (signal?.aborted) {
      control.stop('interrupted');
    } else {
      signal?.addEventListener('abort', onInterrupt, { once: true });
    }

    setJobContext(job.id, job.providerId);
    logger.info('Starting crawl job', { jobId: job.id, providerId: job.providerId, workerId: this.workerId });

    const heartbeat = setInterval(() => {
      this.leases
        .renew(job.id, this.workerId)
        .then(async (renewed) => {
          if (renewed) return;
          // Still running under our name but the renewal kept losing its write
          if (await this.checkStatus(job.id, control)) {
            control.stop('lease-lost');
          }
        })
        .catch((error: unknown) => {
          logger.warn('Lease renewal failed, stopping job', { jobId: job.id, error: errorMessage(error) });
          control.stop('lease-lost');
        });
    }, this.leaseRenewalIntervalMs);

    const watcher = setInterval(() => {
      this.checkStatus(job.id, control).catch((error: unknown) => {
        logger.warn('Job status check failed', { jobId: job.id, error: errorMessage(error) });
      });
    }, this.statusPollIntervalMs);

    try {
      await this.crawl(job, control, stats);

      const stopped = control.stopReason();
      if (stopped) {
        return this.stopped(job, stopped, stats, startTime);
      }

      const outcome = await this.finish(job, 'succeeded');
      logger.info('Crawl job finished', {
        jobId: job.id,
        outcome,
        ...stats,
        durationMs: Date.now() - startTime,
      });
      return outcome;
    } catch (error) {
      const stopped = control.stopReason();
      if (stopped) {
        return this.stopped(job, stopped, stats, startTime);
      }

      const message = truncateErrorMessage(errorMessage(error));
      logger.error('Crawl job failed', { jobId: job.id, error: message, ...stats });
      captureError(error, { jobId: job.id, providerId: job.providerId, workerId: this.workerId });
      return this.finish(job, 'failed', message);
    } finally {
      clearInterval(heartbeat);
      clearInterval(watcher);
      signal?.removeEventListener('abort', onInterrupt);
      setJobContext(null);
    }
  }

  private async crawl(job: CrawlJob, control: RunControl, stats: RunStats): Promise<void> {
    const provider = await this.store.getProvider(job.providerId);
    if (!provider) {
      throw new JobFatalError(`Provider ${job.providerId} not found`);
    }

    const crawlerConfig = parseCrawlerConfig(provider.crawlerConfig, { jobId: job.id, providerId: provider.id });
    const strategy = this.strategies.resolve(crawlerConfig.crawlerType);
    const maxPages = job.maxPages ?? this.maxPagesPerJob;

    const discovered = await strategy.discoverUrls(job.startUrl, job.sitemapUrl, crawlerConfig, control.signal);
    const done = await this.store.getSucceededPageUrls(job.id);

    const frontier = new CrawlFrontier(maxPages, done);
    let queued = frontier.add(capUrls(discovered, maxPages));
    if (done.size > 0) {
      // Links followed by an earlier run are not rediscovered from the start URL
      queued += frontier.add(await this.store.getDiscoveredLinks(job.id));
    }
    stats.pagesSkipped = frontier.admitted - queued;

    logger.info('URLs discovered for crawl job', {
      jobId: job.id,
      strategy: strategy.type,
      discovered: discovered.length,
      queued,
      alreadyCrawled: stats.pagesSkipped,
      maxPages,
      concurrency: crawlerConfig.maxConcurrency,
    });

    const lane = async (): Promise<void> => {
      for (;;) {
        const url = await frontier.next();
        if (url === null) return;

        let discoveredUrls: string[] = [];
        try {
          if (control.stopReason() || !(await this.checkStatus(job.id, control))) {
            frontier.close();
            return;
          }

          const result = await this.processPage(job, provider, url, strategy, crawlerConfig, control);
          if (!result) {
            frontier.close();
            return;
          }
          if (result.success) {
            stats.pagesSucceeded++;
          } else {
            stats.pagesFailed++;
          }
          stats.productsExtracted += result.products.length;
          discoveredUrls = result.discoveredUrls;
        } catch (error) {
          frontier.close();
          throw error;
        } finally {
          frontier.complete(discoveredUrls);
        }

        await sleep(strategy.politenessDelayMs?.(crawlerConfig) ?? crawlerConfig.requestDelayMs, control.signal);
      }
    };

    const lanes = await Promise.allSettled(
      Array.from({ length: crawlerConfig.maxConcurrency }, () => lane())
    );
    const failure = lanes.find((settled) => settled.status === 'rejected');
    if (failure && failure.status === 'rejected') {
      throw failure.reason;
    }
  }

  /**
   * Fetches one page and persists its row and products.
   * A fetch cut short by a stop is rethrown and leaves no row behind; a fetch
   * that finished after the job was paused, canceled or taken over is dropped
   * (null), so the next run fetches it again.
   */
  private async processPage(
    job: CrawlJob,
    provider: Provider,
    url: string,
    strategy: CrawlerStrategy,
    crawlerConfig: CrawlerConfig,
    control: RunControl
  ): Promise<CrawlPageResult | null> {
    const { signal } = control;
    let result: CrawlPageResult;
    try {
      result = await strategy.fetchAndExtract(url, crawlerConfig, signal);
    } catch (error) {
      if (signal.aborted) throw error;
      logger.warn('Strategy threw while fetching page', { jobId: job.id, url, error: errorMessage(error) });
      result = failedPage(url, errorMessage(error));
    }

    if (control.stopReason() || !(await this.checkStatus(job.id, control))) {
      logger.debug('Dropping page fetched after the job stopped', { jobId: job.id, url });
      return null;
    }

    await this.store.insertPage({
      jobId: job.id,
      url,
      status: result.success ? 'succeeded' : 'failed',
      httpStatusCode: result.httpStatusCode ?? null,
      errorMessage: result.error ? truncateErrorMessage(result.error) : null,
      contentHash: result.contentHash ?? null,
      discoveredUrls: result.success ? result.discoveredUrls : [],
      fetchedAt: new Date(),
    });

    if (result.products.length > 0) {
      await this.store.insertExtractedProducts(
        result.products.map((product) => ({
          jobId: job.id,
          providerId: provider.id,
          externalId: product.externalId,
          name: product.name,
          description: product.description,
          price: product.price,
          currency: product.currency,
          productUrl: product.productUrl,
          imageUrls: product.imageUrls,
          rawPayload: product.rawPayload,
        }))
      );
    }

    if (result.success) {
      logger.debug('Page crawled', { jobId: job.id, url, products: result.products.length });
    } else {
      logger.warn('Page failed', { jobId: job.id, url, status: result.httpStatusCode, error: result.error });
    }

    return result;
  }

  /**
   * Stops the run when the job left running or changed hands.
   * @returns true while the job is still ours to run
   */
  private async checkStatus(jobId: number, control: RunControl): Promise<boolean> {
    const current = await this.store.getJob(jobId);

    if (current && (current.status === 'paused' || current.status === 'canceled')) {
      control.stop(current.status);
      return false;
    }
    if (!current || current.status !== 'running' || current.leaseOwner !== this.workerId) {
      control.stop('lease-lost');
      return false;
    }
    return true;
  }

  /**
   * Owner-guarded final write; a job paused, canceled or reclaimed in the
   * meantime keeps the status someone else gave it
   */
  private async finish(job: CrawlJob, to: ReleaseStatus, message?: string): Promise<JobRunOutcome> {
    const released = await this.leases.release(job.id, this.workerId, to, { errorMessage: message });
    if (released) {
      return to === 'succeeded' ? 'succeeded' : 'failed';
    }

    const current = await this.store.getJob(job.id);
    if (current && (current.status === 'paused' || current.status === 'canceled')) {
      return current.status;
    }
    return 'lease-lost';
  }

  private stopped(job: CrawlJob, reason: StopReason, stats: RunStats, startTime: number): JobRunOutcome {
    const meta = { jobId: job.id, reason, ...stats, durationMs: Date.now() - startTime };
    if (reason === 'lease-lost') {
      logger.warn('Crawl job stopped, lease lost', meta);
    } else {
      logger.info('Crawl job stopped', meta);
    }
    return reason;
  }
}
