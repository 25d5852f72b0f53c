#!/usr/bin/env node

import { BrowserRenderedStrategy, GenericStrategy, StrategyRegistry } from './crawler/strategies/index.js';
import { createJobStore, parseStoreKind } from './database/store-factory.js';
import { CrawlWorker } from './scheduler/crawl-worker.js';
import { JobRunner } from './scheduler/job-runner.js';
import { LeaseManager } from './scheduler/lease-manager.js';
import { PuppeteerRenderer } from './scraper/puppeteer-renderer.js';
import { config } from './utils/config.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { captureError, flushSentry } from './utils/sentry.js';

/**
 * Crawl worker process
 *
 * Usage: tsx src/index.ts [--store=supabase|memory] [--once]
 *
 * --once claims and runs at most one job, then exits; otherwise the worker
 * polls on WORKER_POLL_SCHEDULE until SIGINT/SIGTERM.
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const store = createJobStore(parseStoreKind(args));
  const renderer = new PuppeteerRenderer();
  const leases = new LeaseManager(store);
  const runner = new JobRunner({
    store,
    leases,
    strategies: new StrategyRegistry([new GenericStrategy(), new BrowserRenderedStrategy({ renderer })]),
    workerId: config.worker.workerId,
  });
  const worker = new CrawlWorker({ leases, runner, workerId: config.worker.workerId });

  const shutdown = async (reason: string): Promise<void> => {
    logger.info('Crawl worker shutting down', { reason });
    // An interrupted job keeps its lease until it expires, then another worker resumes it
    await worker.stop();
    await renderer.close();
    await flushSentry();
  };

  if (args.includes('--once')) {
    const ran = await worker.runOnce();
    logger.info(ran ? 'Processed one job' : 'No job to claim');
    await shutdown('single run finished');
    return;
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        });
    });
  }

  worker.start();
}

main().catch((error: unknown) => {
  logger.error('Crawl worker failed to start', { error: errorMessage(error) });
  captureError(error, { operation: 'worker startup' });
  flushSentry()
    .catch((flushError: unknown) => {
      logger.error('Failed to flush Sentry', { error: errorMessage(flushError) });
    })
    .finally(() => process.exit(1));
});
