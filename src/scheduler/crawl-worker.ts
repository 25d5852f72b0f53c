/**
 * Crawl Worker
 * Polls for claimable crawl jobs and runs them one at a time
 *
 * Poll schedule format (node-cron, with seconds):
 * ┌────────────── second (0-59)
 * │ ┌──────────── minute (0-59)
 * │ │ ┌────────── hour (0-23)
 * │ │ │ ┌──────── day of month (1-31)
 * │ │ │ │ ┌────── month (1-12)
 * │ │ │ │ │ ┌──── day of week (0-7)
 * │ │ │ │ │ │
 * * * * * * *
 */

import * as cron from 'node-cron';
import { config } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { captureError } from '../utils/sentry.js';
import { JobRunner } from './job-runner.js';
import { LeaseManager } from './lease-manager.js';

export interface CrawlWorkerOptions {
  leases: LeaseManager;
  runner: JobRunner;
  workerId?: string;
  /** Cron expression for the claim poll (default: every 10 seconds) */
  schedule?: string;
}

export class CrawlWorker {
  readonly workerId: string;
  private readonly leases: LeaseManager;
  private readonly runner: JobRunner;
  private readonly schedule: string;
  private task: cron.ScheduledTask | null = null;
  private current: Promise<boolean> | null = null;
  private abortController: AbortController | null = null;
  private stopping = false;

  constructor(options: CrawlWorkerOptions) {
    this.leases = options.leases;
    this.runner = options.runner;
    this.workerId = options.workerId ?? config.worker.workerId;
    this.schedule = options.schedule ?? config.worker.pollSchedule;
  }

  start(): void {
    if (this.task) {
      logger.warn('Crawl worker is already polling', { workerId: this.workerId });
      return;
    }

    if (!cron.validate(this.schedule)) {
      throw new Error(`Invalid cron expression: ${this.schedule}`);
    }

    this.stopping = false;
    this.task = cron.schedule(this.schedule, () => this.poll());

    logger.info('Crawl worker started', { workerId: this.workerId, schedule: this.schedule });
  }

  /**
   * Claims one job and runs it to an outcome.
   * @returns true if a job was claimed
   */
  runOnce(): Promise<boolean> {
    if (this.current) {
      return Promise.resolve(false);
    }

    const run = this.claimAndRun().finally(() => {
      this.current = null;
    });
    this.current = run;
    return run;
  }

  /**
   * Stops polling and interrupts the current run. Its lease is left to
   * expire, after which any worker can reclaim the job.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.task) {
      this.task.stop();
      this.task = null;
    }

    const current = this.current;
    if (current) {
      logger.info('Interrupting current crawl job', { workerId: this.workerId });
      this.abortController?.abort();
      // Failures are reported to whoever started the run
      await current.catch(() => false);
    }

    logger.info('Crawl worker stopped', { workerId: this.workerId });
  }

  get busy(): boolean {
    return this.current !== null;
  }

  private poll(): void {
    if (this.current) {
      logger.debug('Crawl job in progress, skipping poll', { workerId: this.workerId });
      return;
    }

    this.runOnce().catch((error: unknown) => {
      logger.error('Crawl worker poll failed', { workerId: this.workerId, error: errorMessage(error) });
      captureError(error, { workerId: this.workerId });
    });
  }

  private async claimAndRun(): Promise<boolean> {
    if (this.stopping) return false;

    const job = await this.leases.claim(this.workerId);
    if (!job) return false;

    const controller = new AbortController();
    this.abortController = controller;
    try {
      const outcome = await this.runner.run(job, controller.signal);
      logger.info('Crawl job run ended', { jobId: job.id, workerId: this.workerId, outcome });
      return true;
    } finally {
      this.abortController = null;
    }
  }
}
