/**
 * Job Control
 * Operator actions on crawl jobs. Every status change goes through the
 * conditional transition, so these are safe to call while workers run.
 */

import { JobStore } from '../database/job-store.js';
import {
  CrawlJob,
  CrawlPage,
  JobListFilter,
  JobListResult,
  JobProgress,
  JobStats,
} from '../types/index.js';
import {
  InvalidTransitionError,
  JobActiveError,
  NotFoundError,
  ValidationError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ACTIVE_STATUSES, RETRYABLE_STATUSES } from './job-state-machine.js';
import { transitionJob } from './job-transitions.js';

export const RECENT_PAGES_LIMIT = 20;

export interface CreateJobInput {
  providerId: number;
  /** Defaults to the provider's website URL */
  startUrl?: string | null;
  sitemapUrl?: string | null;
  maxPages?: number | null;
}

export interface JobDetails {
  job: CrawlJob;
  progress: JobProgress;
  recentPages: CrawlPage[];
}

export class JobControl {
  constructor(private readonly store: JobStore) {}

  async create(input: CreateJobInput): Promise<CrawlJob> {
    const provider = await this.store.getProvider(input.providerId);
    if (!provider) {
      throw new ValidationError(`Provider ${input.providerId} not found`);
    }

    const startUrl = input.startUrl?.trim() || provider.websiteUrl?.trim();
    if (!startUrl) {
      throw new ValidationError('startUrl is required when the provider has no website URL');
    }

    const job = await this.store.createJob({
      providerId: provider.id,
      startUrl,
      sitemapUrl: input.sitemapUrl?.trim() || null,
      maxPages: input.maxPages ?? null,
    });

    logger.info('Crawl job created', { jobId: job.id, providerId: provider.id, startUrl });
    return job;
  }

  async cancel(jobId: number): Promise<CrawlJob> {
    const job = await transitionJob(this.store, jobId, 'canceled');
    logger.info('Crawl job canceled', { jobId });
    return job;
  }

  /** Only running jobs can be paused; the worker stops at its next status check */
  async pause(jobId: number): Promise<CrawlJob> {
    const job = await transitionJob(this.store, jobId, 'paused');
    logger.info('Crawl job paused', { jobId });
    return job;
  }

  /** Puts a paused job back in the queue; the next claim continues where it stopped */
  async resume(jobId: number): Promise<CrawlJob> {
    const job = await transitionJob(this.store, jobId, 'queued');
    logger.info('Crawl job resumed', { jobId });
    return job;
  }

  /**
   * Queues a fresh copy of a failed or canceled job. The original is left as is.
   */
  async retry(jobId: number): Promise<CrawlJob> {
    const original = await this.requireJob(jobId);
    if (!RETRYABLE_STATUSES.includes(original.status)) {
      throw new InvalidTransitionError(jobId, original.status, 'queued');
    }

    const job = await this.store.createJob({
      providerId: original.providerId,
      startUrl: original.startUrl,
      sitemapUrl: original.sitemapUrl,
      maxPages: original.maxPages,
    });

    logger.info('Crawl job retried', { jobId: job.id, retriedFrom: jobId });
    return job;
  }

  /**
   * Removes a job and its pages. Extracted products stay for review.
   */
  async delete(jobId: number): Promise<void> {
    const job = await this.requireJob(jobId);

    const deleted = await this.store.deleteJobUnlessStatus(jobId, ACTIVE_STATUSES);
    if (!deleted) {
      // The conditional delete decides; re-read to report why it refused
      const current = await this.store.getJob(jobId);
      if (!current) {
        throw new NotFoundError(`Crawl job ${jobId} not found`);
      }
      throw new JobActiveError(jobId, current.status);
    }

    logger.info('Crawl job deleted', { jobId, status: job.status });
  }

  async list(filter: JobListFilter): Promise<JobListResult> {
    return this.store.listJobs(filter);
  }

  async get(jobId: number): Promise<JobDetails> {
    const job = await this.requireJob(jobId);
    const [progress, recentPages] = await Promise.all([
      this.store.getJobProgress(jobId),
      this.store.listPages(jobId, RECENT_PAGES_LIMIT),
    ]);
    return { job, progress, recentPages };
  }

  async stats(): Promise<JobStats> {
    const counts = await this.store.countJobsByStatus();
    const total = Object.values(counts).reduce((sum, count) => sum + count, 0);
    return { ...counts, total };
  }

  private async requireJob(jobId: number): Promise<CrawlJob> {
    const job = await this.store.getJob(jobId);
    if (!job) {
      throw new NotFoundError(`Crawl job ${jobId} not found`);
    }
    return job;
  }
}
