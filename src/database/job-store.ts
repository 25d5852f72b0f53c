import {
  CrawlJob,
  CrawlJobPatch,
  CrawlJobStatus,
  CrawlPage,
  ExtractedProduct,
  JobListFilter,
  JobListResult,
  JobProgress,
  NewCrawlJob,
  NewCrawlPage,
  NewExtractedProduct,
  Provider,
} from '../types/index.js';

/**
 * Persistence boundary shared by every worker process.
 *
 * Every write that touches job status or lease fields goes through
 * `compareAndSwapJob`, which must be a single conditional update keyed on
 * `(id, version)`. Implementations never read-then-write a job row.
 */
export interface JobStore {
  // Jobs
  createJob(input: NewCrawlJob): Promise<CrawlJob>;
  getJob(jobId: number): Promise<CrawlJob | null>;
  listJobs(filter: JobListFilter): Promise<JobListResult>;
  countJobsByStatus(): Promise<Record<CrawlJobStatus, number>>;

  /**
   * Queued jobs and running jobs whose lease expired before `now`, oldest first
   */
  findClaimCandidates(now: Date, limit: number): Promise<CrawlJob[]>;

  /**
   * Applies `patch` only if the row still has `expectedVersion`; bumps the version.
   * @returns The updated job, or null when another writer got there first
   */
  compareAndSwapJob(
    jobId: number,
    expectedVersion: number,
    patch: CrawlJobPatch
  ): Promise<CrawlJob | null>;

  /**
   * Deletes the job (and its pages) unless its status is one of `protectedStatuses`.
   * Extracted products survive with their job reference cleared.
   * @returns true if a row was deleted
   */
  deleteJobUnlessStatus(jobId: number, protectedStatuses: readonly CrawlJobStatus[]): Promise<boolean>;

  // Pages
  insertPage(page: NewCrawlPage): Promise<CrawlPage>;
  /** Most recent first */
  listPages(jobId: number, limit?: number): Promise<CrawlPage[]>;
  getSucceededPageUrls(jobId: number): Promise<Set<string>>;
  /** Links recorded on the job's succeeded pages, in fetch order */
  getDiscoveredLinks(jobId: number): Promise<string[]>;
  getJobProgress(jobId: number): Promise<JobProgress>;

  // Extracted products
  insertExtractedProducts(products: NewExtractedProduct[]): Promise<number>;
  listExtractedProducts(jobId: number): Promise<ExtractedProduct[]>;

  // Providers (owned by the admin surface, read-only here)
  getProvider(providerId: number): Promise<Provider | null>;
}

export function emptyStatusCounts(): Record<CrawlJobStatus, number> {
  return {
    queued: 0,
    running: 0,
    paused: 0,
    succeeded: 0,
    failed: 0,
    canceled: 0,
  };
}
