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
import { emptyStatusCounts, JobStore } from './job-store.js';

/**
 * Process-local store with the same conditional-update semantics as the
 * Supabase store. Used by tests and by `--store=memory` local runs.
 *
 * Every method hands out copies, so a caller holding a job snapshot sees
 * exactly what a database read would have returned.
 */
export class InMemoryJobStore implements JobStore {
  private jobs = new Map<number, CrawlJob>();
  private pages: CrawlPage[] = [];
  private products: ExtractedProduct[] = [];
  private providers = new Map<number, Provider>();
  private nextJobId = 1;
  private nextPageId = 1;
  private nextProductId = 1;

  addProvider(provider: Provider): void {
    this.providers.set(provider.id, { ...provider });
  }

  async createJob(input: NewCrawlJob): Promise<CrawlJob> {
    await tick();
    const job: CrawlJob = {
      id: this.nextJobId++,
      providerId: input.providerId,
      startUrl: input.startUrl,
      sitemapUrl: input.sitemapUrl,
      maxPages: input.maxPages,
      status: 'queued',
      // Strictly increasing so "oldest first" is deterministic within one millisecond
      createdAt: new Date(Date.now() + this.nextJobId),
      startedAt: null,
      pausedAt: null,
      canceledAt: null,
      completedAt: null,
      leaseOwner: null,
      leaseExpiresAt: null,
      errorMessage: null,
      version: 0,
    };
    this.jobs.set(job.id, job);
    return copyJob(job);
  }

  async getJob(jobId: number): Promise<CrawlJob | null> {
    await tick();
    const job = this.jobs.get(jobId);
    return job ? copyJob(job) : null;
  }

  async listJobs(filter: JobListFilter): Promise<JobListResult> {
    await tick();
    const matching = [...this.jobs.values()]
      .filter((job) => !filter.status || job.status === filter.status)
      .filter((job) => filter.providerId === undefined || job.providerId === filter.providerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    const start = (filter.page - 1) * filter.pageSize;
    return {
      jobs: matching.slice(start, start + filter.pageSize).map(copyJob),
      totalCount: matching.length,
      page: filter.page,
      pageSize: filter.pageSize,
    };
  }

  async countJobsByStatus(): Promise<Record<CrawlJobStatus, number>> {
    await tick();
    const counts = emptyStatusCounts();
    for (const job of this.jobs.values()) {
      counts[job.status]++;
    }
    return counts;
  }

  async findClaimCandidates(now: Date, limit: number): Promise<CrawlJob[]> {
    await tick();
    return [...this.jobs.values()]
      .filter(
        (job) =>
          job.status === 'queued' ||
          (job.status === 'running' &&
            job.leaseExpiresAt !== null &&
            job.leaseExpiresAt.getTime() < now.getTime())
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id)
      .slice(0, limit)
      .map(copyJob);
  }

  async compareAndSwapJob(
    jobId: number,
    expectedVersion: number,
    patch: CrawlJobPatch
  ): Promise<CrawlJob | null> {
    await tick();
    // Check and write happen without an await in between: this is the atomic step
    const current = this.jobs.get(jobId);
    if (!current || current.version !== expectedVersion) {
      return null;
    }
    const updated: CrawlJob = { ...current, ...patch, version: current.version + 1 };
    this.jobs.set(jobId, updated);
    return copyJob(updated);
  }

  async deleteJobUnlessStatus(
    jobId: number,
    protectedStatuses: readonly CrawlJobStatus[]
  ): Promise<boolean> {
    await tick();
    const job = this.jobs.get(jobId);
    if (!job || protectedStatuses.includes(job.status)) {
      return false;
    }
    this.jobs.delete(jobId);
    this.pages = this.pages.filter((page) => page.jobId !== jobId);
    for (const product of this.products) {
      if (product.jobId === jobId) {
        product.jobId = null;
      }
    }
    return true;
  }

  async insertPage(page: NewCrawlPage): Promise<CrawlPage> {
    await tick();
    const row: CrawlPage = { ...page, discoveredUrls: [...page.discoveredUrls], id: this.nextPageId++ };
    this.pages.push(row);
    return { ...row, discoveredUrls: [...row.discoveredUrls] };
  }

  async listPages(jobId: number, limit?: number): Promise<CrawlPage[]> {
    await tick();
    const rows = this.pages
      .filter((page) => page.jobId === jobId)
      .sort((a, b) => b.fetchedAt.getTime() - a.fetchedAt.getTime() || b.id - a.id)
      .map((page) => ({ ...page, discoveredUrls: [...page.discoveredUrls] }));
    return limit === undefined ? rows : rows.slice(0, limit);
  }

  async getSucceededPageUrls(jobId: number): Promise<Set<string>> {
    await tick();
    return new Set(
      this.pages
        .filter((page) => page.jobId === jobId && page.status === 'succeeded')
        .map((page) => page.url)
    );
  }

  async getDiscoveredLinks(jobId: number): Promise<string[]> {
    await tick();
    return this.pages
      .filter((page) => page.jobId === jobId && page.status === 'succeeded')
      .sort((a, b) => a.id - b.id)
      .flatMap((page) => page.discoveredUrls);
  }

  async getJobProgress(jobId: number): Promise<JobProgress> {
    await tick();
    const pages = this.pages.filter((page) => page.jobId === jobId);
    return {
      pagesTotal: pages.length,
      pagesSucceeded: pages.filter((page) => page.status === 'succeeded').length,
      pagesFailed: pages.filter((page) => page.status === 'failed').length,
      productsExtracted: this.products.filter((product) => product.jobId === jobId).length,
    };
  }

  async insertExtractedProducts(products: NewExtractedProduct[]): Promise<number> {
    await tick();
    const now = new Date();
    for (const product of products) {
      this.products.push({
        ...product,
        imageUrls: [...product.imageUrls],
        id: this.nextProductId++,
        status: 'pending',
        importedProductId: null,
        reviewedAt: null,
        createdAt: now,
      });
    }
    return products.length;
  }

  async listExtractedProducts(jobId: number): Promise<ExtractedProduct[]> {
    await tick();
    return this.products
      .filter((product) => product.jobId === jobId)
      .map((product) => ({ ...product, imageUrls: [...product.imageUrls] }));
  }

  async getProvider(providerId: number): Promise<Provider | null> {
    await tick();
    const provider = this.providers.get(providerId);
    return provider ? { ...provider } : null;
  }
}

// Yield like a round trip would, so concurrent callers interleave
function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function copyJob(job: CrawlJob): CrawlJob {
  return { ...job };
}
