import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import {
  CRAWL_JOB_STATUSES,
  CrawlJob,
  CrawlJobPatch,
  CrawlJobStatus,
  CrawlPage,
  CrawlPageStatus,
  ExtractedProduct,
  ExtractedProductStatus,
  JobListFilter,
  JobListResult,
  JobProgress,
  NewCrawlJob,
  NewCrawlPage,
  NewExtractedProduct,
  Provider,
} from '../types/index.js';
import { StoreError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getSupabaseClient } from './client.js';
import { emptyStatusCounts, JobStore } from './job-store.js';

// PostgREST caps a single response at 1000 rows by default
const READ_CHUNK_SIZE = 1000;

interface CrawlJobRow {
  id: number;
  provider_id: number;
  start_url: string;
  sitemap_url: string | null;
  max_pages: number | null;
  status: CrawlJobStatus;
  created_at: string;
  started_at: string | null;
  paused_at: string | null;
  canceled_at: string | null;
  completed_at: string | null;
  lease_owner: string | null;
  lease_expires_at: string | null;
  error_message: string | null;
  version: number;
}

interface CrawlPageRow {
  id: number;
  job_id: number;
  url: string;
  status: CrawlPageStatus;
  http_status_code: number | null;
  error_message: string | null;
  content_hash: string | null;
  discovered_urls: string[] | null;
  fetched_at: string;
}

interface ExtractedProductRow {
  id: number;
  job_id: number | null;
  provider_id: number;
  external_id: string | null;
  name: string | null;
  description: string | null;
  price: number | string | null;
  currency: string | null;
  product_url: string | null;
  image_urls: string[] | null;
  raw_payload: unknown;
  status: ExtractedProductStatus;
  imported_product_id: number | null;
  reviewed_at: string | null;
  created_at: string;
}

interface ProviderRow {
  id: number;
  name: string;
  website_url: string | null;
  crawler_config: unknown;
}

/**
 * JobStore backed by the crawl_* tables in Supabase (see schema.sql)
 */
export class SupabaseJobStore implements JobStore {
  constructor(private readonly client: SupabaseClient = getSupabaseClient()) {}

  // Jobs
  async createJob(input: NewCrawlJob): Promise<CrawlJob> {
    const { data, error } = await this.client
      .from('crawl_jobs')
      .insert({
        provider_id: input.providerId,
        start_url: input.startUrl,
        sitemap_url: input.sitemapUrl,
        max_pages: input.maxPages,
        status: 'queued',
        version: 0,
      })
      .select()
      .single();

    if (error) {
      throw storeError('Create crawl job', error, { providerId: input.providerId });
    }

    return toCrawlJob(data);
  }

  async getJob(jobId: number): Promise<CrawlJob | null> {
    const { data, error } = await this.client
      .from('crawl_jobs')
      .select('*')
      .eq('id', jobId)
      .maybeSingle();

    if (error) {
      throw storeError('Fetch crawl job', error, { jobId });
    }

    return data ? toCrawlJob(data) : null;
  }

  async listJobs(filter: JobListFilter): Promise<JobListResult> {
    const from = (filter.page - 1) * filter.pageSize;
    let query = this.client
      .from('crawl_jobs')
      .select('*', { count: 'exact' })
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .range(from, from + filter.pageSize - 1);

    if (filter.status) {
      query = query.eq('status', filter.status);
    }
    if (filter.providerId !== undefined) {
      query = query.eq('provider_id', filter.providerId);
    }

    const { data, error, count } = await query;

    if (error) {
      throw storeError('List crawl jobs', error);
    }

    const rows: CrawlJobRow[] = data ?? [];
    return {
      jobs: rows.map(toCrawlJob),
      totalCount: count ?? rows.length,
      page: filter.page,
      pageSize: filter.pageSize,
    };
  }

  async countJobsByStatus(): Promise<Record<CrawlJobStatus, number>> {
    const entries = await Promise.all(
      CRAWL_JOB_STATUSES.map(async (status) => {
        const { count, error } = await this.client
          .from('crawl_jobs')
          .select('id', { count: 'exact', head: true })
          .eq('status', status);

        if (error) {
          throw storeError('Count crawl jobs', error, { status });
        }
        return [status, count ?? 0] as const;
      })
    );

    const counts = emptyStatusCounts();
    for (const [status, count] of entries) {
      counts[status] = count;
    }
    return counts;
  }

  async findClaimCandidates(now: Date, limit: number): Promise<CrawlJob[]> {
    const { data, error } = await this.client
      .from('crawl_jobs')
      .select('*')
      .or(`status.eq.queued,and(status.eq.running,lease_expires_at.lt.${now.toISOString()})`)
      .order('created_at', { ascending: true })
      .order('id', { ascending: true })
      .limit(limit);

    if (error) {
      throw storeError('Find claimable jobs', error);
    }

    const rows: CrawlJobRow[] = data ?? [];
    return rows.map(toCrawlJob);
  }

  async compareAndSwapJob(
    jobId: number,
    expectedVersion: number,
    patch: CrawlJobPatch
  ): Promise<CrawlJob | null> {
    const { data, error } = await this.client
      .from('crawl_jobs')
      .update({ ...toJobPatchRow(patch), version: expectedVersion + 1 })
      .eq('id', jobId)
      .eq('version', expectedVersion)
      .select();

    if (error) {
      throw storeError('Update crawl job', error, { jobId, expectedVersion });
    }

    const rows: CrawlJobRow[] = data ?? [];
    return rows.length > 0 ? toCrawlJob(rows[0]) : null;
  }

  async deleteJobUnlessStatus(
    jobId: number,
    protectedStatuses: readonly CrawlJobStatus[]
  ): Promise<boolean> {
    // Pages cascade and extracted products are detached by the foreign keys
    const { data, error } = await this.client
      .from('crawl_jobs')
      .delete()
      .eq('id', jobId)
      .not('status', 'in', `(${protectedStatuses.join(',')})`)
      .select('id');

    if (error) {
      throw storeError('Delete crawl job', error, { jobId });
    }

    return (data ?? []).length > 0;
  }

  // Pages
  async insertPage(page: NewCrawlPage): Promise<CrawlPage> {
    const { data, error } = await this.client
      .from('crawl_pages')
      .insert({
        job_id: page.jobId,
        url: page.url,
        status: page.status,
        http_status_code: page.httpStatusCode,
        error_message: page.errorMessage,
        content_hash: page.contentHash,
        discovered_urls: page.discoveredUrls,
        fetched_at: page.fetchedAt.toISOString(),
      })
      .select()
      .single();

    if (error) {
      throw storeError('Insert crawl page', error, { jobId: page.jobId, url: page.url });
    }

    return toCrawlPage(data);
  }

  async listPages(jobId: number, limit?: number): Promise<CrawlPage[]> {
    let query = this.client
      .from('crawl_pages')
      .select('*')
      .eq('job_id', jobId)
      .order('fetched_at', { ascending: false })
      .order('id', { ascending: false });

    if (limit !== undefined) {
      query = query.limit(limit);
    }

    const { data, error } = await query;

    if (error) {
      throw storeError('List crawl pages', error, { jobId });
    }

    const rows: CrawlPageRow[] = data ?? [];
    return rows.map(toCrawlPage);
  }

  async getSucceededPageUrls(jobId: number): Promise<Set<string>> {
    const urls = new Set<string>();

    for (let from = 0; ; from += READ_CHUNK_SIZE) {
      const { data, error } = await this.client
        .from('crawl_pages')
        .select('url')
        .eq('job_id', jobId)
        .eq('status', 'succeeded')
        .order('id', { ascending: true })
        .range(from, from + READ_CHUNK_SIZE - 1);

      if (error) {
        throw storeError('Fetch processed page URLs', error, { jobId });
      }

      const rows: Array<{ url: string }> = data ?? [];
      for (const row of rows) {
        urls.add(row.url);
      }
      if (rows.length < READ_CHUNK_SIZE) {
        return urls;
      }
    }
  }

  async getDiscoveredLinks(jobId: number): Promise<string[]> {
    const links: string[] = [];

    for (let from = 0; ; from += READ_CHUNK_SIZE) {
      const { data, error } = await this.client
        .from('crawl_pages')
        .select('discovered_urls')
        .eq('job_id', jobId)
        .eq('status', 'succeeded')
        .order('id', { ascending: true })
        .range(from, from + READ_CHUNK_SIZE - 1);

      if (error) {
        throw storeError('Fetch discovered links', error, { jobId });
      }

      const rows: Array<{ discovered_urls: string[] | null }> = data ?? [];
      for (const row of rows) {
        links.push(...(row.discovered_urls ?? []));
      }
      if (rows.length < READ_CHUNK_SIZE) {
        return links;
      }
    }
  }

  async getJobProgress(jobId: number): Promise<JobProgress> {
    const [pagesTotal, pagesSucceeded, pagesFailed, productsExtracted] = await Promise.all([
      this.countRows('crawl_pages', jobId),
      this.countRows('crawl_pages', jobId, 'succeeded'),
      this.countRows('crawl_pages', jobId, 'failed'),
      this.countRows('crawl_extracted_products', jobId),
    ]);

    return { pagesTotal, pagesSucceeded, pagesFailed, productsExtracted };
  }

  // Extracted products
  async insertExtractedProducts(products: NewExtractedProduct[]): Promise<number> {
    if (products.length === 0) {
      return 0;
    }

    const { error } = await this.client.from('crawl_extracted_products').insert(
      products.map((product) => ({
        job_id: product.jobId,
        provider_id: product.providerId,
        external_id: product.externalId,
        name: product.name,
        description: product.description,
        price: product.price,
        currency: product.currency,
        product_url: product.productUrl,
        image_urls: product.imageUrls,
        raw_payload: product.rawPayload,
        status: 'pending',
      }))
    );

    if (error) {
      throw storeError('Insert extracted products', error, {
        jobId: products[0].jobId,
        count: products.length,
      });
    }

    return products.length;
  }

  async listExtractedProducts(jobId: number): Promise<ExtractedProduct[]> {
    const { data, error } = await this.client
      .from('crawl_extracted_products')
      .select('*')
      .eq('job_id', jobId)
      .order('id', { ascending: true });

    if (error) {
      throw storeError('List extracted products', error, { jobId });
    }

    const rows: ExtractedProductRow[] = data ?? [];
    return rows.map(toExtractedProduct);
  }

  // Providers
  async getProvider(providerId: number): Promise<Provider | null> {
    const { data, error } = await this.client
      .from('providers')
      .select('id, name, website_url, crawler_config')
      .eq('id', providerId)
      .maybeSingle();

    if (error) {
      throw storeError('Fetch provider', error, { providerId });
    }

    if (!data) {
      return null;
    }

    const row: ProviderRow = data;
    return {
      id: row.id,
      name: row.name,
      websiteUrl: row.website_url,
      crawlerConfig: row.crawler_config,
    };
  }

  private async countRows(
    table: 'crawl_pages' | 'crawl_extracted_products',
    jobId: number,
    status?: CrawlPageStatus
  ): Promise<number> {
    let query = this.client
      .from(table)
      .select('id', { count: 'exact', head: true })
      .eq('job_id', jobId);

    if (status) {
      query = query.eq('status', status);
    }

    const { count, error } = await query;

    if (error) {
      throw storeError(`Count ${table}`, error, { jobId });
    }

    return count ?? 0;
  }
}

function storeError(
  operation: string,
  error: PostgrestError,
  meta: Record<string, unknown> = {}
): StoreError {
  logger.error(`${operation} failed`, { ...meta, error: error.message, code: error.code });
  return new StoreError(operation, error.code, error.message);
}

function toDate(value: string | null): Date | null {
  return value ? new Date(value) : null;
}

function toIso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

function toCrawlJob(row: CrawlJobRow): CrawlJob {
  return {
    id: row.id,
    providerId: row.provider_id,
    startUrl: row.start_url,
    sitemapUrl: row.sitemap_url,
    maxPages: row.max_pages,
    status: row.status,
    createdAt: new Date(row.created_at),
    startedAt: toDate(row.started_at),
    pausedAt: toDate(row.paused_at),
    canceledAt: toDate(row.canceled_at),
    completedAt: toDate(row.completed_at),
    leaseOwner: row.lease_owner,
    leaseExpiresAt: toDate(row.lease_expires_at),
    errorMessage: row.error_message,
    version: row.version,
  };
}

function toJobPatchRow(patch: CrawlJobPatch): Partial<CrawlJobRow> {
  const row: Partial<CrawlJobRow> = {};

  if (patch.startUrl !== undefined) row.start_url = patch.startUrl;
  if (patch.sitemapUrl !== undefined) row.sitemap_url = patch.sitemapUrl;
  if (patch.maxPages !== undefined) row.max_pages = patch.maxPages;
  if (patch.status !== undefined) row.status = patch.status;
  if (patch.startedAt !== undefined) row.started_at = toIso(patch.startedAt);
  if (patch.pausedAt !== undefined) row.paused_at = toIso(patch.pausedAt);
  if (patch.canceledAt !== undefined) row.canceled_at = toIso(patch.canceledAt);
  if (patch.completedAt !== undefined) row.completed_at = toIso(patch.completedAt);
  if (patch.leaseOwner !== undefined) row.lease_owner = patch.leaseOwner;
  if (patch.leaseExpiresAt !== undefined) row.lease_expires_at = toIso(patch.leaseExpiresAt);
  if (patch.errorMessage !== undefined) row.error_message = patch.errorMessage;

  return row;
}

function toCrawlPage(row: CrawlPageRow): CrawlPage {
  return {
    id: row.id,
    jobId: row.job_id,
    url: row.url,
    status: row.status,
    httpStatusCode: row.http_status_code,
    errorMessage: row.error_message,
    contentHash: row.content_hash,
    discoveredUrls: row.discovered_urls ?? [],
    fetchedAt: new Date(row.fetched_at),
  };
}

function toExtractedProduct(row: ExtractedProductRow): ExtractedProduct {
  return {
    id: row.id,
    jobId: row.job_id,
    providerId: row.provider_id,
    externalId: row.external_id,
    name: row.name,
    description: row.description,
    // numeric columns come back as strings
    price: row.price === null ? null : Number(row.price),
    currency: row.currency,
    productUrl: row.product_url,
    imageUrls: row.image_urls ?? [],
    rawPayload: row.raw_payload,
    status: row.status,
    importedProductId: row.imported_product_id,
    reviewedAt: toDate(row.reviewed_at),
    createdAt: new Date(row.created_at),
  };
}
