// Job lifecycle
export const CRAWL_JOB_STATUSES = [
  'queued',
  'running',
  'paused',
  'succeeded',
  'failed',
  'canceled',
] as const;

export type CrawlJobStatus = (typeof CRAWL_JOB_STATUSES)[number];

export type CrawlPageStatus = 'succeeded' | 'failed';

export type ExtractedProductStatus = 'pending' | 'approved' | 'rejected' | 'duplicate';

// Database Models
export interface CrawlJob {
  id: number;
  providerId: number;
  startUrl: string;
  sitemapUrl: string | null;
  maxPages: number | null;
  status: CrawlJobStatus;
  createdAt: Date;
  startedAt: Date | null;
  pausedAt: Date | null;
  canceledAt: Date | null;
  completedAt: Date | null;
  leaseOwner: string | null;
  leaseExpiresAt: Date | null;
  errorMessage: string | null;
  /** Bumped by every conditional update; the compare-and-swap key */
  version: number;
}

/**
 * Fields a conditional job update may write. `version` is owned by the store.
 */
export type CrawlJobPatch = Partial<
  Omit<CrawlJob, 'id' | 'providerId' | 'createdAt' | 'version'>
>;

export interface NewCrawlJob {
  providerId: number;
  startUrl: string;
  sitemapUrl: string | null;
  maxPages: number | null;
}

export interface CrawlPage {
  id: number;
  jobId: number;
  url: string;
  status: CrawlPageStatus;
  httpStatusCode: number | null;
  errorMessage: string | null;
  contentHash: string | null;
  /** Same-site links found on the page; resumed runs queue them again */
  discoveredUrls: string[];
  fetchedAt: Date;
}

export type NewCrawlPage = Omit<CrawlPage, 'id'>;

export interface ExtractedProduct {
  id: number;
  /** Null once the originating job has been deleted */
  jobId: number | null;
  providerId: number;
  externalId: string | null;
  name: string | null;
  description: string | null;
  price: number | null;
  currency: string | null;
  productUrl: string | null;
  imageUrls: string[];
  rawPayload: unknown;
  status: ExtractedProductStatus;
  importedProductId: number | null;
  reviewedAt: Date | null;
  createdAt: Date;
}

export type NewExtractedProduct = Pick<
  ExtractedProduct,
  | 'jobId'
  | 'providerId'
  | 'externalId'
  | 'name'
  | 'description'
  | 'price'
  | 'currency'
  | 'productUrl'
  | 'imageUrls'
  | 'rawPayload'
>;

export interface Provider {
  id: number;
  name: string;
  websiteUrl: string | null;
  /** Raw crawler configuration as stored; validated by the crawler config parser */
  crawlerConfig: unknown;
}

// Scraper Types
export interface ExtractedProductCandidate {
  externalId: string | null;
  name: string;
  description: string | null;
  price: number | null;
  currency: string | null;
  productUrl: string | null;
  imageUrls: string[];
  rawPayload: unknown;
}

export interface CrawlPageResult {
  url: string;
  success: boolean;
  httpStatusCode?: number;
  contentHash?: string;
  title?: string;
  products: ExtractedProductCandidate[];
  discoveredUrls: string[];
  error?: string;
}

// Control surface
export interface JobListFilter {
  page: number;
  pageSize: number;
  status?: CrawlJobStatus;
  providerId?: number;
}

export interface JobListResult {
  jobs: CrawlJob[];
  totalCount: number;
  page: number;
  pageSize: number;
}

export interface JobProgress {
  pagesTotal: number;
  pagesSucceeded: number;
  pagesFailed: number;
  productsExtracted: number;
}

export type JobStats = Record<CrawlJobStatus, number> & { total: number };

// Configuration
export interface Config {
  supabase: {
    url: string;
    serviceKey: string;
  };
  worker: {
    workerId: string;
    leaseDurationMs: number;
    leaseRenewalIntervalMs: number;
    statusPollIntervalMs: number;
    pollSchedule: string;
    maxPagesPerJob: number;
  };
  browser: {
    wsEndpoint: string;
    executablePath: string;
  };
  api: {
    port: number;
    adminToken: string;
  };
  sentry: {
    dsn: string;
  };
  app: {
    environment: string;
    logLevel: LogLevel;
  };
}

// Utility Types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
