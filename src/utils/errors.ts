import { CrawlJobStatus } from '../types/index.js';

/**
 * Base class so callers can tell crawl errors from library failures
 */
export class CrawlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Sitemap or robots.txt unreachable / unparseable */
export class DiscoveryError extends CrawlError {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Network failure, timeout or non-2xx response for a single page */
export class FetchError extends CrawlError {
  constructor(
    message: string,
    readonly url: string,
    readonly httpStatusCode?: number
  ) {
    super(message);
  }
}

/** A claim or renewal lost its compare-and-swap against another writer */
export class LeaseConflictError extends CrawlError {
  constructor(readonly jobId: number) {
    super(`Lease conflict on job ${jobId}`);
  }
}

/** The job cannot make any progress */
export class JobFatalError extends CrawlError {}

export class InvalidTransitionError extends CrawlError {
  constructor(
    readonly jobId: number,
    readonly from: CrawlJobStatus,
    readonly to: CrawlJobStatus
  ) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`);
  }
}

export class NotFoundError extends CrawlError {}

/** The operation needs the job out of queued/running first */
export class JobActiveError extends CrawlError {
  constructor(
    readonly jobId: number,
    readonly status: CrawlJobStatus
  ) {
    super(`Job ${jobId} is ${status}; cancel it first`);
  }
}

export class ValidationError extends CrawlError {}

/** Wraps a PostgREST / Supabase error object */
export class StoreError extends CrawlError {
  constructor(
    operation: string,
    readonly code: string | undefined,
    message: string
  ) {
    super(`${operation} failed: ${message}`);
  }
}

/**
 * Normalises an unknown thrown value for log metadata and stored messages
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
