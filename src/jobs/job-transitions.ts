import { JobStore } from '../database/job-store.js';
import { CrawlJob, CrawlJobStatus } from '../types/index.js';
import {
  InvalidTransitionError,
  LeaseConflictError,
  NotFoundError,
} from '../utils/errors.js';
import { buildTransitionPatch, canTransition } from './job-state-machine.js';

// Version races are retried against a fresh read this many times
export const MAX_CAS_ATTEMPTS = 5;

export interface TransitionOptions {
  /** Only move the job if this worker still holds its lease */
  expectedOwner?: string;
  leaseOwner?: string;
  leaseExpiresAt?: Date;
  errorMessage?: string;
  now?: Date;
}

/**
 * Moves a job to `to` through a conditional update.
 *
 * Re-reads and retries when another writer bumped the version in between,
 * re-checking the transition table each time, so a job canceled by an
 * operator is never overwritten by a late worker write.
 *
 * @throws NotFoundError, InvalidTransitionError, or LeaseConflictError when
 *   `expectedOwner` no longer holds the lease or the retries ran out
 */
export async function transitionJob(
  store: JobStore,
  jobId: number,
  to: CrawlJobStatus,
  options: TransitionOptions = {}
): Promise<CrawlJob> {
  for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
    const job = await store.getJob(jobId);
    if (!job) {
      throw new NotFoundError(`Crawl job ${jobId} not found`);
    }

    if (!canTransition(job.status, to)) {
      throw new InvalidTransitionError(jobId, job.status, to);
    }

    if (options.expectedOwner !== undefined && job.leaseOwner !== options.expectedOwner) {
      throw new LeaseConflictError(jobId);
    }

    const patch = buildTransitionPatch(job, to, {
      now: options.now ?? new Date(),
      leaseOwner: options.leaseOwner,
      leaseExpiresAt: options.leaseExpiresAt,
      errorMessage: options.errorMessage,
    });

    const updated = await store.compareAndSwapJob(job.id, job.version, patch);
    if (updated) {
      return updated;
    }
  }

  throw new LeaseConflictError(jobId);
}
