import { JobStore } from '../database/job-store.js';
import { buildTransitionPatch, canTransition } from '../jobs/job-state-machine.js';
import { MAX_CAS_ATTEMPTS, transitionJob } from '../jobs/job-transitions.js';
import { CrawlJob } from '../types/index.js';
import { config } from '../utils/config.js';
import { InvalidTransitionError, LeaseConflictError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type ReleaseStatus = 'paused' | 'succeeded' | 'failed' | 'canceled';

export interface LeaseManagerOptions {
  leaseDurationMs?: number;
  /** How many candidates one claim attempt looks at before giving up */
  claimBatchSize?: number;
  now?: () => Date;
}

/**
 * Hands out time-bounded exclusive ownership of crawl jobs.
 *
 * Workers never talk to each other; every claim, renewal and release is a
 * conditional update on the job's version, so two workers racing for the
 * same row cannot both win.
 */
export class LeaseManager {
  private readonly leaseDurationMs: number;
  private readonly claimBatchSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: JobStore,
    options: LeaseManagerOptions = {}
  ) {
    this.leaseDurationMs = options.leaseDurationMs ?? config.worker.leaseDurationMs;
    this.claimBatchSize = options.claimBatchSize ?? 10;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Claims the oldest queued job, or a running job whose lease expired.
   * @returns The claimed job (status running, lease owned by `workerId`) or null
   */
  async claim(workerId: string): Promise<CrawlJob | null> {
    const now = this.now();
    const candidates = await this.store.findClaimCandidates(now, this.claimBatchSize);

    for (const candidate of candidates) {
      if (!canTransition(candidate.status, 'running')) {
        continue;
      }

      const patch = buildTransitionPatch(candidate, 'running', {
        now,
        leaseOwner: workerId,
        leaseExpiresAt: this.expiryFrom(now),
      });

      const claimed = await this.store.compareAndSwapJob(candidate.id, candidate.version, patch);
      if (!claimed) {
        logger.debug('Lease conflict, trying next candidate', { jobId: candidate.id, workerId });
        continue;
      }

      if (candidate.status === 'running') {
        logger.warn('Reclaimed job with expired lease', {
          jobId: claimed.id,
          workerId,
          previousOwner: candidate.leaseOwner,
        });
      } else {
        logger.info('Claimed crawl job', { jobId: claimed.id, workerId });
      }
      return claimed;
    }

    return null;
  }

  /**
   * Extends the lease if `workerId` still owns the running job.
   * @returns false when the job left running or belongs to someone else
   */
  async renew(jobId: number, workerId: string): Promise<boolean> {
    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const job = await this.store.getJob(jobId);
      if (!job || job.status !== 'running' || job.leaseOwner !== workerId) {
        return false;
      }

      const renewed = await this.store.compareAndSwapJob(job.id, job.version, {
        leaseExpiresAt: this.expiryFrom(this.now()),
      });
      if (renewed) {
        logger.debug('Lease renewed', { jobId, workerId, leaseExpiresAt: renewed.leaseExpiresAt });
        return true;
      }
    }

    logger.warn('Lease renewal kept conflicting', { jobId, workerId });
    return false;
  }

  /**
   * Moves a job this worker owns out of running, clearing the lease in the same write.
   * @returns false if the job was meanwhile paused, canceled or reclaimed
   */
  async release(
    jobId: number,
    workerId: string,
    to: ReleaseStatus,
    options: { errorMessage?: string } = {}
  ): Promise<boolean> {
    try {
      await transitionJob(this.store, jobId, to, {
        expectedOwner: workerId,
        errorMessage: options.errorMessage,
        now: this.now(),
      });
      logger.info('Released crawl job', { jobId, workerId, status: to });
      return true;
    } catch (error) {
      if (error instanceof InvalidTransitionError || error instanceof LeaseConflictError) {
        logger.warn('Could not release job, worker no longer owns it', {
          jobId,
          workerId,
          status: to,
          error: error.message,
        });
        return false;
      }
      throw error;
    }
  }

  private expiryFrom(now: Date): Date {
    return new Date(now.getTime() + this.leaseDurationMs);
  }
}
