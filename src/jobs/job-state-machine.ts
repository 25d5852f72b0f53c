/**
 * Crawl job lifecycle
 *
 *   queued ──claim──▶ running ──pause──▶ paused ──resume──▶ queued
 *     │                 │ ▲
 *     │                 └─┘ expired lease reclaimed
 *     │                 ├──▶ succeeded
 *     │                 ├──▶ failed
 *     └──cancel──▶ canceled ◀──cancel──┘
 *
 * succeeded, failed and canceled are terminal. Retry never moves a job: it
 * clones the job into a new queued row.
 */

import { CrawlJob, CrawlJobPatch, CrawlJobStatus } from '../types/index.js';

const TRANSITIONS: Record<CrawlJobStatus, readonly CrawlJobStatus[]> = {
  queued: ['running', 'canceled'],
  running: ['running', 'paused', 'canceled', 'succeeded', 'failed'],
  paused: ['queued'],
  succeeded: [],
  failed: [],
  canceled: [],
};

export const TERMINAL_STATUSES: readonly CrawlJobStatus[] = ['succeeded', 'failed', 'canceled'];

/** Jobs in these states hold (or are about to hold) worker resources and cannot be deleted */
export const ACTIVE_STATUSES: readonly CrawlJobStatus[] = ['queued', 'running'];

export const RETRYABLE_STATUSES: readonly CrawlJobStatus[] = ['failed', 'canceled'];

export function canTransition(from: CrawlJobStatus, to: CrawlJobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: CrawlJobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface TransitionDetails {
  now: Date;
  /** Required when entering running */
  leaseOwner?: string;
  leaseExpiresAt?: Date;
  errorMessage?: string;
}

/**
 * Builds the fields written by a transition. Leaving running always clears
 * the lease so that leaseOwner/leaseExpiresAt are set iff status = running.
 */
export function buildTransitionPatch(
  job: CrawlJob,
  to: CrawlJobStatus,
  details: TransitionDetails
): CrawlJobPatch {
  const { now } = details;

  switch (to) {
    case 'running':
      if (!details.leaseOwner || !details.leaseExpiresAt) {
        throw new Error('Entering running requires a lease owner and expiry');
      }
      return {
        status: 'running',
        leaseOwner: details.leaseOwner,
        leaseExpiresAt: details.leaseExpiresAt,
        startedAt: job.startedAt ?? now,
      };
    case 'paused':
      return { status: 'paused', pausedAt: now, leaseOwner: null, leaseExpiresAt: null };
    case 'queued':
      return { status: 'queued', leaseOwner: null, leaseExpiresAt: null };
    case 'canceled':
      return {
        status: 'canceled',
        canceledAt: now,
        completedAt: now,
        leaseOwner: null,
        leaseExpiresAt: null,
      };
    case 'succeeded':
      return {
        status: 'succeeded',
        completedAt: now,
        errorMessage: null,
        leaseOwner: null,
        leaseExpiresAt: null,
      };
    case 'failed':
      return {
        status: 'failed',
        completedAt: now,
        errorMessage: truncateErrorMessage(details.errorMessage ?? 'Unknown error'),
        leaseOwner: null,
        leaseExpiresAt: null,
      };
  }
}

const MAX_ERROR_MESSAGE_LENGTH = 2000;

export function truncateErrorMessage(message: string): string {
  return message.length > MAX_ERROR_MESSAGE_LENGTH
    ? `${message.slice(0, MAX_ERROR_MESSAGE_LENGTH - 3)}...`
    : message;
}
