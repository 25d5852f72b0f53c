import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InMemoryJobStore } from '../database/memory-job-store.js';
import { CRAWL_JOB_STATUSES, CrawlJobStatus } from '../types/index.js';
import { InvalidTransitionError, LeaseConflictError, NotFoundError } from '../utils/errors.js';
import { buildTransitionPatch, canTransition, isTerminal, truncateErrorMessage } from './job-state-machine.js';
import { transitionJob } from './job-transitions.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const ALLOWED: Array<[CrawlJobStatus, CrawlJobStatus]> = [
  ['queued', 'running'],
  ['queued', 'canceled'],
  ['running', 'running'],
  ['running', 'paused'],
  ['running', 'canceled'],
  ['running', 'succeeded'],
  ['running', 'failed'],
  ['paused', 'queued'],
];

describe('job state machine', () => {
  describe('canTransition()', () => {
    it.each(ALLOWED)('should allow %s -> %s', (from, to) => {
      expect(canTransition(from, to)).toBe(true);
    });

    it('should reject every pair outside the table', () => {
      const allowed = new Set(ALLOWED.map(([from, to]) => `${from}->${to}`));
      for (const from of CRAWL_JOB_STATUSES) {
        for (const to of CRAWL_JOB_STATUSES) {
          if (!allowed.has(`${from}->${to}`)) {
            expect(canTransition(from, to), `${from}->${to}`).toBe(false);
          }
        }
      }
    });

    it('should treat succeeded, failed and canceled as terminal', () => {
      expect(CRAWL_JOB_STATUSES.filter(isTerminal)).toEqual(['succeeded', 'failed', 'canceled']);
    });
  });

  describe('buildTransitionPatch()', () => {
    const now = new Date('2026-03-01T10:00:00Z');

    it('should keep the first startedAt when a running job is reclaimed', async () => {
      const store = new InMemoryJobStore();
      const job = await store.createJob({ providerId: 1, startUrl: 'https://shop.test', sitemapUrl: null, maxPages: null });
      const firstStart = new Date('2026-03-01T09:00:00Z');

      const patch = buildTransitionPatch({ ...job, status: 'running', startedAt: firstStart }, 'running', {
        now,
        leaseOwner: 'worker-b',
        leaseExpiresAt: new Date('2026-03-01T10:05:00Z'),
      });

      expect(patch.startedAt).toEqual(firstStart);
      expect(patch.leaseOwner).toBe('worker-b');
    });

    it('should refuse to enter running without a lease', async () => {
      const store = new InMemoryJobStore();
      const job = await store.createJob({ providerId: 1, startUrl: 'https://shop.test', sitemapUrl: null, maxPages: null });

      expect(() => buildTransitionPatch(job, 'running', { now })).toThrow('lease owner');
    });

    it('should clear the lease when pausing', async () => {
      const store = new InMemoryJobStore();
      const job = await store.createJob({ providerId: 1, startUrl: 'https://shop.test', sitemapUrl: null, maxPages: null });

      expect(buildTransitionPatch(job, 'paused', { now })).toEqual({
        status: 'paused',
        pausedAt: now,
        leaseOwner: null,
        leaseExpiresAt: null,
      });
    });

    it('should truncate long failure messages', () => {
      const message = 'x'.repeat(2500);
      const truncated = truncateErrorMessage(message);

      expect(truncated).toHaveLength(2000);
      expect(truncated.endsWith('...')).toBe(true);
    });
  });

  describe('transitionJob()', () => {
    let store: InMemoryJobStore;

    beforeEach(() => {
      store = new InMemoryJobStore();
    });

    it('should cancel a queued job and stamp the timestamps', async () => {
      const job = await store.createJob({ providerId: 1, startUrl: 'https://shop.test', sitemapUrl: null, maxPages: null });
      const now = new Date('2026-03-01T10:00:00Z');

      const canceled = await transitionJob(store, job.id, 'canceled', { now });

      expect(canceled.status).toBe('canceled');
      expect(canceled.canceledAt).toEqual(now);
      expect(canceled.completedAt).toEqual(now);
      expect(canceled.version).toBe(1);
    });

    it('should reject an invalid transition and leave the row untouched', async () => {
      const job = await store.createJob({ providerId: 1, startUrl: 'https://shop.test', sitemapUrl: null, maxPages: null });

      await expect(transitionJob(store, job.id, 'paused')).rejects.toBeInstanceOf(InvalidTransitionError);

      const after = await store.getJob(job.id);
      expect(after).toEqual(job);
    });

    it('should reject leaving a terminal state', async () => {
      const job = await store.createJob({ providerId: 1, startUrl: 'https://shop.test', sitemapUrl: null, maxPages: null });
      await transitionJob(store, job.id, 'canceled');

      await expect(transitionJob(store, job.id, 'queued')).rejects.toThrow(
        `Job ${job.id} cannot move from canceled to queued`
      );
    });

    it('should refuse a write guarded by a different lease owner', async () => {
      const job = await store.createJob({ providerId: 1, startUrl: 'https://shop.test', sitemapUrl: null, maxPages: null });
      await transitionJob(store, job.id, 'running', {
        leaseOwner: 'worker-a',
        leaseExpiresAt: new Date(Date.now() + 60_000),
      });

      await expect(
        transitionJob(store, job.id, 'succeeded', { expectedOwner: 'worker-b' })
      ).rejects.toBeInstanceOf(LeaseConflictError);
      expect((await store.getJob(job.id))?.status).toBe('running');
    });

    it('should throw NotFoundError for a missing job', async () => {
      await expect(transitionJob(store, 404, 'canceled')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
