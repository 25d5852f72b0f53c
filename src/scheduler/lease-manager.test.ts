import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InMemoryJobStore } from '../database/memory-job-store.js';
import { transitionJob } from '../jobs/job-transitions.js';
import { LeaseManager } from './lease-manager.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const LEASE_MS = 5 * 60 * 1000;
const T0 = new Date('2026-03-01T10:00:00Z');

function at(offsetMs: number): () => Date {
  return () => new Date(T0.getTime() + offsetMs);
}

describe('LeaseManager', () => {
  let store: InMemoryJobStore;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new InMemoryJobStore();
  });

  function queueJob() {
    return store.createJob({ providerId: 1, startUrl: 'https://shop.test', sitemapUrl: null, maxPages: null });
  }

  describe('claim()', () => {
    it('should claim the oldest queued job and set the lease', async () => {
      const first = await queueJob();
      await queueJob();
      const leases = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });

      const claimed = await leases.claim('worker-a');

      expect(claimed?.id).toBe(first.id);
      expect(claimed?.status).toBe('running');
      expect(claimed?.leaseOwner).toBe('worker-a');
      expect(claimed?.leaseExpiresAt).toEqual(new Date(T0.getTime() + LEASE_MS));
      expect(claimed?.startedAt).toEqual(T0);
    });

    it('should return null when nothing is claimable', async () => {
      const leases = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });

      expect(await leases.claim('worker-a')).toBeNull();
    });

    it('should let exactly one of two concurrent claimers win a single job', async () => {
      const job = await queueJob();
      const a = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });
      const b = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });

      const results = await Promise.all([a.claim('worker-a'), b.claim('worker-b')]);
      const winners = results.filter((result) => result !== null);

      expect(winners).toHaveLength(1);
      const stored = await store.getJob(job.id);
      expect(stored?.leaseOwner).toBe(winners[0]?.leaseOwner);
      expect(stored?.version).toBe(1);
    });

    it('should never hand the same job to two of many concurrent workers', async () => {
      for (let i = 0; i < 5; i++) {
        await queueJob();
      }
      const leases = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });

      const results = await Promise.all(
        Array.from({ length: 10 }, (_, i) => leases.claim(`worker-${i}`))
      );
      const claimedIds = results.flatMap((job) => (job ? [job.id] : []));

      expect(claimedIds.sort((x, y) => x - y)).toEqual([1, 2, 3, 4, 5]);
      expect(results.filter((job) => job === null)).toHaveLength(5);
    });

    it('should reclaim a running job whose lease expired', async () => {
      const job = await queueJob();
      await new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) }).claim('worker-a');

      const later = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(LEASE_MS + 60_000) });
      const reclaimed = await later.claim('worker-b');

      expect(reclaimed?.id).toBe(job.id);
      expect(reclaimed?.status).toBe('running');
      expect(reclaimed?.leaseOwner).toBe('worker-b');
      expect(reclaimed?.startedAt).toEqual(T0);
      expect(reclaimed?.leaseExpiresAt).toEqual(new Date(T0.getTime() + 2 * LEASE_MS + 60_000));
    });

    it('should not take a running job whose lease is still valid', async () => {
      await queueJob();
      await new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) }).claim('worker-a');

      const soon = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(60_000) });

      expect(await soon.claim('worker-b')).toBeNull();
    });

    it('should skip paused jobs', async () => {
      const job = await queueJob();
      const leases = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });
      await leases.claim('worker-a');
      await transitionJob(store, job.id, 'paused');

      expect(await leases.claim('worker-b')).toBeNull();
    });
  });

  describe('renew()', () => {
    it('should extend the lease for its owner', async () => {
      const job = await queueJob();
      await new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) }).claim('worker-a');

      const renewed = await new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(120_000) }).renew(
        job.id,
        'worker-a'
      );

      expect(renewed).toBe(true);
      expect((await store.getJob(job.id))?.leaseExpiresAt).toEqual(new Date(T0.getTime() + 120_000 + LEASE_MS));
    });

    it('should refuse to renew for another worker', async () => {
      const job = await queueJob();
      const leases = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });
      await leases.claim('worker-a');

      expect(await leases.renew(job.id, 'worker-b')).toBe(false);
      expect((await store.getJob(job.id))?.version).toBe(1);
    });

    it('should report a lost lease once the job was paused', async () => {
      const job = await queueJob();
      const leases = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });
      await leases.claim('worker-a');
      await transitionJob(store, job.id, 'paused');

      expect(await leases.renew(job.id, 'worker-a')).toBe(false);
    });
  });

  describe('release()', () => {
    it('should complete an owned job and clear the lease', async () => {
      const job = await queueJob();
      const leases = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });
      await leases.claim('worker-a');

      expect(await leases.release(job.id, 'worker-a', 'succeeded')).toBe(true);

      const stored = await store.getJob(job.id);
      expect(stored?.status).toBe('succeeded');
      expect(stored?.leaseOwner).toBeNull();
      expect(stored?.leaseExpiresAt).toBeNull();
      expect(stored?.completedAt).toEqual(T0);
    });

    it('should record the failure message', async () => {
      const job = await queueJob();
      const leases = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });
      await leases.claim('worker-a');

      await leases.release(job.id, 'worker-a', 'failed', { errorMessage: 'Sitemap unreachable' });

      expect((await store.getJob(job.id))?.errorMessage).toBe('Sitemap unreachable');
    });

    it('should not overwrite a job canceled in the meantime', async () => {
      const job = await queueJob();
      const leases = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) });
      await leases.claim('worker-a');
      await transitionJob(store, job.id, 'canceled');

      expect(await leases.release(job.id, 'worker-a', 'succeeded')).toBe(false);
      expect((await store.getJob(job.id))?.status).toBe('canceled');
    });

    it('should not release a job reclaimed by another worker', async () => {
      const job = await queueJob();
      await new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(0) }).claim('worker-a');
      await new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(LEASE_MS + 1) }).claim('worker-b');

      const stale = new LeaseManager(store, { leaseDurationMs: LEASE_MS, now: at(LEASE_MS + 2) });

      expect(await stale.release(job.id, 'worker-a', 'succeeded')).toBe(false);
      expect((await store.getJob(job.id))?.leaseOwner).toBe('worker-b');
    });
  });
});
