import { logger } from '../utils/logger.js';
import { JobStore } from './job-store.js';
import { InMemoryJobStore } from './memory-job-store.js';
import { SupabaseJobStore } from './supabase-job-store.js';

export type StoreKind = 'supabase' | 'memory';

/**
 * Reads `--store=supabase|memory` from the command line (default supabase)
 */
export function parseStoreKind(args: string[]): StoreKind {
  const value = args.find((arg) => arg.startsWith('--store='))?.split('=')[1] ?? 'supabase';
  if (value !== 'supabase' && value !== 'memory') {
    throw new Error(`Unknown store "${value}"; expected supabase or memory`);
  }
  return value;
}

export function createJobStore(kind: StoreKind): JobStore {
  if (kind === 'memory') {
    // Local runs only: nothing is shared with other processes
    logger.warn('Using the in-memory job store; jobs are lost on exit');
    return new InMemoryJobStore();
  }
  return new SupabaseJobStore();
}
