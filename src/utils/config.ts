import { hostname } from 'os';
import { config as dotenvConfig } from 'dotenv';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { Config, LogLevel } from '../types/index.js';

dotenvConfig();

type Env = Record<string, string | undefined>;

export function getEnvVar(key: string, required = true, env: Env = process.env): string {
  const value = env[key];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

function getNumberEnvVar(key: string, fallback: number, env: Env = process.env): number {
  const raw = getEnvVar(key, false, env);
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Environment variable ${key} must be a positive number, got "${raw}"`);
  }
  return value;
}

function getLogLevel(): LogLevel {
  const level = getEnvVar('LOG_LEVEL', false).toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
}

const WorkerConfigSchema = z
  .object({
    workerId: z.string().min(1),
    leaseDurationMs: z.number().int().positive(),
    leaseRenewalIntervalMs: z.number().int().positive(),
    statusPollIntervalMs: z.number().int().positive(),
    pollSchedule: z.string().min(1),
    maxPagesPerJob: z.number().int().positive(),
  })
  // A lease must be renewed before it can lapse under a live worker
  .refine((worker) => worker.leaseRenewalIntervalMs < worker.leaseDurationMs, {
    message: 'LEASE_RENEWAL_INTERVAL_MS must be shorter than LEASE_DURATION_MS',
    path: ['leaseRenewalIntervalMs'],
  });

export function parseWorkerConfig(env: Env = process.env): Config['worker'] {
  const parsed = WorkerConfigSchema.safeParse({
    workerId: getEnvVar('WORKER_ID', false, env) || `worker-${hostname()}-${uuidv4().replace(/-/g, '').slice(0, 8)}`,
    leaseDurationMs: getNumberEnvVar('LEASE_DURATION_MS', 5 * 60 * 1000, env),
    leaseRenewalIntervalMs: getNumberEnvVar('LEASE_RENEWAL_INTERVAL_MS', 2 * 60 * 1000, env),
    statusPollIntervalMs: getNumberEnvVar('JOB_STATUS_POLL_INTERVAL_MS', 5000, env),
    pollSchedule: getEnvVar('WORKER_POLL_SCHEDULE', false, env) || '*/10 * * * * *',
    maxPagesPerJob: getNumberEnvVar('MAX_PAGES_PER_JOB', 1000, env),
  });
  if (!parsed.success) {
    throw new Error(`Invalid worker configuration: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  return parsed.data;
}

export const config: Config = {
  supabase: {
    // Checked when the Supabase store is created, so the in-memory store runs without them
    url: getEnvVar('SUPABASE_URL', false),
    serviceKey: getEnvVar('SUPABASE_SERVICE_KEY', false),
  },
  worker: parseWorkerConfig(),
  browser: {
    wsEndpoint: getEnvVar('BROWSER_WS_ENDPOINT', false),
    executablePath: getEnvVar('BROWSER_EXECUTABLE_PATH', false),
  },
  api: {
    port: getNumberEnvVar('API_PORT', 3000),
    adminToken: getEnvVar('ADMIN_API_TOKEN', false),
  },
  sentry: {
    dsn: getEnvVar('SENTRY_DSN', false),
  },
  app: {
    environment: getEnvVar('NODE_ENV', false) || 'development',
    logLevel: getLogLevel(),
  },
};
