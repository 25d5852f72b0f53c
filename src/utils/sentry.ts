import * as Sentry from '@sentry/node';
import { config } from './config.js';
import { logger } from './logger.js';

// Only report when a DSN is configured (deployed workers)
const sentryEnabled = !!config.sentry.dsn;

if (sentryEnabled) {
  Sentry.init({
    dsn: config.sentry.dsn,
    environment: config.app.environment,
    sampleRate: 1.0,
    tracesSampleRate: 0.1,
    serverName: config.worker.workerId,
  });

  logger.info('Sentry initialized for error tracking');
}

export { Sentry, sentryEnabled };

// Manual error capture helper
export function captureError(error: unknown, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

// Tag subsequent events with the job being processed
export function setJobContext(jobId: number | null, providerId?: number): void {
  if (!sentryEnabled) return;

  if (jobId === null) {
    Sentry.setContext('crawl_job', null);
    return;
  }
  Sentry.setContext('crawl_job', { jobId, providerId });
}

/**
 * Flush pending events before the process exits
 */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!sentryEnabled) return;
  await Sentry.flush(timeoutMs);
}
