/**
 * Jobs API
 * Operator endpoints for crawl jobs, mounted at /api/jobs
 *
 * GET    /            list (page, pageSize, status, providerId)
 * GET    /stats       counts per status
 * GET    /sse         event stream of list + stats snapshots (same filters as list)
 * GET    /:id         job with progress and recent pages
 * POST   /            create
 * POST   /:id/cancel|pause|resume|retry
 * DELETE /:id
 */

import { Request, RequestHandler, Response, Router } from 'express';
import { z } from 'zod';
import { JobControl } from '../jobs/job-control.js';
import { CRAWL_JOB_STATUSES } from '../types/index.js';
import {
  errorMessage,
  InvalidTransitionError,
  JobActiveError,
  LeaseConflictError,
  NotFoundError,
  ValidationError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { captureError } from '../utils/sentry.js';

const JobIdSchema = z.coerce.number().int().positive();

const ListJobsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(20),
  status: z.enum(CRAWL_JOB_STATUSES).optional(),
  providerId: z.coerce.number().int().positive().optional(),
});

const CreateJobBodySchema = z.object({
  providerId: z.number().int().positive(),
  startUrl: z.string().url().nullish(),
  sitemapUrl: z.string().url().nullish(),
  maxPages: z.number().int().positive().nullish(),
});

type Handler = (req: Request, res: Response) => Promise<void>;

export const DEFAULT_SNAPSHOT_INTERVAL_MS = 10_000;

export interface JobsRouterOptions {
  /** How often the event stream sends a fresh snapshot */
  snapshotIntervalMs?: number;
}

export function createJobsRouter(control: JobControl, options: JobsRouterOptions = {}): Router {
  const router = Router();
  const snapshotIntervalMs = options.snapshotIntervalMs ?? DEFAULT_SNAPSHOT_INTERVAL_MS;

  router.get(
    '/',
    route('list jobs', async (req, res) => {
      const query = ListJobsQuerySchema.parse(req.query);
      const result = await control.list(query);
      res.json({ success: true, ...result });
    })
  );

  router.get(
    '/stats',
    route('job stats', async (_req, res) => {
      res.json({ success: true, stats: await control.stats() });
    })
  );

  router.get('/sse', (req, res) => {
    const parsed = ListJobsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendError(res, 'jobs feed', parsed.error);
      return;
    }
    streamSnapshots(control, parsed.data, snapshotIntervalMs, res);
  });

  router.get(
    '/:id',
    route('get job', async (req, res) => {
      const details = await control.get(jobId(req));
      res.json({ success: true, ...details });
    })
  );

  router.post(
    '/',
    route('create job', async (req, res) => {
      const body = CreateJobBodySchema.parse(req.body);
      const job = await control.create(body);
      res.status(201).json({ success: true, job });
    })
  );

  router.post(
    '/:id/cancel',
    route('cancel job', async (req, res) => {
      res.json({ success: true, job: await control.cancel(jobId(req)) });
    })
  );

  router.post(
    '/:id/pause',
    route('pause job', async (req, res) => {
      res.json({ success: true, job: await control.pause(jobId(req)) });
    })
  );

  router.post(
    '/:id/resume',
    route('resume job', async (req, res) => {
      res.json({ success: true, job: await control.resume(jobId(req)) });
    })
  );

  router.post(
    '/:id/retry',
    route('retry job', async (req, res) => {
      res.status(201).json({ success: true, job: await control.retry(jobId(req)) });
    })
  );

  router.delete(
    '/:id',
    route('delete job', async (req, res) => {
      await control.delete(jobId(req));
      res.status(204).end();
    })
  );

  return router;
}

/**
 * Writes a `jobs-snapshot` event right away and then on every interval until
 * the client disconnects. A failed snapshot ends the stream.
 */
function streamSnapshots(
  control: JobControl,
  query: z.infer<typeof ListJobsQuerySchema>,
  intervalMs: number,
  res: Response
): void {
  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no',
  });

  let open = true;
  const timer = setInterval(() => sendSnapshot(), intervalMs);

  const stop = (): void => {
    open = false;
    clearInterval(timer);
  };
  res.on('close', stop);

  async function writeSnapshot(): Promise<void> {
    const [jobs, stats] = await Promise.all([control.list(query), control.stats()]);
    if (!open) {
      return;
    }
    const payload = { jobs, stats, timestamp: new Date().toISOString() };
    res.write(`event: jobs-snapshot\ndata: ${JSON.stringify(payload)}\n\n`);
  }

  function sendSnapshot(): void {
    writeSnapshot().catch((error: unknown) => {
      logger.error('Jobs feed snapshot failed', { error: errorMessage(error) });
      captureError(error, { operation: 'jobs feed' });
      stop();
      res.end();
    });
  }

  sendSnapshot();
}

function jobId(req: Request): number {
  return JobIdSchema.parse(req.params.id);
}

function route(operation: string, handler: Handler): RequestHandler {
  return (req, res) => {
    handler(req, res).catch((error: unknown) => sendError(res, operation, error));
  };
}

/**
 * Maps control-surface errors to status codes; anything unexpected is a
 * generic 500 and goes to Sentry
 */
export function sendError(res: Response, operation: string, error: unknown): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({
      success: false,
      error: 'Invalid request',
      issues: error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
    return;
  }
  if (error instanceof ValidationError) {
    res.status(400).json({ success: false, error: error.message });
    return;
  }
  if (error instanceof NotFoundError) {
    res.status(404).json({ success: false, error: error.message });
    return;
  }
  if (
    error instanceof InvalidTransitionError ||
    error instanceof JobActiveError ||
    error instanceof LeaseConflictError
  ) {
    res.status(409).json({ success: false, error: error.message });
    return;
  }

  logger.error(`API error in ${operation}`, { error: errorMessage(error) });
  captureError(error, { operation });
  res.status(500).json({ success: false, error: 'Internal server error' });
}
