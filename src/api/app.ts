import express, { ErrorRequestHandler, Express } from 'express';
import { JobControl } from '../jobs/job-control.js';
import { requireAdminToken } from '../middleware/auth.js';
import { createJobsRouter, JobsRouterOptions, sendError } from './jobs-api.js';

export interface AppOptions extends JobsRouterOptions {
  control: JobControl;
  adminToken: string;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  app.use(express.json());

  // Liveness only; no auth so load balancers can reach it
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/jobs', requireAdminToken(options.adminToken), createJobsRouter(options.control, options));

  app.use(handleUncaught);

  return app;
}

const handleUncaught: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  // express.json() reports unparseable bodies as SyntaxError
  if (error instanceof SyntaxError) {
    res.status(400).json({ success: false, error: 'Malformed JSON body' });
    return;
  }
  sendError(res, `${req.method} ${req.path}`, error);
};
