import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger.js';

/**
 * Middleware requiring `Authorization: Bearer <adminToken>`.
 * With no token configured the API is closed (503) rather than open.
 */
export function requireAdminToken(adminToken: string): RequestHandler {
  const expected = Buffer.from(adminToken, 'utf-8');

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!adminToken) {
      res.status(503).json({
        success: false,
        error: 'Job API is disabled: ADMIN_API_TOKEN is not configured',
      });
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({
        success: false,
        error: 'Missing or invalid authorization header',
      });
      return;
    }

    const token = Buffer.from(authHeader.substring(7), 'utf-8'); // Remove 'Bearer ' prefix
    if (token.length !== expected.length || !timingSafeEqual(token, expected)) {
      logger.warn('Rejected job API request with a bad token', { path: req.path, ip: req.ip });
      res.status(401).json({
        success: false,
        error: 'Invalid token',
      });
      return;
    }

    next();
  };
}
