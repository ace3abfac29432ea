import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'http' });

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const durationMs = Date.now() - start;
    const fields = { method: req.method, path: req.path, statusCode: res.statusCode, durationMs };

    if (res.statusCode >= 500) log.error(fields, 'HTTP request failed');
    else if (res.statusCode >= 400) log.warn(fields, 'HTTP request rejected');
    else if (req.path === '/health') log.debug(fields, 'Health check');
    else log.info(fields, 'HTTP request');
  });

  next();
}
