import type { Request, Response, NextFunction } from 'express';
import { logger } from '../logger';

export function profileHttp(req: Request, res: Response, next: NextFunction) {
  if ((process.env.ENABLE_PROFILING ?? '0') !== '1') return next();
  const start = Date.now();
  res.on('finish', () => {
    logger.info('http.profile', {
      path: req.path,
      method: req.method,
      status: res.statusCode,
      ms: Date.now() - start,
      requestId: req.requestId,
    });
  });
  next();
}
