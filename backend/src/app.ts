import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import type { AppConfig } from './config';
import { RateLimitedError } from './exceptions';
import { requestId } from './middleware/requestId';
import { profileHttp } from './middleware/profile';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { apiRouter } from './services/router';
import { getCorsOptions } from './services/cors';
import { isLevelEnabled } from './logger';
import type { Clock } from './services/base.routes';

export type AppDeps = {
  cfg: AppConfig;
  clock?: Clock;
};

export function createApp({ cfg, clock }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors(getCorsOptions(cfg)));
  app.use(requestId);
  app.use(profileHttp);
  app.use(express.urlencoded({ extended: true }));
  app.use(express.json());
  if (isLevelEnabled('info')) app.use(morgan('dev'));

  const limiter = rateLimit({
    windowMs: cfg.rateLimitWindowMs,
    limit: cfg.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => next(new RateLimitedError()),
  });
  app.use(cfg.apiPrefix, limiter);
  app.use(cfg.apiPrefix, apiRouter({ startedAt: cfg.serviceStartTime, clock }));

  app.use(notFoundHandler);
  app.use(errorHandler({ exposeDetails: cfg.exposeErrorDetails, maxDetailsLength: cfg.maxDetailsLength }));
  return app;
}
