import 'dotenv/config';
import { z } from 'zod';
import { ErrorCodes } from './errors';
import { CoreError } from './exceptions';
import type { LogLevel } from './logger';

export type AppConfig = {
  nodeEnv: string;
  port: number;
  baseUrl: string;
  clientOrigin: string;
  apiPrefix: string;
  mongoUri?: string;
  mongoDb: string;
  serviceStartTime: number; // epoch seconds
  rateLimitWindowMs: number;
  rateLimitMax: number;
  logLevel: LogLevel;
  maxDetailsLength: number;
  exposeErrorDetails: boolean;
};

const PROCESS_STARTED_AT = Math.floor(Date.now() / 1000);

const numeric = z.string().regex(/^\d+$/, 'must be a non-negative integer').optional();

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: numeric,
  BASE_URL: z.string().optional(),
  CLIENT_ORIGIN: z.string().optional(),
  API_PREFIX: z.string().regex(/^\/[^\s]*$/, 'must start with /').optional(),
  MONGO_URI: z.string().optional(),
  MONGO_DB: z.string().default('probe'),
  SERVICE_START_TIME: numeric,
  RATE_LIMIT_WINDOW_MS: numeric,
  RATE_LIMIT_MAX: numeric,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  MAX_DETAILS_LENGTH: numeric,
  EXPOSE_ERROR_DETAILS: z.enum(['0', '1']).optional(),
}).passthrough();

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new CoreError('Invalid service configuration.', ErrorCodes.SERVER_ERROR, issues);
  }
  const e = parsed.data;
  const nodeEnv = e.NODE_ENV.toLowerCase();
  const port = Number(e.PORT || 6969);
  const prefix = (e.API_PREFIX || '/api/v1').replace(/\/+$/, '');
  return {
    nodeEnv,
    port,
    baseUrl: e.BASE_URL || `http://localhost:${port}`,
    clientOrigin: e.CLIENT_ORIGIN || '*',
    apiPrefix: prefix || '/',
    mongoUri: e.MONGO_URI || undefined,
    mongoDb: e.MONGO_DB || 'probe',
    serviceStartTime: e.SERVICE_START_TIME ? Number(e.SERVICE_START_TIME) : PROCESS_STARTED_AT,
    rateLimitWindowMs: Math.max(1000, Number(e.RATE_LIMIT_WINDOW_MS || 60 * 1000)),
    rateLimitMax: Math.max(10, Number(e.RATE_LIMIT_MAX || 300)),
    logLevel: e.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
    maxDetailsLength: Number(e.MAX_DETAILS_LENGTH || 2000),
    exposeErrorDetails: e.EXPOSE_ERROR_DETAILS ? e.EXPOSE_ERROR_DETAILS === '1' : nodeEnv !== 'production',
  };
}
