/* Simple structured logger: one JSON line per event, filtered by LOG_LEVEL */

import { isCoreError } from './exceptions/core.error';
import { normalizeDetails, truncateDetails } from './exceptions/details';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') return raw;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

let threshold: LogLevel = levelFromEnv();
let maxDetails = 2000;

export function configureLogger(opts: { level?: LogLevel; maxDetailsLength?: number }): void {
  if (opts.level) threshold = opts.level;
  if (opts.maxDetailsLength !== undefined) maxDetails = opts.maxDetailsLength;
}

export function isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return RANK[level] >= RANK[threshold];
}

// Flattens an error into loggable fields. CoreError keeps its code.
export function errorFields(err: unknown): Record<string, unknown> {
  if (isCoreError(err)) {
    return {
      errorName: err.name,
      code: err.code,
      message: err.message,
      ...(err.details !== undefined && { details: truncateDetails(err.details, maxDetails) }),
    };
  }
  return { errorName: err instanceof Error ? err.name : typeof err, message: truncateDetails(normalizeDetails(err), maxDetails) };
}

export function log(level: Exclude<LogLevel, 'silent'>, event: string, fields?: Record<string, unknown>): void {
  if (!isLevelEnabled(level)) return;
  const payload = { ts: Date.now(), level, event, ...(fields || {}) };
  let line: string;
  try {
    line = JSON.stringify(payload);
  } catch {
    line = JSON.stringify({ ts: payload.ts, level, event, note: 'unserializable fields' });
  }
  // eslint-disable-next-line no-console
  const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  sink(line);
}

export const logger = {
  debug: (event: string, fields?: Record<string, unknown>) => log('debug', event, fields),
  info: (event: string, fields?: Record<string, unknown>) => log('info', event, fields),
  warn: (event: string, fields?: Record<string, unknown>) => log('warn', event, fields),
  error: (event: string, fields?: Record<string, unknown>) => log('error', event, fields),
};
