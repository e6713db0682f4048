import { Router } from 'express';

export type Clock = () => number; // epoch milliseconds

export type PingResponse = {
  status: 'ok';
  uptime: number; // seconds
  timestamp: number; // epoch seconds
};

export type BaseRouterDeps = {
  startedAt: number; // epoch seconds
  clock?: Clock;
};

export function pingPayload(startedAt: number, nowMs: number): PingResponse {
  const now = Math.floor(nowMs / 1000);
  return { status: 'ok', uptime: Math.max(0, now - Math.floor(startedAt)), timestamp: now };
}

// Liveness (/ping) and readiness (/health) probes for Docker/K8s.
export function baseRouter({ startedAt, clock = Date.now }: BaseRouterDeps): Router {
  const router = Router();

  router.get('/ping', (_req, res) => {
    res.json(pingPayload(startedAt, clock()));
  });

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return router;
}
