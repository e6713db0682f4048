import request from 'supertest';
import { createApp } from '../app';
import { loadConfig } from '../config';
import { pingPayload } from '../services/base.routes';

const T0 = 1_700_000_000;

function makeApp(nowMs: () => number) {
  const cfg = loadConfig({ NODE_ENV: 'test', SERVICE_START_TIME: String(T0) });
  return createApp({ cfg, clock: nowMs });
}

describe('GET /api/v1/ping', () => {
  test('reports uptime since service start', async () => {
    const T1 = T0 + 3725;
    const res = await request(makeApp(() => T1 * 1000 + 999)).get('/api/v1/ping');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', uptime: 3725, timestamp: T1 });
  });

  test('uptime is zero at start', async () => {
    const res = await request(makeApp(() => T0 * 1000)).get('/api/v1/ping');
    expect(res.body).toEqual({ status: 'ok', uptime: 0, timestamp: T0 });
  });
});

describe('GET /api/v1/health', () => {
  test('returns exactly status ok', async () => {
    const res = await request(makeApp(() => Date.now())).get('/api/v1/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });
});

describe('pingPayload', () => {
  test('clamps negative uptime when the clock is behind start', () => {
    expect(pingPayload(T0, (T0 - 10) * 1000)).toEqual({ status: 'ok', uptime: 0, timestamp: T0 - 10 });
  });
});
