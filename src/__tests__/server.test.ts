import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { Server } from '@/server';
import { InMemorySchedulingStore } from '@/repositories/InMemorySchedulingStore';
import type { RateLimitCounter } from '@/middleware/rateLimiter';
import {
  MONDAY_8AM,
  PROFESSIONAL_ID,
  createTestClock,
  listen,
  makeProfessional,
  type RunningApp
} from './support';

describe('Server', () => {
  const { clock } = createTestClock();
  const incr = vi.fn(async (key: string) => (key.length > 0 ? 1 : 0));
  const counter: RateLimitCounter = { incr, expire: async () => true };
  let running: RunningApp;

  beforeAll(async () => {
    const store = new InMemorySchedulingStore(clock);
    store.addProfessional(makeProfessional());
    running = await listen(new Server({ store, clock, rateLimitCounter: counter }).getApp());
  });

  afterAll(async () => {
    await running.close();
  });

  it('registers no process handlers until started', () => {
    const before = process.listenerCount('SIGTERM');

    new Server({ store: new InMemorySchedulingStore(clock), clock, rateLimitCounter: counter });

    expect(process.listenerCount('SIGTERM')).toBe(before);
  });

  it('describes itself at the root', async () => {
    const response = await fetch(`${running.baseUrl}/`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      service: 'clinic-slots-api',
      status: 'running',
      timestamp: MONDAY_8AM.toISOString()
    });
    expect(response.headers.get('x-content-type-options')).toBe('nosniff');
  });

  it('reports readiness', async () => {
    const response = await fetch(`${running.baseUrl}/ready`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ready' });
  });

  it('answers unknown paths with the error envelope', async () => {
    const response = await fetch(`${running.baseUrl}/nowhere`, { method: 'POST' });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
        path: '/nowhere',
        method: 'POST'
      },
      timestamp: MONDAY_8AM.toISOString()
    });
  });

  it('mounts the API behind the rate limiter', async () => {
    incr.mockClear();

    const response = await fetch(`${running.baseUrl}/api/v1/status`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ success: true, data: { service: 'clinic-slots-api' } });
    expect(response.headers.get('x-ratelimit-limit')).toBe('100');
    expect(incr).toHaveBeenCalledTimes(1);
  });

  it('serves the scheduling routes from the injected store', async () => {
    const response = await fetch(`${running.baseUrl}/api/v1/professionals/${PROFESSIONAL_ID}/ranges`, {
      headers: { 'X-API-Key': 'test-api-key' }
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ success: true, data: [] });
  });
});
