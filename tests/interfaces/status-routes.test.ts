import { describe, it, expect, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import statusRoutes from '../../src/interfaces/http/status-routes.js';
import { FeedState } from '../../src/application/feed-state.js';

describe('status routes', () => {
  let app: FastifyInstance;

  async function build(state: FeedState): Promise<FastifyInstance> {
    app = Fastify();
    await app.register(statusRoutes, { state });
    await app.ready();
    return app;
  }

  afterEach(async () => {
    await app.close();
  });

  it('GET /health is ok when every resource came up', async () => {
    const state = new FeedState();
    state.setResources([{ resource: 'couchdb', status: 'ok' }]);
    await build(state);

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('GET /health is 503 when a resource failed', async () => {
    const state = new FeedState();
    state.setResources([{ resource: 'couchdb', status: 'failed' }]);
    await build(state);

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ status: 'degraded' });
  });

  it('GET /status returns the feed snapshot', async () => {
    const state = new FeedState(() => new Date('2026-03-01T10:00:00Z'));
    state.recordPoll(12);
    state.recordDelivered();
    state.recordDelivered();
    state.recordProcessed();
    await build(state);

    const res = await app.inject({ method: 'GET', url: '/status' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      cursor: 12,
      polls: 1,
      delivered: 2,
      processed: 1,
      skipped: 0,
      failed: 0,
      lastPollAt: '2026-03-01T10:00:00.000Z',
      resources: [],
    });
  });
});
