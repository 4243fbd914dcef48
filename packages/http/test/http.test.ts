import Fastify, { type FastifyInstance } from 'fastify';
import { Registry } from 'prom-client';
import { afterEach, describe, expect, it } from 'vitest';
import { deny, errorEnvelope } from '../src/errors.js';
import { registerServiceMetrics } from '../src/metrics.js';

describe('errorEnvelope', () => {
  const apps: FastifyInstance[] = [];

  afterEach(async () => {
    await Promise.all(apps.splice(0).map((app) => app.close()));
  });

  it('builds the envelope with the request id and optional details', async () => {
    const app = Fastify({ logger: false });
    apps.push(app);
    app.get('/plain', async (request) => errorEnvelope(request, 'NOT_FOUND', 'Nothing here.'));
    app.get('/detailed', async (request) => errorEnvelope(request, 'INVALID', 'Bad input.', { field: 'output' }));

    const plain = await app.inject({ method: 'GET', url: '/plain' });
    const body = plain.json();
    expect(body.error).toMatchObject({ code: 'NOT_FOUND', message: 'Nothing here.' });
    expect(typeof body.error.requestId).toBe('string');
    expect(body.error).not.toHaveProperty('details');

    const detailed = await app.inject({ method: 'GET', url: '/detailed' });
    expect(detailed.json().error.details).toEqual({ field: 'output' });
  });

  it('deny defaults to 400 and honours an explicit status', async () => {
    const app = Fastify({ logger: false });
    apps.push(app);
    app.get('/bad', async (request, reply) => deny({ request, reply, code: 'BAD', message: 'Bad.' }));
    app.get('/gone', async (request, reply) => deny({ request, reply, code: 'GONE', message: 'Gone.', status: 404 }));

    const bad = await app.inject({ method: 'GET', url: '/bad' });
    expect(bad.statusCode).toBe(400);
    expect(bad.json().error.code).toBe('BAD');

    const gone = await app.inject({ method: 'GET', url: '/gone' });
    expect(gone.statusCode).toBe(404);
    expect(gone.json().error.message).toBe('Gone.');
  });
});

describe('registerServiceMetrics', () => {
  it('counts requests and errors by route and status', async () => {
    const app = Fastify({ logger: false });
    const registry = new Registry();
    const metrics = registerServiceMetrics(app, 'test-service', registry);
    app.get('/ok', async () => ({ ok: true }));
    app.get('/fail', async (request, reply) => deny({ request, reply, code: 'NOPE', message: 'No.', status: 503 }));

    await app.inject({ method: 'GET', url: '/ok' });
    await app.inject({ method: 'GET', url: '/ok' });
    await app.inject({ method: 'GET', url: '/fail' });

    const requests = await metrics.requestCount.get();
    const okSample = requests.values.find((sample) => sample.labels.route === '/ok');
    expect(okSample?.value).toBe(2);

    const errors = await metrics.errorCount.get();
    expect(errors.values).toEqual([expect.objectContaining({ value: 1, labels: { code: '503' } })]);

    const exposition = await registry.metrics();
    expect(exposition).toContain('test_service_request_total');

    await app.close();
  });
});
