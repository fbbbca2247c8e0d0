import type { FastifyInstance } from 'fastify';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { buildApp } from '../src/server/app.js';
import { loadConfig } from '../src/server/config.js';
import { TWO_VALUE_ERRORS } from './fixtures.js';

describe('HTTP service', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildApp(loadConfig({}));
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /health reports the grammars', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['x-content-type-options']).toBe('nosniff');
    const body = res.json();
    expect(body.status).toBe('ok');
    expect(body.grammars).toEqual(['django-json', 'golang-json', 'django', 'python', 'golang', 'java', 'csharp']);
  });

  it('GET /api/grammars lists ids in priority order', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/grammars' });

    expect(res.statusCode).toBe(200);
    expect(res.json().grammars[0]).toBe('django-json');
  });

  it('POST /api/analyze returns records, report and selection', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/analyze',
      payload: { logs: TWO_VALUE_ERRORS, debug: true },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.records).toHaveLength(2);
    expect(body.report.anchor).toBe('app.py:10');
    expect(body.report.totalRecords).toBe(2);
    expect(body.report.mostCommon.count).toBe(2);
    expect(body.report.mostCommon.location).toBe('app.py:10');
    expect(body.selection.grammar).toBe('python');
    expect(body.selection.records).toBeUndefined();
    expect(body.stats.groups).toBe(1);
    expect(body.truncation).toBeNull();
  });

  it('accepts a text/plain body with options in the query string', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/analyze?grammar=python&mode=split',
      headers: { 'content-type': 'text/plain' },
      payload: TWO_VALUE_ERRORS,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().selection.strategy).toBe('explicit');
    expect(res.json().records).toHaveLength(2);
  });

  it('rejects a body without logs', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/analyze', payload: { mode: 'split' } });

    expect(res.statusCode).toBe(400);
    expect(res.json().field).toBe('logs');
  });

  it('maps configuration mistakes to 400', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/analyze',
      payload: { logs: 'x', grammar: 'ruby' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().field).toBe('grammar');
    expect(res.json().error).toMatch(/Unknown grammar "ruby"/);
  });

  it('validates substitution rules', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/analyze',
      payload: { logs: 'x', substitutions: [{ pattern: '(', placeholder: 'y', regex: true }] },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().field).toBe('substitutions');
  });
});

describe('HTTP input caps', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildApp(loadConfig({ TRACESIFT_MAX_BYTES: '64' }));
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('truncates logs over the byte cap that fit the body limit', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/analyze', payload: { logs: TWO_VALUE_ERRORS } });

    expect(res.statusCode).toBe(200);
    expect(res.json().truncation.reason).toBe('bytes');
  });

  it('answers 413 for a body over twice the byte cap plus 64 KiB', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/analyze',
      headers: { 'content-type': 'text/plain' },
      payload: 'x'.repeat(70000),
    });

    expect(res.statusCode).toBe(413);
  });
});
