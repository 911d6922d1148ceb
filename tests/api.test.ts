import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/api/server.js';
import { loadConfig } from '../src/config.js';
import { createDisallowList } from '../src/domain/badDomains.js';
import { ConfigurationError } from '../src/errors.js';

const parent = {
  id: 'P-100',
  name: 'Acme Corporation',
  website: 'acme.com',
  enrichment: { address: { state: 'CA', country: 'US', postalCode: '94105' } },
};
const child = {
  id: 'C-101',
  name: 'Acme West LLC',
  website: 'west.acme.com',
  billing: { state: 'CA', country: 'US', postalCode: 94105 },
  parentId: 'P-100',
};

let app: FastifyInstance;

describe('API', () => {
  beforeAll(async () => {
    app = await buildApp({
      config: loadConfig({ MAX_BATCH: '3' }),
      disallowList: createDisallowList(['gmail.com', 'ringcentral.com']),
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, disallowListSize: 2 });
    expect(res.headers['x-content-type-options']).toBe('nosniff');
  });

  it('flags a bad domain and stops', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/flags',
      payload: { record: { id: 'C-1', email: 'jane@test.ringcentral.com' } },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.flags).toEqual({
      stage: 'terminated',
      badDomain: {
        isBad: true,
        explanation: "Email domain 'test.ringcentral.com' matches disallowed domain 'ringcentral.com'",
        matches: [{ field: 'email', domain: 'test.ringcentral.com', root: 'ringcentral.com' }],
      },
    });
    expect(Object.keys(body.payload.flags).sort()).toEqual(['bad_domain', 'trust']);
  });

  it('evaluates a record against its parent', async () => {
    const res = await app.inject({ method: 'POST', url: '/flags', payload: { record: child, parent } });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.flags.customerShellCoherence.score).toBe(100);
    expect(body.flags.addressConsistency.explanation).toBe(
      'Customer Billing Address vs Parent Enrichment Address: state, country and postal code match (CA, US, 94105)',
    );
    expect(body.payload.parent.name).toEqual({ value: 'Acme Corporation', trust: 'trusted' });
  });

  it('does not attach a parent other than the linked one', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/flags',
      payload: { record: child, parent: { ...parent, id: 'P-7' } },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.flags.customerShellCoherence.explanation).toBe(
      'customer-shell coherence could not be computed: missing-data: supplied parent P-7 is not the linked parent P-100',
    );
    expect(body.payload.parent).toBeUndefined();
  });

  it('rejects an invalid record', async () => {
    const res = await app.inject({ method: 'POST', url: '/flags', payload: { record: { name: 'no id' } } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Invalid request');
  });

  it('evaluates a batch, resolving parents among the submitted records', async () => {
    const orphan = { id: 'C-103', name: 'Lost Co', parentId: 'P-999' };
    const res = await app.inject({ method: 'POST', url: '/flags/batch', payload: { records: [parent, child, orphan] } });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.results.map((r: { id: string }) => r.id)).toEqual(['P-100', 'C-101', 'C-103']);
    expect(body.summary).toEqual({ total: 3, badDomain: 0, withShell: 2, unresolvedParents: 1 });
    expect(body.results[1].flags.customerShellCoherence.score).toBe(100);
    expect(body.results[2].payload.unresolved_parent_id).toBe('P-999');
    expect(typeof body.timings.totalMs).toBe('number');
  });

  it('caps batch size', async () => {
    const records = ['A', 'B', 'C', 'D'].map((id) => ({ id }));
    const res = await app.inject({ method: 'POST', url: '/flags/batch', payload: { records } });
    expect(res.statusCode).toBe(400);
  });

  it('answers unknown routes with JSON', async () => {
    const res = await app.inject({ method: 'GET', url: '/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Not Found', status: 404 });
  });
});

describe('buildApp startup', () => {
  it('refuses to start without a readable disallow-list', async () => {
    const config = loadConfig({ BAD_DOMAINS_PATH: 'data/does-not-exist.csv' });
    await expect(buildApp({ config })).rejects.toThrow(ConfigurationError);
  });

  it('answers 429 once a client exceeds the rate limit', async () => {
    const limited = await buildApp({
      config: loadConfig({ RATE_LIMIT_MAX: '1' }),
      disallowList: createDisallowList(['gmail.com']),
    });
    try {
      const first = await limited.inject({ method: 'POST', url: '/flags', payload: {} });
      const second = await limited.inject({ method: 'POST', url: '/flags', payload: {} });
      expect(first.statusCode).toBe(400);
      expect(second.statusCode).toBe(429);
      expect(second.json().error).toBe('Too Many Requests');
    } finally {
      await limited.close();
    }
  });
});
