import 'dotenv/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';
import { loadConfig } from '../config.js';
import type { AppConfig } from '../config.js';
import { BadDomainClassifier, loadDisallowList } from '../domain/badDomains.js';
import type { DisallowList } from '../domain/badDomains.js';
import { FlagAggregator } from '../flags/aggregate.js';
import { evaluateBatch, summarize } from '../flags/batch.js';
import { CompanyRecordSchema } from '../records/schema.js';
import { InMemoryRecordSource, resolveParents } from '../records/source.js';
import { RateLimiter } from './rateLimit.js';
import { buildReasoningPayload } from '../reasoning/payload.js';
import { logger } from '../utils/logger.js';

export interface BuildAppOptions {
  config?: AppConfig;
  /** Preloaded list; otherwise read from `config.badDomainsPath`. */
  disallowList?: DisallowList;
}

function hasStatusCode(err: unknown): err is { statusCode: number } {
  return typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number';
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  const list = options.disallowList ?? (await loadDisallowList(config.badDomainsPath));
  const classifier = new BadDomainClassifier(list);
  const aggregator = new FlagAggregator({ classifier, address: { postalTolerance: config.postalTolerance } });

  const app = Fastify({
    trustProxy: true,
    logger: config.debugApi ? { level: config.logLevel } : false,
    bodyLimit: 4 * 1024 * 1024,
  });
  // CORS: restrict by env ORIGINS (comma-separated) or disable by default
  await app.register(cors, config.origins.length ? {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      cb(null, config.origins.includes(origin));
    },
    credentials: false
  } : { origin: false });

  app.addHook('onSend', async (req, res, payload) => {
    res.header('X-Content-Type-Options', 'nosniff');
    res.header('X-Frame-Options', 'DENY');
    res.header('Referrer-Policy', 'no-referrer');
    res.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    if (process.env.NODE_ENV === 'production') {
      res.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    return payload;
  });

  // Simple in-memory IP rate limiter
  const limiter = new RateLimiter(config.rateLimit);
  app.addHook('onRequest', async (req, res) => {
    if (req.url === '/health') return;
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const { limited, retryAfterMs } = limiter.hit(ip);
    if (limited) {
      return res.code(429).send({ error: 'Too Many Requests', retryAfterMs });
    }
  });

  // Centralized error handling
  app.setErrorHandler((err, req, res) => {
    const status = hasStatusCode(err) ? err.statusCode : 500;
    if (status >= 500) logger.error({ err, url: req.url }, 'request failed');
    res.code(status).send({ error: err.message || 'Internal Server Error', status });
  });
  app.setNotFoundHandler((req, res) => res.code(404).send({ error: 'Not Found', status: 404 }));

  const SingleSchema = z.object({
    record: CompanyRecordSchema,
    parent: CompanyRecordSchema.optional(),
  });
  const BatchSchema = z.object({
    records: z.array(CompanyRecordSchema).min(1).max(config.maxBatch),
  });

  app.get('/health', async () => ({ ok: true, disallowListSize: classifier.size }));

  app.post('/flags', async (req, res) => {
    const parsed = SingleSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.code(400).send({ error: 'Invalid request', issues: parsed.error.issues });
    }
    const { record, parent } = parsed.data;
    const flags = aggregator.evaluate(record, parent);
    return res.send({ flags, payload: buildReasoningPayload(record, parent, flags) });
  });

  app.post('/flags/batch', async (req, res) => {
    const parsed = BatchSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.code(400).send({ error: 'Invalid request', issues: parsed.error.issues });
    }
    const t0 = Date.now();
    // Parents are looked up among the submitted records themselves.
    const source = new InMemoryRecordSource(parsed.data.records);
    const inputs = await resolveParents(parsed.data.records, source);
    const t1 = Date.now();
    const evaluated = await evaluateBatch(aggregator, inputs, { concurrency: config.concurrency });
    const t2 = Date.now();
    const results = evaluated.map((r) => ({
      id: r.record.id,
      flags: r.flags,
      payload: buildReasoningPayload(r.record, r.parent, r.flags),
    }));
    const timings = { resolveMs: t1 - t0, evaluateMs: t2 - t1, totalMs: t2 - t0 };
    return res.send({ results, summary: summarize(evaluated), timings });
  });

  return app;
}

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;
  const list = await loadDisallowList(config.badDomainsPath);
  logger.info({ source: list.source, domains: list.domains.size }, 'disallow-list loaded');
  const app = await buildApp({ config, disallowList: list });
  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info(`API running on http://localhost:${config.port}`);
}

// Run main() only when executed directly (paths resolved for tsx and Windows)
try {
  const invoked = process.argv[1] ? path.resolve(process.argv[1]) : '';
  const thisFile = fileURLToPath(import.meta.url);
  if (invoked && path.resolve(thisFile) === invoked) {
    main().catch((e) => { logger.fatal({ err: e }, 'startup failed'); process.exit(1); });
  }
} catch (e) {
  logger.debug({ err: e }, 'entry-point detection failed; not starting the server');
}
